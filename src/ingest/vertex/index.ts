/**
 * Vertex AI Studio ingestion module
 */

export {
  parseVertexExport,
  resolveAuthor,
  resolveContent,
  resolveMessage,
  AUTHOR_FIELDS,
  CONTENT_FIELDS,
  type ParseOutcome,
} from './parser.js';

export {
  VertexExportSchema,
  RawMessageSchema,
  ContentPartSchema,
  StructuredContentSchema,
  type VertexExport,
  type RawMessage,
  type ContentPart,
  type StructuredContent,
  type Author,
  type Content,
  type ResolvedMessage,
} from './types.js';
