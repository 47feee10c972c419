/**
 * Vertex AI Studio export parser
 * Parses the export JSON and resolves each message's author and content
 */

import type { ZodError } from 'zod';
import { ConvertError } from '../../convert/errors.js';
import { capitalize } from '../../utils/index.js';
import {
  VertexExportSchema,
  RawMessageSchema,
  StructuredContentSchema,
  type VertexExport,
  type RawMessage,
  type Author,
  type Content,
  type ResolvedMessage,
} from './types.js';

/** Author fields, in order of precedence */
export const AUTHOR_FIELDS = ['author', 'role'] as const;

/** Content fields, in order of precedence */
export const CONTENT_FIELDS = ['content', 'text'] as const;

/**
 * Result of parsing an export document
 */
export type ParseOutcome =
  | { ok: true; data: VertexExport }
  | { ok: false; error: ConvertError };

/**
 * Parse Vertex AI export JSON string.
 * Fails with PARSE_ERROR for invalid JSON and INVALID_SHAPE when there is
 * no `messages` list; messages themselves are resolved lazily.
 */
export function parseVertexExport(jsonContent: string): ParseOutcome {
  let rawData: unknown;
  try {
    rawData = JSON.parse(jsonContent);
  } catch (err) {
    return {
      ok: false,
      error: new ConvertError(
        'PARSE_ERROR',
        `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      ),
    };
  }

  const validationResult = VertexExportSchema.safeParse(rawData);
  if (!validationResult.success) {
    return {
      ok: false,
      error: new ConvertError(
        'INVALID_SHAPE',
        "Export does not contain a 'messages' list",
        { cause: validationResult.error }
      ),
    };
  }

  return { ok: true, data: validationResult.data };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssues(field: string, error: ZodError): string {
  return error.issues
    .map(issue => `${[field, ...issue.path].join('.')}: ${issue.message}`)
    .join('; ');
}

/**
 * Resolve the author label: `author`, then `role`, then a placeholder
 * naming the message position
 */
export function resolveAuthor(message: RawMessage, index: number): Author {
  for (const field of AUTHOR_FIELDS) {
    if (!Object.hasOwn(message, field)) continue;

    const value = message[field];
    if (typeof value !== 'string') {
      throw ConvertError.malformedMessage(index, `'${field}' must be a string`);
    }
    return { kind: 'named', name: capitalize(value) };
  }

  return { kind: 'placeholder', index };
}

/**
 * Resolve the message body: `content`, then `text`, then missing.
 * Strings are taken as-is; objects must carry a `parts` list of `{ text }`.
 */
export function resolveContent(message: RawMessage, index: number): Content {
  const field = CONTENT_FIELDS.find(name => Object.hasOwn(message, name));
  if (!field) return { kind: 'missing' };

  const value = message[field];

  if (typeof value === 'string') {
    return { kind: 'plain', text: value };
  }

  if (isPlainObject(value)) {
    const result = StructuredContentSchema.safeParse(value);
    if (!result.success) {
      throw ConvertError.malformedMessage(index, describeIssues(field, result.error));
    }
    return { kind: 'structured', parts: result.data.parts.map(part => part.text) };
  }

  throw ConvertError.malformedMessage(
    index,
    `'${field}' must be a string or an object with 'parts'`
  );
}

/**
 * Resolve one entry of the `messages` list
 * @param index 1-based position in the export
 * @throws ConvertError with code MALFORMED_MESSAGE
 */
export function resolveMessage(raw: unknown, index: number): ResolvedMessage {
  const result = RawMessageSchema.safeParse(raw);
  if (!result.success) {
    throw ConvertError.malformedMessage(index, 'expected a JSON object');
  }

  return {
    index,
    author: resolveAuthor(result.data, index),
    content: resolveContent(result.data, index),
  };
}
