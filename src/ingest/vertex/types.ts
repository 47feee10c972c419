/**
 * Vertex AI Studio export type definitions
 * Based on the JSON files written by the "Export" action of a saved chat prompt
 */

import { z } from 'zod';

/**
 * Top-level export document.
 * Only `messages` is required; `context` is carried but never rendered.
 */
export const VertexExportSchema = z
  .object({
    context: z.unknown().optional(),
    messages: z.array(z.unknown()),
  })
  .passthrough();
export type VertexExport = z.infer<typeof VertexExportSchema>;

/**
 * A single message before resolution - any JSON object
 */
export const RawMessageSchema = z.record(z.string(), z.unknown());
export type RawMessage = z.infer<typeof RawMessageSchema>;

/**
 * Content part carrying one line of text
 */
export const ContentPartSchema = z
  .object({
    text: z.string(),
  })
  .passthrough();
export type ContentPart = z.infer<typeof ContentPartSchema>;

/**
 * Structured message content, e.g.
 * { "role": "user", "parts": [{ "text": "..." }] }
 */
export const StructuredContentSchema = z
  .object({
    parts: z.array(ContentPartSchema),
  })
  .passthrough();
export type StructuredContent = z.infer<typeof StructuredContentSchema>;

/**
 * Resolved author label
 */
export type Author =
  | { kind: 'named'; name: string }
  | { kind: 'placeholder'; index: number };

/**
 * Resolved message body
 */
export type Content =
  | { kind: 'structured'; parts: string[] }
  | { kind: 'plain'; text: string }
  | { kind: 'missing' };

/**
 * Message with author and content resolved, in export order
 */
export interface ResolvedMessage {
  /** 1-based position in the export */
  index: number;
  author: Author;
  content: Content;
}
