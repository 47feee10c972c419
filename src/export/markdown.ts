/**
 * Markdown export module
 * Renders resolved export messages as a flat Markdown document
 */

import type { Author, Content, ResolvedMessage } from '../ingest/vertex/index.js';

export const DOCUMENT_TITLE = 'Vertex AI Conversation Log';
export const EMPTY_NOTICE = '*No messages found in the file.*';
export const MISSING_CONTENT = '*No text content found in this message.*';

/**
 * Document header, written before anything is parsed
 */
export function renderHeader(): string {
  return `# ${DOCUMENT_TITLE}\n\n`;
}

/**
 * Heading label for a message author
 */
export function formatAuthor(author: Author): string {
  switch (author.kind) {
    case 'named':
      return author.name;
    case 'placeholder':
      return `Message ${author.index} (Unknown Author)`;
  }
}

/**
 * Body lines of a message, in order
 */
export function contentLines(content: Content): string[] {
  switch (content.kind) {
    case 'structured':
      return content.parts;
    case 'plain':
      return [content.text];
    case 'missing':
      return [MISSING_CONTENT];
  }
}

/**
 * Format a single message: level-2 heading, blank line, one line per body entry.
 * Sections are not separated by an extra blank line.
 */
export function renderMessage(message: ResolvedMessage): string {
  const lines = [`## ${formatAuthor(message.author)}`, ''];
  for (const line of contentLines(message.content)) {
    lines.push(line);
  }
  return lines.map(line => `${line}\n`).join('');
}

/**
 * `## Error` section describing why the conversion stopped
 */
export function renderErrorSection(description: string): string {
  return `## Error\n\n${description}\n`;
}

/**
 * Placeholder written when the export has an empty message list
 */
export function renderEmptyNotice(): string {
  return `${EMPTY_NOTICE}\n`;
}

/**
 * Generate the complete document for already-resolved messages.
 * With an error description the document ends in an error section
 * instead of the empty notice.
 */
export function toMarkdown(messages: ResolvedMessage[], errorDescription?: string): string {
  const sections = [renderHeader()];

  for (const msg of messages) {
    sections.push(renderMessage(msg));
  }

  if (errorDescription !== undefined) {
    sections.push(renderErrorSection(errorDescription));
  } else if (messages.length === 0) {
    sections.push(renderEmptyNotice());
  }

  return sections.join('');
}
