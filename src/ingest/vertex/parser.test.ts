/**
 * Vertex AI export parser tests
 */

import { describe, it, expect } from 'vitest';
import { ConvertError } from '../../convert/errors.js';
import {
  parseVertexExport,
  resolveAuthor,
  resolveContent,
  resolveMessage,
} from './parser.js';

// Sample export in the shape written by Vertex AI Studio
const sampleExport = {
  context: 'You are a helpful assistant.',
  examples: [],
  messages: [
    {
      author: 'user',
      content: {
        role: 'user',
        parts: [{ text: 'What does a quad store keep per triple?' }],
      },
    },
    {
      author: 'bot',
      content: {
        role: 'model',
        parts: [
          { text: 'A graph name.' },
          { text: 'Subject, predicate and object make up the rest.' },
        ],
      },
    },
  ],
};

function captureError(fn: () => unknown): ConvertError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConvertError) return err;
    throw err;
  }
  throw new Error('Expected a ConvertError to be thrown');
}

describe('parseVertexExport', () => {
  it('should parse valid export', () => {
    const result = parseVertexExport(JSON.stringify(sampleExport));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.data.messages).toHaveLength(2);
      expect(result.data.context).toBe('You are a helpful assistant.');
    }
  });

  it('should accept an export without context', () => {
    const result = parseVertexExport('{"messages": []}');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.data.messages).toEqual([]);
    }
  });

  it('should ignore a context that is not a string', () => {
    const result = parseVertexExport('{"context": 7, "messages": [{"text": "hi"}]}');

    expect(result.ok).toBe(true);
  });

  it('should report invalid JSON', () => {
    const result = parseVertexExport('{"messages": [');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PARSE_ERROR');
      expect(result.error.message).toMatch(/^Invalid JSON: /);
    }
  });

  it('should report missing messages field', () => {
    const result = parseVertexExport('{"context": "x"}');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_SHAPE');
      expect(result.error.message).toBe("Export does not contain a 'messages' list");
    }
  });

  it('should report messages that are not a list', () => {
    const result = parseVertexExport('{"messages": {"author": "user"}}');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_SHAPE');
    }
  });

  it('should report top-level values that are not objects', () => {
    for (const input of ['[]', 'null', '"messages"', '42']) {
      const result = parseVertexExport(input);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('INVALID_SHAPE');
      }
    }
  });
});

describe('resolveAuthor', () => {
  it('should prefer author over role', () => {
    expect(resolveAuthor({ author: 'user', role: 'model' }, 1)).toEqual({
      kind: 'named',
      name: 'User',
    });
  });

  it('should fall back to role', () => {
    expect(resolveAuthor({ role: 'MODEL' }, 1)).toEqual({ kind: 'named', name: 'Model' });
  });

  it('should use a placeholder naming the position when both are absent', () => {
    expect(resolveAuthor({ content: 'hi' }, 3)).toEqual({ kind: 'placeholder', index: 3 });
  });

  it('should reject an author that is not a string', () => {
    const error = captureError(() => resolveAuthor({ author: null }, 2));

    expect(error.code).toBe('MALFORMED_MESSAGE');
    expect(error.messageIndex).toBe(2);
    expect(error.message).toBe("Message 2 is malformed: 'author' must be a string");
  });

  it('should not fall through to role when author is invalid', () => {
    const error = captureError(() => resolveAuthor({ author: 5, role: 'user' }, 1));

    expect(error.message).toBe("Message 1 is malformed: 'author' must be a string");
  });
});

describe('resolveContent', () => {
  it('should prefer content over text', () => {
    expect(resolveContent({ content: 'from content', text: 'from text' }, 1)).toEqual({
      kind: 'plain',
      text: 'from content',
    });
  });

  it('should fall back to text as plain content', () => {
    expect(resolveContent({ text: 'Hello there' }, 1)).toEqual({
      kind: 'plain',
      text: 'Hello there',
    });
  });

  it('should report missing content', () => {
    expect(resolveContent({ author: 'user' }, 1)).toEqual({ kind: 'missing' });
  });

  it('should extract structured parts in order', () => {
    const content = resolveContent(
      { content: { role: 'user', parts: [{ text: 'hi' }, { text: 'again' }] } },
      1
    );

    expect(content).toEqual({ kind: 'structured', parts: ['hi', 'again'] });
  });

  it('should extract structured parts from the text field', () => {
    expect(resolveContent({ text: { parts: [{ text: 'x' }] } }, 1)).toEqual({
      kind: 'structured',
      parts: ['x'],
    });
  });

  it('should accept an empty parts list', () => {
    expect(resolveContent({ content: { parts: [] } }, 1)).toEqual({
      kind: 'structured',
      parts: [],
    });
  });

  it('should reject structured content without parts', () => {
    const error = captureError(() => resolveContent({ content: { role: 'user' } }, 4));

    expect(error.code).toBe('MALFORMED_MESSAGE');
    expect(error.messageIndex).toBe(4);
    expect(error.message).toBe('Message 4 is malformed: content.parts: Required');
  });

  it('should reject a part without text', () => {
    const error = captureError(() =>
      resolveContent({ content: { parts: [{ text: 'a' }, { inline_data: {} }] } }, 1)
    );

    expect(error.message).toBe('Message 1 is malformed: content.parts.1.text: Required');
  });

  it('should reject content that is neither a string nor an object', () => {
    for (const value of [42, ['a'], true, null]) {
      const error = captureError(() => resolveContent({ content: value }, 6));
      expect(error.message).toBe(
        "Message 6 is malformed: 'content' must be a string or an object with 'parts'"
      );
    }
  });
});

describe('resolveMessage', () => {
  it('should resolve author and content together', () => {
    const message = resolveMessage(sampleExport.messages[1], 2);

    expect(message).toEqual({
      index: 2,
      author: { kind: 'named', name: 'Bot' },
      content: {
        kind: 'structured',
        parts: ['A graph name.', 'Subject, predicate and object make up the rest.'],
      },
    });
  });

  it('should resolve an empty object to placeholders', () => {
    expect(resolveMessage({}, 7)).toEqual({
      index: 7,
      author: { kind: 'placeholder', index: 7 },
      content: { kind: 'missing' },
    });
  });

  it('should reject entries that are not objects', () => {
    for (const value of ['hello', ['author'], null, 3]) {
      const error = captureError(() => resolveMessage(value, 2));
      expect(error.code).toBe('MALFORMED_MESSAGE');
      expect(error.message).toBe('Message 2 is malformed: expected a JSON object');
    }
  });
});
