/**
 * Utility function tests
 */

import { describe, it, expect } from 'vitest';
import { capitalize, formatSize, pluralize } from './index.js';

describe('capitalize', () => {
  it('should upper-case the first character', () => {
    expect(capitalize('model')).toBe('Model');
  });

  it('should lower-case the remaining characters', () => {
    expect(capitalize('USER')).toBe('User');
    expect(capitalize('chat BOT')).toBe('Chat bot');
  });

  it('should leave an empty string alone', () => {
    expect(capitalize('')).toBe('');
  });
});

describe('formatSize', () => {
  it('should format bytes', () => {
    expect(formatSize(512)).toBe('512 B');
  });

  it('should format kilobytes', () => {
    expect(formatSize(1536)).toBe('1.5 KB');
  });

  it('should format megabytes', () => {
    expect(formatSize(3 * 1024 * 1024)).toBe('3.0 MB');
  });
});

describe('pluralize', () => {
  it('should keep the noun singular for one', () => {
    expect(pluralize(1, 'message')).toBe('1 message');
  });

  it('should add an s for zero and for more than one', () => {
    expect(pluralize(0, 'message')).toBe('0 messages');
    expect(pluralize(12, 'message')).toBe('12 messages');
  });
});
