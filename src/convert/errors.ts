/**
 * Conversion error taxonomy
 */

export type ConvertErrorCode =
  | 'INPUT_NOT_FOUND'
  | 'PARSE_ERROR'
  | 'INVALID_SHAPE'
  | 'MALFORMED_MESSAGE'
  | 'UNEXPECTED';

export interface ConvertErrorOptions {
  /** 1-based position of the offending message */
  messageIndex?: number;
  cause?: unknown;
}

/**
 * Error raised (or returned) for every way a conversion can fail
 */
export class ConvertError extends Error {
  readonly messageIndex?: number;

  constructor(
    public readonly code: ConvertErrorCode,
    message: string,
    options: ConvertErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ConvertError';
    this.messageIndex = options.messageIndex;
  }

  static malformedMessage(index: number, detail: string): ConvertError {
    return new ConvertError('MALFORMED_MESSAGE', `Message ${index} is malformed: ${detail}`, {
      messageIndex: index,
    });
  }

  static unexpected(err: unknown): ConvertError {
    if (err instanceof ConvertError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new ConvertError('UNEXPECTED', message, { cause: err });
  }
}

/**
 * Check for a Node.js system error with the given code (ENOENT, EACCES, ...)
 */
export function isErrnoException(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
