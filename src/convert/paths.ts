import { extname } from 'path';

export const MARKDOWN_EXTENSION = '.md';

/**
 * Default output path: the input path with its last extension replaced by `.md`.
 * A leading dot in the file name does not start an extension.
 */
export function deriveOutputPath(inputPath: string): string {
  const ext = extname(inputPath);
  const base = ext ? inputPath.slice(0, -ext.length) : inputPath;
  return `${base}${MARKDOWN_EXTENSION}`;
}
