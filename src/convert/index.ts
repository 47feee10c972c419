/**
 * Converter
 * Reads one Vertex AI export, renders it as Markdown and writes the result
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import pino from 'pino';
import {
  parseVertexExport,
  resolveMessage,
  type ResolvedMessage,
} from '../ingest/vertex/index.js';
import { toMarkdown, formatAuthor } from '../export/markdown.js';
import { createLogger } from '../utils/logger.js';
import { ConvertError, isErrnoException } from './errors.js';

export { ConvertError, isErrnoException, type ConvertErrorCode } from './errors.js';
export { deriveOutputPath, MARKDOWN_EXTENSION } from './paths.js';

export interface ConvertOptions {
  /** Logger to use instead of the module logger */
  logger?: pino.Logger;
}

export interface ConvertSuccess {
  ok: true;
  inputPath: string;
  outputPath: string;
  messageCount: number;
  bytesWritten: number;
}

export interface ConvertFailure {
  ok: false;
  inputPath: string;
  outputPath: string;
  error: ConvertError;
  /** 0 when nothing reached the output file */
  bytesWritten: number;
}

export type ConvertResult = ConvertSuccess | ConvertFailure;

/**
 * Text of the `## Error` section for failures recorded in the output file
 */
export function describeFailure(error: ConvertError): string {
  switch (error.code) {
    case 'PARSE_ERROR':
      return 'Could not parse the input file. Please ensure it is a valid JSON file.';
    case 'INVALID_SHAPE':
      return "Input file does not contain a valid 'messages' list.";
    default:
      return error.message;
  }
}

interface RenderedExport {
  markdown: string;
  messageCount: number;
  error?: ConvertError;
}

/**
 * Render the export text. Stops at the first failure, keeping what was
 * rendered so far followed by an error section.
 */
function renderExport(jsonContent: string, logger: pino.Logger): RenderedExport {
  const parsed = parseVertexExport(jsonContent);
  if (!parsed.ok) {
    return {
      markdown: toMarkdown([], describeFailure(parsed.error)),
      messageCount: 0,
      error: parsed.error,
    };
  }

  const { messages } = parsed.data;
  const resolved: ResolvedMessage[] = [];

  for (let i = 0; i < messages.length; i++) {
    const index = i + 1;
    try {
      const message = resolveMessage(messages[i], index);
      logger.debug({ index, author: formatAuthor(message.author) }, 'Rendering message');
      resolved.push(message);
    } catch (err) {
      if (!(err instanceof ConvertError)) throw err;
      return {
        markdown: toMarkdown(resolved, describeFailure(err)),
        messageCount: resolved.length,
        error: err,
      };
    }
  }

  return { markdown: toMarkdown(resolved), messageCount: resolved.length };
}

async function writeDocument(outputPath: string, markdown: string): Promise<number> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, markdown, 'utf-8');
  return Buffer.byteLength(markdown, 'utf-8');
}

function logFailure(
  logger: pino.Logger,
  error: ConvertError,
  inputPath: string,
  outputPath: string
): void {
  const context = { code: error.code, inputPath, outputPath };
  switch (error.code) {
    case 'INPUT_NOT_FOUND':
      logger.error(context, `Error: The input file '${inputPath}' was not found.`);
      break;
    case 'PARSE_ERROR':
      logger.error(context, `Error: Could not parse '${inputPath}'. It may not be a valid JSON file.`);
      break;
    case 'INVALID_SHAPE':
      logger.error(context, `Error: Input file '${inputPath}' does not contain a 'messages' list.`);
      break;
    case 'MALFORMED_MESSAGE':
      logger.error(
        { ...context, messageIndex: error.messageIndex },
        `Error: ${error.message} (input '${inputPath}')`
      );
      break;
    case 'UNEXPECTED':
      logger.error({ ...context, err: error.cause }, `An unexpected error occurred: ${error.message}`);
      break;
  }
}

/**
 * Convert a Vertex AI export file to a Markdown file.
 * Conversion failures never throw: they come back as `{ ok: false, error }`,
 * including an invalid logging configuration (code `UNEXPECTED`).
 */
export async function convertFile(
  inputPath: string,
  outputPath: string,
  options: ConvertOptions = {}
): Promise<ConvertResult> {
  let logger = options.logger;
  let bytesWritten = 0;

  const fail = (error: ConvertError): ConvertFailure => {
    // A bad logging config leaves no module logger to report through
    logFailure(logger ?? pino({ level: 'error' }), error, inputPath, outputPath);
    return { ok: false, inputPath, outputPath, error, bytesWritten };
  };

  try {
    const log = logger ?? createLogger({ module: 'convert' });
    logger = log;

    let jsonContent: string;
    try {
      jsonContent = await readFile(inputPath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err, 'ENOENT')) {
        return fail(
          new ConvertError('INPUT_NOT_FOUND', `Input file not found: ${inputPath}`, { cause: err })
        );
      }
      throw err;
    }

    const rendered = renderExport(jsonContent, log);
    bytesWritten = await writeDocument(outputPath, rendered.markdown);

    if (rendered.error) {
      return fail(rendered.error);
    }

    if (rendered.messageCount === 0) {
      log.info(
        { inputPath, outputPath, messageCount: 0 },
        `Successfully created '${outputPath}', but no messages were found.`
      );
    } else {
      log.info(
        { inputPath, outputPath, messageCount: rendered.messageCount },
        `Successfully converted ${rendered.messageCount} messages from '${inputPath}' to '${outputPath}'`
      );
    }

    return {
      ok: true,
      inputPath,
      outputPath,
      messageCount: rendered.messageCount,
      bytesWritten,
    };
  } catch (err) {
    return fail(ConvertError.unexpected(err));
  }
}
