/**
 * Convert command
 * vertex-md <input_file> [-o <output>]
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { convertFile, deriveOutputPath, type ConvertOptions } from '../../convert/index.js';
import { formatSize, pluralize } from '../../utils/index.js';

/** Options for the convert command */
export interface ConvertCommandOptions {
  output?: string;
}

/**
 * Run one conversion and print its final status line
 * @returns process exit code
 */
export async function runConvert(
  inputFile: string,
  options: ConvertCommandOptions,
  convertOptions: ConvertOptions = {}
): Promise<number> {
  const outputFile = options.output ?? deriveOutputPath(inputFile);

  if (resolve(outputFile) === resolve(inputFile)) {
    console.error(`Refusing to overwrite the input file '${inputFile}'. Use --output to choose another path.`);
    return 1;
  }

  const result = await convertFile(inputFile, outputFile, convertOptions);

  if (!result.ok) {
    console.error(`Conversion failed (${result.error.code}): ${result.error.message}`);
    if (result.bytesWritten > 0) {
      console.error(`Error details written to: ${result.outputPath}`);
    }
    return 1;
  }

  console.log(
    `Converted ${pluralize(result.messageCount, 'message')} to ${result.outputPath} (${formatSize(result.bytesWritten)})`
  );
  return 0;
}

/**
 * Attach the input argument, options and action to the program
 */
export function configureConvertCommand(program: Command): void {
  program
    .argument('<input_file>', 'Path to the Vertex AI Studio export JSON file (e.g. "chat-bison-export.json")')
    .option(
      '-o, --output <path>',
      'Path for the output Markdown file (e.g. "conversation.md"). Defaults to the input file name with a .md extension'
    )
    .action(async (inputFile: string, options: ConvertCommandOptions) => {
      try {
        process.exitCode = await runConvert(inputFile, options);
      } catch (err) {
        console.error('Failed to convert export:', err);
        process.exitCode = 1;
      }
    });
}
