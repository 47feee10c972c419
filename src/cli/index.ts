#!/usr/bin/env node
/**
 * vertex-md CLI - Main entry point
 */

import { Command } from 'commander';
import { version } from '../version.js';
import { configureConvertCommand } from './commands/index.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('vertex-md')
    .description('Combine messages from a Vertex AI Studio JSON export into a single Markdown file')
    .version(version);

  configureConvertCommand(program);

  return program;
}

// Run CLI when executed directly (not when imported as module)
if (process.argv[1]?.includes('cli/index') || process.argv[1]?.includes('cli\\index') || process.argv[1]?.endsWith('vertex-md')) {
  const program = createProgram();
  await program.parseAsync();
}
