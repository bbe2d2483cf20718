/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  createRecoverCommand,
  createInspectCommand,
  createConfigCommand,
} from './commands/index.js';
import { printError } from './output.js';

// Re-export
export * from './output.js';
export * from './commands/index.js';

/**
 * Package version - read from package.json
 */
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../../package.json');
export const VERSION: string = packageJson.version;

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('session-salvage')
    .description('Recover lost or misfiled Ableton Live sets, packs and keyword-matched files')
    .version(VERSION)
    .option('--no-color', 'Disable colored output');

  // Add commands
  program.addCommand(createRecoverCommand());
  program.addCommand(createInspectCommand());
  program.addCommand(createConfigCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
