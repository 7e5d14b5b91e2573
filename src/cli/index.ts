#!/usr/bin/env node
/**
 * procflow CLI - Main entry point
 */

import { Command } from 'commander';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { version } from '../version.js';
import { registerExtractCommand, registerFlowCommands, registerDbCommands } from './commands/index.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('procflow')
    .description('Extract structured process flows from SOP documents with an LLM')
    .version(version);

  registerExtractCommand(program);
  registerFlowCommands(program);
  registerDbCommands(program);

  return program;
}

/**
 * True when this module is the process entry point, including through the bin symlink
 */
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Run CLI when executed directly (not when imported as module)
if (isEntryPoint()) {
  const program = createProgram();
  program.parseAsync().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
