#!/usr/bin/env node

/**
 * CLI entry point for crate-bridge
 * Handles command-line argument parsing
 */

import { Command } from 'commander';
import { convertCommand } from './commands/convert.js';
import { watchCommand } from './commands/watch.js';

const program = new Command();

program
  .name('crate-bridge')
  .description('Convert Serato crate files to Rekordbox XML')
  .version('0.1.0');

function withCommonOptions(command: Command): Command {
  return command
    .option('--crate-root <path>', 'Directory containing .crate files')
    .option('-o, --output <path>', 'Destination Rekordbox XML file')
    .option('--product-name <name>', 'Product name to embed in the XML')
    .option('--product-version <version>', 'Product version to embed in the XML')
    .option('-c, --config <path>', 'Path to a JSON config file')
    .option('-v, --verbose', 'Verbose output');
}

withCommonOptions(program.command('convert'))
  .description('Convert the crates once')
  .option('--dry-run', 'Load crates and report a summary without writing XML')
  .action(convertCommand);

withCommonOptions(program.command('watch'))
  .description('Poll the crates and regenerate the XML when they change')
  .option('--interval <seconds>', 'Polling interval in seconds')
  .action(watchCommand);

await program.parseAsync();
