#!/usr/bin/env tsx
/**
 * CLI Entry Point
 * 
 * Command-line interface for the transcoder. Runs jobs in-process; the
 * controller owns all conversion logic.
 */

import './config/index.js';
import { Command } from 'commander';
import chalk from 'chalk';
import { QUALITY_TIERS, TARGET_FORMATS } from '@transcoder/core';
import { parseTimeArg } from './lib/args.js';
import { printError } from './lib/output.js';

// Commands
import { convertCommand } from './commands/convert.js';
import { probeCommand } from './commands/probe.js';
import { formatsCommand } from './commands/formats.js';
import { checkCommand } from './commands/check.js';

const program = new Command();

program
  .name('transcoder')
  .description('Convert and clip media files with ffmpeg')
  .version('0.1.0');

program
  .command('convert <input> <output>')
  .description('Convert a file, or a clip of it, to another format')
  .requiredOption('-f, --format <format>', `Target format (${TARGET_FORMATS.join(', ')})`)
  .option('-q, --quality <tier>', `Quality tier (${QUALITY_TIERS.join(', ')})`)
  .option('--start <time>', 'Clip start, seconds or HH:MM:SS.mmm', parseTimeArg)
  .option('--end <time>', 'Clip end, seconds or HH:MM:SS.mmm', parseTimeArg)
  .option('--json', 'Print the outcome as JSON')
  .action(convertCommand);

program
  .command('probe <input>')
  .description('Show duration and streams of a media file')
  .option('--json', 'Print raw probe data as JSON')
  .action(probeCommand);

program
  .command('formats')
  .description('List output formats and their encoder settings')
  .option('--json', 'Output in JSON format')
  .action(formatsCommand);

program
  .command('check')
  .description('Check that ffmpeg and ffprobe can be found and run')
  .action(checkCommand);

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('transcoder --help'), 'for available commands');
  }
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  printError(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
