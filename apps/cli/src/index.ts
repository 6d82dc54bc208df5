#!/usr/bin/env -S node --import tsx
/**
 * CLI Entry Point
 *
 * Command-line interface for cutline. Commands run the pipeline in-process.
 */

import './config/env.js';
import { Command, Option } from 'commander';
import chalk from 'chalk';

// Commands
import { probeCommand } from './commands/probe.js';
import { inspectCommand } from './commands/inspect.js';
import { analyzeCommand } from './commands/analyze.js';
import { exportCommand } from './commands/export.js';
import { configCommand } from './commands/config.js';
import { collectRange, parseIntegerOption } from './lib/args.js';

const program = new Command();

program
  .name('cutline')
  .description('Cut segments out of a video and re-encode it')
  .version('1.0.0');

// ============================================
// SYSTEM COMMANDS
// ============================================

program
  .command('probe')
  .description('Detect the hardware encoder and show the profile it selects')
  .option('--refresh', 'Probe again instead of using the cached result')
  .option('--json', 'Output in JSON format')
  .action(probeCommand);

program
  .command('config')
  .description('Show or update the settings file')
  .option('--set <key=value...>', 'Set one or more settings')
  .option('--json', 'Output in JSON format')
  .action(configCommand);

// ============================================
// MEDIA COMMANDS
// ============================================

program
  .command('inspect <video>')
  .description('Show duration, resolution and frame rate of a video')
  .option('--json', 'Output in JSON format')
  .action(inspectCommand);

program
  .command('analyze <video>')
  .description('Find pauses and filler words worth cutting')
  .option('-l, --language <code>', 'Spoken language, e.g. zh or en')
  .option('--json', 'Output in JSON format')
  .action(analyzeCommand);

program
  .command('export <video>')
  .description('Remove ranges from a video and re-encode it')
  .option('-r, --range <start-end>', 'Range to remove, seconds or HH:MM:SS (repeatable)', collectRange)
  .option('--auto', 'Also remove detected pauses and filler words')
  .option('-o, --output <path>', 'Output file (default: <name>.cut.<ext>)')
  .option('--subtitles', 'Write an .srt beside the output')
  .option('-l, --language <code>', 'Spoken language for transcription')
  .addOption(
    new Option('--quality-factor <n>', 'Constant quality factor (0-51, lower is better)')
      .argParser(parseIntegerOption)
  )
  .option('--bitrate <rate>', 'Target bitrate, e.g. 20000k; alone it selects bitrate mode')
  .action(exportCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('cutline --help'), 'for available commands');
  }
  process.exit(1);
});

// Parse and execute
await program.parseAsync();
