#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Command-line interface for vidshrink. The config module loads first
 * so the environment is in place before any logger is created.
 */

import './config/index.js';
import { Command } from 'commander';
import chalk from 'chalk';
import { ENCODERS, PRESETS, RESOLUTIONS } from '@vidshrink/core';

// Commands
import { compressCommand } from './commands/compress.js';
import { planCommand } from './commands/plan.js';
import { configCommand } from './commands/config.js';

const program = new Command();

program
  .name('vidshrink')
  .description('Compress videos to a target file size')
  .version('0.1.0');

// ============================================
// ENCODING COMMANDS
// ============================================

program
  .command('compress <files...>')
  .description('Compress files one after another')
  .option('-s, --size <mb>', 'Target size in megabytes')
  .option('-f, --fps <rate>', 'Output frame rate')
  .option('-e, --encoder <encoder>', `Encoder (${ENCODERS.join(', ')})`)
  .option('-r, --resolution <height>', `Output resolution (${RESOLUTIONS.join(', ')})`)
  .option('-p, --preset <preset>', `Encoder preset (${PRESETS.join(', ')})`)
  .option('-v, --verbose', 'Stream encoder output')
  .option('--json', 'Print the final queue as JSON')
  .action(compressCommand);

program
  .command('plan <file>')
  .description('Show the bitrate plan and encoder command without running it')
  .option('-s, --size <mb>', 'Target size in megabytes')
  .option('-f, --fps <rate>', 'Output frame rate')
  .option('-e, --encoder <encoder>', 'Encoder')
  .option('-r, --resolution <height>', 'Output resolution')
  .option('-p, --preset <preset>', 'Encoder preset')
  .option('--json', 'Output in JSON format')
  .action(planCommand);

// ============================================
// SETTINGS
// ============================================

program
  .command('config')
  .description('View or modify stored encode settings')
  .option('--set <key=value>', 'Set a setting')
  .option('--get <key>', 'Get a setting')
  .option('--list', 'List all settings')
  .option('--reset', 'Reset to defaults')
  .action(configCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('vidshrink --help'), 'for available commands');
  }
  process.exit(1);
});

await program.parseAsync();
