#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for encodeq.
 * Without a command, opens the interactive menu.
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';

// Commands
import { menuCommand } from './commands/menu.js';
import { encodeCommand } from './commands/encode.js';
import { qualityCommand } from './commands/quality.js';
import { benchCommand } from './commands/bench.js';
import { queueRunCommand, queueShowCommand } from './commands/queue.js';
import { presetsCommand } from './commands/presets.js';

const program = new Command();

program
  .name('encodeq')
  .description('Interactive ffmpeg batch encoder')
  .version('1.0.0')
  .action(menuCommand);

// ============================================
// ENCODING COMMANDS
// ============================================

program
  .command('encode [path]')
  .description('Configure and encode a file or every media file in a folder')
  .option('-p, --preset <id>', 'Preset id (skips the preset prompt)')
  .action(encodeCommand);

program
  .command('bench <file>')
  .description('Compare presets on a sample clip')
  .action(benchCommand);

program
  .command('quality <reference> <distorted>')
  .description('Score an encode against its source')
  .option('-m, --metric <metric>', 'vmaf or ssim', 'vmaf')
  .option('--model <model>', 'VMAF model: 4k or hd', '4k')
  .option('--no-crop', 'Compare 1:1 without centre-cropping the reference')
  .action(qualityCommand);

program
  .command('presets')
  .description('List the available presets')
  .option('-v, --verbose', 'Show encoder options')
  .action(presetsCommand);

// ============================================
// QUEUE COMMANDS
// ============================================

const queue = program
  .command('queue')
  .description('Work with saved queue files');

queue
  .command('show <file>')
  .description('Print the plan stored in a queue file')
  .action(queueShowCommand);

queue
  .command('run <file>')
  .description('Run every job in a queue file')
  .action(queueRunCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('encodeq --help'), 'for available commands');
  }
  process.exit(1);
});

// Parse and execute
await program.parseAsync();
