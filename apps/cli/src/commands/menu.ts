/**
 * Main Menu
 *
 * Interactive loop over every feature; the default when no command is given.
 */

import chalk from 'chalk';
import { errorMessage } from '@encodeq/core';
import { createContext, type AppContext } from '../lib/context.js';
import { printError, printWarning } from '../lib/output.js';
import { runEncodeWizard } from './encode.js';
import { runQualityWizard } from './quality.js';
import { runBenchmarkWizard } from './bench.js';
import { exportQueue, importQueue, startQueue, viewQueue } from './queue.js';

interface MenuEntry {
  key: string;
  label: string;
  action: (ctx: AppContext) => Promise<void> | void;
}

const ENTRIES: readonly MenuEntry[] = [
  { key: '1', label: 'Encode', action: ctx => runEncodeWizard(ctx) },
  { key: '2', label: 'Quality check (VMAF/SSIM)', action: runQualityWizard },
  { key: '3', label: 'Benchmark presets', action: ctx => runBenchmarkWizard(ctx) },
  { key: '4', label: 'Import queue', action: importQueue },
  { key: '5', label: 'View queue', action: viewQueue },
  { key: '6', label: 'Export queue', action: exportQueue },
  { key: '7', label: 'Start queue', action: startQueue },
];

function printMenu(ctx: AppContext): void {
  console.log();
  console.log(chalk.bold('encodeq') + chalk.gray(` - ${ctx.queue.size} job(s) queued`));
  for (const entry of ENTRIES) {
    console.log(` ${chalk.cyan(`[${entry.key}]`)} ${entry.label}`);
  }
  console.log(` ${chalk.cyan('[q]')} Exit`);
}

export async function menuCommand(): Promise<void> {
  let ctx: AppContext;
  try {
    ctx = await createContext();
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }

  while (true) {
    printMenu(ctx);
    const answer = (await ctx.prompter.ask('> ')).trim().toLowerCase();
    if (answer === 'q') break;

    const entry = ENTRIES.find(e => e.key === answer);
    if (!entry) {
      printWarning('Invalid choice.');
      continue;
    }

    try {
      await entry.action(ctx);
    } catch (error) {
      printError(errorMessage(error));
    }
  }

  if (!ctx.queue.isEmpty) {
    printWarning(`${ctx.queue.size} queued job(s) were not run. Export the queue to keep them.`);
  }
}
