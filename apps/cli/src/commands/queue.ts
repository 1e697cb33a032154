/**
 * Queue Commands
 *
 * View, export, import and run the session queue, plus the
 * non-interactive `queue show` and `queue run` for saved files.
 */

import { cleanInputPath } from '@encodeq/utils';
import { errorMessage, QueueFormatError } from '@encodeq/core';
import { describePlan, JobQueue, readQueueFile } from '@encodeq/queue';
import { createContext, createExecutor, type AppContext } from '../lib/context.js';
import { askPath } from '../lib/pickers.js';
import { printError, printInfo, printPlan, printSuccess, printWarning } from '../lib/output.js';

export function viewQueue(ctx: AppContext): void {
  if (ctx.queue.isEmpty) {
    printInfo('The queue is empty.');
    return;
  }
  printPlan(describePlan(ctx.queue.list()));
  printInfo(`${ctx.queue.size} job(s) queued.`);
}

export async function exportQueue(ctx: AppContext): Promise<void> {
  if (ctx.queue.isEmpty) {
    printWarning('Nothing to export.');
    return;
  }
  const path = await askPath(ctx.prompter, 'Save queue as (e.g. queue.json; q=Back): ');
  if (path === undefined || path === '') return;

  await ctx.queue.export(path);
  printSuccess(`Exported ${ctx.queue.size} job(s) to ${path}`);
}

export async function importQueue(ctx: AppContext): Promise<void> {
  const path = await askPath(ctx.prompter, 'Queue file to import (q=Back): ');
  if (path === undefined || path === '') return;

  try {
    const imported = await ctx.queue.merge(path);
    printSuccess(`Imported ${imported} job(s), ${ctx.queue.size} in total.`);
  } catch (error) {
    if (!(error instanceof QueueFormatError)) throw error;
    printError(error.message);
  }
}

export async function startQueue(ctx: AppContext): Promise<void> {
  if (ctx.queue.isEmpty) {
    printWarning('The queue is empty.');
    return;
  }
  await ctx.queue.start(createExecutor(ctx));
}

export async function queueShowCommand(file: string): Promise<void> {
  try {
    const jobs = await readQueueFile(cleanInputPath(file));
    if (jobs.length === 0) {
      printInfo('The queue file has no jobs.');
      return;
    }
    printPlan(describePlan(jobs));
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }
}

export async function queueRunCommand(file: string): Promise<void> {
  try {
    const queue = new JobQueue(await readQueueFile(cleanInputPath(file)));
    if (queue.isEmpty) {
      printInfo('The queue file has no jobs.');
      return;
    }
    const ctx = await createContext();
    const summary = await queue.start(createExecutor(ctx));
    if (summary.failed > 0 || summary.interrupted) process.exit(1);
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }
}
