/**
 * Encode Command
 *
 * Preset, files, per-file configuration, plan, then run now or queue.
 */

import { cleanInputPath } from '@encodeq/utils';
import { errorMessage, isCancelled, type Preset } from '@encodeq/core';
import { collectInputFiles, describePlan } from '@encodeq/queue';
import { createContext, createExecutor, createJobBuilder, type AppContext } from '../lib/context.js';
import { askPath, choosePreset } from '../lib/pickers.js';
import { printError, printInfo, printPlan, printSuccess, printWarning } from '../lib/output.js';

export interface EncodeWizardOptions {
  /** Skip the file prompt */
  files?: string[];
  /** Skip the preset prompt, e.g. a preset picked from a benchmark */
  preset?: Preset;
}

export async function runEncodeWizard(ctx: AppContext, options: EncodeWizardOptions = {}): Promise<void> {
  let preset = options.preset;
  if (preset) {
    printInfo(`Preset: ${preset.name}`);
  } else {
    preset = await choosePreset(ctx.prompter, ctx.catalog);
    if (!preset) return;
  }

  let files = options.files;
  if (!files) {
    const path = await askPath(ctx.prompter, 'Drag a file or folder here (q=Back): ');
    if (path === undefined) return;
    files = await collectInputFiles(path);
  }
  if (files.length === 0) {
    printWarning('No media files found.');
    return;
  }

  const built = await createJobBuilder(ctx).build(files, preset);
  if (isCancelled(built)) {
    printInfo('Back to the menu; no jobs were created.');
    return;
  }
  const jobs = built.value;
  if (jobs.length === 0) {
    printWarning('No file could be configured.');
    return;
  }

  printPlan(describePlan(jobs));

  const answer = (await ctx.prompter.ask('Start now, add to queue, or back? [y/a/q]: ')).trim().toLowerCase();
  if (answer === 'a') {
    ctx.queue.add(...jobs);
    printSuccess(`${jobs.length} job(s) queued, ${ctx.queue.size} in total.`);
    return;
  }
  if (answer !== 'y') return;

  await createExecutor(ctx).execute(jobs);
}

interface EncodeOptions {
  preset?: string;
}

export async function encodeCommand(path: string | undefined, options: EncodeOptions): Promise<void> {
  try {
    const ctx = await createContext();

    let preset: Preset | undefined;
    if (options.preset !== undefined) {
      preset = ctx.catalog.get(options.preset);
      if (!preset) {
        printError(`No preset "${options.preset}". Run "encodeq presets" to list them.`);
        process.exit(1);
      }
    }

    const files = path === undefined ? undefined : await collectInputFiles(cleanInputPath(path));
    await runEncodeWizard(ctx, { files, preset });
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }
}
