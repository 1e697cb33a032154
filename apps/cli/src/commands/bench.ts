/**
 * Benchmark Command
 *
 * Encode a clip from the middle of a file with several presets, rank them,
 * then optionally hand the winner to the encode wizard.
 */

import ora, { type Ora } from 'ora';
import { cleanInputPath, isFile } from '@encodeq/utils';
import { EncodeqError, errorMessage, isBackAnswer, type Preset } from '@encodeq/core';
import { BenchmarkEngine, type BenchmarkResult } from '@encodeq/processing';
import { createContext, type AppContext } from '../lib/context.js';
import { askPath, choosePresets } from '../lib/pickers.js';
import { printBenchmarkTable, printError, printHeader, printWarning } from '../lib/output.js';
import { runEncodeWizard } from './encode.js';

function createBenchmarkEngine(ctx: AppContext): BenchmarkEngine {
  const engine = new BenchmarkEngine({
    runner: ctx.runner,
    prober: ctx.prober,
    ffmpegPath: ctx.settings.binaries.ffmpeg.resolvedPath,
    sampleSeconds: ctx.settings.sampleSeconds,
  });

  let spinner: Ora | undefined;
  const stopSpinner = (): void => {
    spinner?.stop();
    spinner = undefined;
  };

  engine.on('preset:start', (preset: Preset, position: number, total: number) => {
    stopSpinner();
    printHeader(`Testing ${position}/${total}: ${preset.name}`);
  });
  engine.on('preset:metric', (_preset: Preset, metric: string) => {
    stopSpinner();
    spinner = ora(`Computing ${metric.toUpperCase()}...`).start();
  });
  engine.on('preset:done', () => stopSpinner());
  engine.on('preset:failed', (preset: Preset, diagnostics: string) => {
    stopSpinner();
    printWarning(`${preset.name} failed, left out of the ranking.`);
    if (diagnostics.trim() !== '') console.error(diagnostics.trimEnd());
  });

  return engine;
}

/**
 * Preset to encode with: the only result, or one picked by rank
 */
async function pickRanked(ctx: AppContext, results: readonly BenchmarkResult[]): Promise<Preset | undefined> {
  if (results.length === 1) return results[0]?.preset;

  const answer = await ctx.prompter.ask(`Rank to encode with [1-${results.length}] (q=Back): `);
  if (isBackAnswer(answer)) return undefined;
  const rank = Number(answer.trim());
  const result = Number.isInteger(rank) ? results[rank - 1] : undefined;
  if (!result) printWarning(`No rank "${answer.trim()}".`);
  return result?.preset;
}

async function benchOnce(ctx: AppContext, file: string, presets: readonly Preset[]): Promise<BenchmarkResult[]> {
  const spinner = ora('Cutting reference clip...').start();
  const engine = createBenchmarkEngine(ctx);
  engine.once('reference', () => spinner.succeed('Reference clip ready'));
  try {
    return await engine.bench(file, presets);
  } finally {
    if (spinner.isSpinning) spinner.fail('Benchmark aborted');
  }
}

/**
 * @param file skips the file prompt when given
 */
export async function runBenchmarkWizard(ctx: AppContext, file?: string): Promise<void> {
  let source = file;
  if (source === undefined) {
    source = await askPath(ctx.prompter, 'File to benchmark (q=Back): ');
    if (source === undefined) return;
  }
  if (!(await isFile(source))) {
    printWarning(`Not a file: ${source}`);
    return;
  }

  const presets = await choosePresets(ctx.prompter, ctx.catalog);
  if (!presets) return;
  if (presets.length === 0) {
    printWarning('No presets selected.');
    return;
  }

  while (true) {
    let results: BenchmarkResult[];
    try {
      results = await benchOnce(ctx, source, presets);
    } catch (error) {
      if (!(error instanceof EncodeqError)) throw error;
      printError(error.message);
      return;
    }

    if (results.length === 0) {
      printWarning('Every preset failed; nothing to rank.');
      return;
    }
    printBenchmarkTable(results);

    ctx.prompter.say('What next?');
    ctx.prompter.say(' [1] Repeat benchmark');
    ctx.prompter.say(' [2] Encode with a tested preset');
    ctx.prompter.say(' [q] Back to menu');
    const answer = (await ctx.prompter.ask('> ')).trim();

    if (answer === '1') continue;
    if (answer === '2') {
      const preset = await pickRanked(ctx, results);
      if (preset) await runEncodeWizard(ctx, { files: [source], preset });
    }
    return;
  }
}

export async function benchCommand(file: string): Promise<void> {
  try {
    const ctx = await createContext();
    await runBenchmarkWizard(ctx, cleanInputPath(file));
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }
}
