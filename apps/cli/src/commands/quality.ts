/**
 * Quality Command
 *
 * VMAF or SSIM of an encode against its source.
 */

import ora from 'ora';
import { cleanInputPath, isFile } from '@encodeq/utils';
import { errorMessage, isBackAnswer } from '@encodeq/core';
import type { QualityMetric } from '@encodeq/media';
import { QualityAnalyzer, VMAF_MODELS, type CompareOptions } from '@encodeq/processing';
import { createContext, type AppContext } from '../lib/context.js';
import { askPath } from '../lib/pickers.js';
import { printError, printInfo, printQualityReport, printWarning } from '../lib/output.js';

async function compare(ctx: AppContext, reference: string, distorted: string, options: CompareOptions): Promise<void> {
  const analyzer = new QualityAnalyzer({
    prober: ctx.prober,
    ffmpegPath: ctx.settings.binaries.ffmpeg.resolvedPath,
  });

  const spinner = ora(`Running ${options.metric.toUpperCase()} analysis...`).start();
  try {
    const report = await analyzer.compare(reference, distorted, options);
    spinner.succeed('Analysis complete');
    if (report.referenceCrop) {
      printInfo(`Resolution mismatch: reference cropped to ${report.referenceCrop.width}x${report.referenceCrop.height}.`);
    }
    printQualityReport(report);
  } catch (error) {
    spinner.fail('Analysis failed');
    throw error;
  }
}

async function askExistingFile(ctx: AppContext, question: string): Promise<string | undefined> {
  const path = await askPath(ctx.prompter, question);
  if (path === undefined) return undefined;
  if (!(await isFile(path))) {
    printWarning(`Not a file: ${path}`);
    return undefined;
  }
  return path;
}

export async function runQualityWizard(ctx: AppContext): Promise<void> {
  const reference = await askExistingFile(ctx, 'Reference file (original/remux) (q=Back): ');
  if (!reference) return;
  const distorted = await askExistingFile(ctx, 'Distorted file (encode) (q=Back): ');
  if (!distorted) return;

  ctx.prompter.say('If the encode kept its black bars, turn auto-crop off.');
  const oneToOne = await ctx.prompter.ask('Force 1:1 comparison (disable auto-crop)? [y/N]: ');
  const autoCrop = oneToOne.trim().toLowerCase() !== 'y';

  ctx.prompter.say('Metric (q=Back):');
  ctx.prompter.say(' [1] VMAF');
  ctx.prompter.say(' [2] SSIM');
  const metricAnswer = (await ctx.prompter.ask('> ')).trim();
  if (isBackAnswer(metricAnswer)) return;

  let metric: QualityMetric;
  let model: string | undefined;
  if (metricAnswer === '1') {
    metric = 'vmaf';
    ctx.prompter.say('VMAF model:');
    ctx.prompter.say(' [1] 4K HDR');
    ctx.prompter.say(' [2] 1080p SDR');
    const modelAnswer = (await ctx.prompter.ask('> ')).trim();
    model = modelAnswer === '1' ? VMAF_MODELS['4k'] : VMAF_MODELS.hd;
  } else if (metricAnswer === '2') {
    metric = 'ssim';
  } else {
    printWarning('Invalid choice.');
    return;
  }

  await compare(ctx, reference, distorted, { metric, model, autoCrop });
}

interface QualityOptions {
  metric: string;
  model: string;
  crop: boolean;
}

export async function qualityCommand(reference: string, distorted: string, options: QualityOptions): Promise<void> {
  const metric = options.metric.toLowerCase();
  if (metric !== 'vmaf' && metric !== 'ssim') {
    printError(`Unknown metric "${options.metric}" (expected vmaf or ssim)`);
    process.exit(1);
  }
  const model = options.model === '4k' ? VMAF_MODELS['4k'] : VMAF_MODELS.hd;

  try {
    const ctx = await createContext();
    await compare(ctx, cleanInputPath(reference), cleanInputPath(distorted), {
      metric,
      model,
      autoCrop: options.crop,
    });
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }
}
