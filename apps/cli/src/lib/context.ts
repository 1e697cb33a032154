/**
 * Application context
 *
 * Everything the commands share, built once per process.
 */

import ora, { type Ora } from 'ora';
import { basename } from 'node:path';
import { checkDependencies, type Job, type Settings } from '@encodeq/core';
import { CropDetector, FFProbe, MediaProber } from '@encodeq/media';
import {
  hasFilter,
  JobExecutor,
  PipedRunner,
  TONE_MAP_FILTER,
  type ExecutionSummary,
  type JobResult,
  type PresetCatalog,
} from '@encodeq/processing';
import { JobBuilder, JobQueue, TrackSelector } from '@encodeq/queue';
import { loadConfig } from '../config/index.js';
import { ReadlinePrompter } from './prompt.js';
import { printHeader, printInfo, printJobResult, printSummary } from './output.js';

export interface AppContext {
  settings: Settings;
  catalog: PresetCatalog;
  prompter: ReadlinePrompter;
  prober: MediaProber;
  runner: PipedRunner;
  /** Jobs gathered in this session, in run order */
  queue: JobQueue;
  toneMapAvailable: boolean;
}

/**
 * Load configuration and check the external tools.
 *
 * @throws MissingDependencyError when ffmpeg or ffprobe cannot be run
 */
export async function createContext(): Promise<AppContext> {
  const { settings, catalog } = await loadConfig();
  const { ffmpeg, ffprobe } = settings.binaries;

  const spinner = ora('Checking ffmpeg and ffprobe...').start();
  try {
    await checkDependencies(settings.binaries);
  } catch (error) {
    spinner.fail('Required tools missing');
    throw error;
  }

  const toneMapAvailable = await hasFilter(TONE_MAP_FILTER, ffmpeg.resolvedPath);
  if (toneMapAvailable) {
    spinner.succeed(`${TONE_MAP_FILTER} filter detected`);
  } else {
    spinner.warn(`${TONE_MAP_FILTER} filter not detected; HDR sources on 1080p presets will not be tone-mapped`);
  }

  return {
    settings,
    catalog,
    prompter: new ReadlinePrompter(),
    prober: new MediaProber(new FFProbe(ffprobe.resolvedPath)),
    runner: new PipedRunner({ ffmpegPath: ffmpeg.resolvedPath }),
    queue: new JobQueue(),
    toneMapAvailable,
  };
}

/**
 * Job builder with a spinner over each crop analysis
 */
export function createJobBuilder(ctx: AppContext): JobBuilder {
  const builder = new JobBuilder({
    prober: ctx.prober,
    cropDetector: new CropDetector({ ffmpegPath: ctx.settings.binaries.ffmpeg.resolvedPath }),
    trackSelector: new TrackSelector({
      prompter: ctx.prompter,
      preferredLanguage: ctx.settings.preferredLanguage,
    }),
    prompter: ctx.prompter,
    outputDir: ctx.settings.outputDir,
  });

  let spinner: Ora | undefined;
  builder.on('file:start', (file: string, position: number, total: number) => {
    printHeader(`File ${position}/${total}: ${basename(file)}`);
  });
  builder.on('crop:start', () => {
    spinner = ora('Looking for black bars...').start();
  });
  builder.on('crop:done', () => {
    spinner?.stop();
    spinner = undefined;
  });

  return builder;
}

/**
 * Job executor that reports each job and the final summary
 */
export function createExecutor(ctx: AppContext): JobExecutor {
  const executor = new JobExecutor({
    runner: ctx.runner,
    ffmpegPath: ctx.settings.binaries.ffmpeg.resolvedPath,
    cooldownMs: ctx.settings.cooldownMs,
    toneMapAvailable: ctx.toneMapAvailable,
  });

  executor.on('job:start', (job: Job, position: number, total: number) => {
    printHeader(`Processing ${position}/${total}: ${basename(job.inputPath)}`);
  });
  executor.on('job:complete', (result: JobResult) => printJobResult(result));
  executor.on('job:failed', (result: JobResult) => printJobResult(result));
  executor.on('cooldown', (ms: number) => printInfo(`Cooling down for ${Math.round(ms / 1000)}s...`));
  executor.on('summary', (summary: ExecutionSummary) => printSummary(summary));

  return executor;
}
