/**
 * Job Executor
 * 
 * Runs queued jobs one after another through the piped runner and keeps
 * before/after byte counts for the ones that succeed. A failed job is
 * reported and skipped; nothing is retried.
 */

import { EventEmitter } from 'node:events';
import { dirname } from 'node:path';
import {
  createLogger,
  ensureDir as ensureDirectory,
  formatCommandLine,
  sleep as wait,
  statSizeOrNull,
} from '@encodeq/utils';
import { errorMessage, type Job } from '@encodeq/core';
import { createJobCommand } from './commandBuilder.js';
import type { EncodeRunner } from './pipedRunner.js';

const log = createLogger({ component: 'job-executor' });

export interface JobStats {
  inputBytes: number;
  outputBytes: number;
  /** Output size as a percentage of the input */
  ratioPercent: number;
  savedBytes: number;
}

export interface JobResult {
  job: Job;
  success: boolean;
  interrupted: boolean;
  /** Present for successful jobs whose files could be measured */
  stats?: JobStats;
  /** Engine stderr, kept for failed jobs */
  diagnostics?: string;
  elapsedSeconds: number;
}

export interface ExecutionSummary {
  attempted: number;
  succeeded: number;
  failed: number;
  /** Stopped early by Ctrl+C */
  interrupted: boolean;
  totalInputBytes: number;
  totalOutputBytes: number;
  savedBytes: number;
  savedPercent: number;
  results: JobResult[];
}

export interface JobExecutorOptions {
  runner: EncodeRunner;
  ffmpegPath?: string;
  /** Pause between consecutive jobs */
  cooldownMs?: number;
  /** Whether the engine can tone-map HDR sources for BT.709 targets */
  toneMapAvailable?: boolean;
  sleep?: (ms: number) => Promise<void>;
  fileSize?: (filePath: string) => Promise<number | null>;
  ensureDir?: (dirPath: string) => Promise<void>;
}

export function computeJobStats(inputBytes: number, outputBytes: number): JobStats {
  return {
    inputBytes,
    outputBytes,
    ratioPercent: inputBytes > 0 ? (outputBytes / inputBytes) * 100 : 0,
    savedBytes: inputBytes - outputBytes,
  };
}

export function summarize(results: JobResult[], interrupted: boolean = false): ExecutionSummary {
  let totalInputBytes = 0;
  let totalOutputBytes = 0;
  for (const result of results) {
    if (!result.success || !result.stats) continue;
    totalInputBytes += result.stats.inputBytes;
    totalOutputBytes += result.stats.outputBytes;
  }

  const savedBytes = totalInputBytes - totalOutputBytes;
  const succeeded = results.filter(r => r.success).length;

  return {
    attempted: results.length,
    succeeded,
    failed: results.length - succeeded,
    interrupted,
    totalInputBytes,
    totalOutputBytes,
    savedBytes,
    savedPercent: totalInputBytes > 0 ? (savedBytes / totalInputBytes) * 100 : 0,
    results,
  };
}

/**
 * Events:
 * - 'job:start' (job, position, total)
 * - 'job:complete' (JobResult)
 * - 'job:failed' (JobResult)
 * - 'cooldown' (ms)
 * - 'summary' (ExecutionSummary), only when more than one job ran
 */
export class JobExecutor extends EventEmitter {
  private runner: EncodeRunner;
  private ffmpegPath: string;
  private cooldownMs: number;
  private toneMapAvailable: boolean;
  private sleep: (ms: number) => Promise<void>;
  private fileSize: (filePath: string) => Promise<number | null>;
  private ensureDir: (dirPath: string) => Promise<void>;

  constructor(options: JobExecutorOptions) {
    super();
    this.runner = options.runner;
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.cooldownMs = options.cooldownMs ?? 5000;
    this.toneMapAvailable = options.toneMapAvailable ?? false;
    this.sleep = options.sleep ?? wait;
    this.fileSize = options.fileSize ?? statSizeOrNull;
    this.ensureDir = options.ensureDir ?? ensureDirectory;
  }

  /**
   * Execute jobs in order. Resolves once every job has been attempted,
   * or early when the user interrupts a running encode.
   */
  async execute(jobs: readonly Job[]): Promise<ExecutionSummary> {
    const results: JobResult[] = [];
    let interrupted = false;

    for (const [i, job] of jobs.entries()) {
      this.emit('job:start', job, i + 1, jobs.length);

      const result = await this.executeOne(job);
      results.push(result);

      if (result.success) {
        this.emit('job:complete', result);
      } else {
        this.emit('job:failed', result);
      }

      if (result.interrupted) {
        log.warn({ inputPath: job.inputPath }, 'Interrupted, remaining jobs skipped');
        interrupted = true;
        break;
      }

      if (i < jobs.length - 1 && this.cooldownMs > 0) {
        this.emit('cooldown', this.cooldownMs);
        await this.sleep(this.cooldownMs);
      }
    }

    const summary = summarize(results, interrupted);
    if (results.length > 1) {
      this.emit('summary', summary);
    }

    log.info({
      attempted: summary.attempted,
      succeeded: summary.succeeded,
      savedBytes: summary.savedBytes,
    }, 'Queue finished');

    return summary;
  }

  /**
   * The argument vector a job will run with
   */
  buildArgs(job: Job): string[] {
    return createJobCommand(job, { toneMapAvailable: this.toneMapAvailable }).build();
  }

  private async executeOne(job: Job): Promise<JobResult> {
    let args: string[];
    try {
      args = this.buildArgs(job);
      await this.ensureDir(dirname(job.outputPath));
    } catch (error) {
      log.error({ err: error, inputPath: job.inputPath }, 'Job could not be prepared');
      return {
        job,
        success: false,
        interrupted: false,
        diagnostics: errorMessage(error),
        elapsedSeconds: 0,
      };
    }

    log.info({ command: formatCommandLine(this.ffmpegPath, args) }, 'Encoding');
    const outcome = await this.runner.run(args, job.durationSeconds);

    if (!outcome.success) {
      log.error({ inputPath: job.inputPath, exitCode: outcome.exitCode }, 'Encode failed');
      return {
        job,
        success: false,
        interrupted: outcome.interrupted,
        diagnostics: outcome.diagnostics,
        elapsedSeconds: outcome.elapsedSeconds,
      };
    }

    const [inputBytes, outputBytes] = await Promise.all([
      this.fileSize(job.inputPath),
      this.fileSize(job.outputPath),
    ]);

    return {
      job,
      success: true,
      interrupted: false,
      stats: inputBytes !== null && outputBytes !== null
        ? computeJobStats(inputBytes, outputBytes)
        : undefined,
      elapsedSeconds: outcome.elapsedSeconds,
    };
  }
}
