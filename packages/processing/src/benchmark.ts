/**
 * Benchmark Engine
 * 
 * Encodes the same short clip with several presets and ranks them by
 * VMAF, with SSIM, throughput and a full-length size estimate alongside.
 * Crop is skipped on purpose: every preset sees the same frames.
 */

import { EventEmitter } from 'node:events';
import {
  createLogger,
  executeCommand,
  GIB,
  removeFile,
  safeReadFile,
  statSizeOrNull,
  type CommandRunner,
} from '@encodeq/utils';
import { CommandExecutionError, EncodeqError, errorMessage, ProbeError, type Preset } from '@encodeq/core';
import { MediaProber, parseMeanScore, parseVmafLog, primaryVideoStream } from '@encodeq/media';
import {
  createReferenceClipCommand,
  createSampleEncodeCommand,
  createSampleMetricCommand,
  referenceClipPath,
  sampleOutputPath,
} from './commandBuilder.js';
import type { EncodeRunner } from './pipedRunner.js';
import { bitrateKbps, isCopyPreset } from './presets.js';

const log = createLogger({ component: 'benchmark' });

const MIN_REFERENCE_BYTES = 1024 * 1024;
const DEFAULT_FRAME_RATE = 24;

export interface BenchmarkResult {
  preset: Preset;
  /** Frames per second encoded, from the clip length and wall time */
  measuredFps: number;
  vmafScore: number;
  /** Undefined when the engine printed no usable SSIM line */
  ssimScore?: number;
  /** Extrapolated video size plus audio at the preset bitrate */
  estimatedTotalBytes: number;
  elapsedSeconds: number;
}

export interface BenchmarkFiles {
  size(filePath: string): Promise<number | null>;
  read(filePath: string): Promise<string | null>;
  remove(filePath: string): Promise<void>;
}

export interface BenchmarkEngineOptions {
  runner: EncodeRunner;
  prober: MediaProber;
  ffmpegPath?: string;
  run?: CommandRunner;
  sampleSeconds?: number;
  /** Where temporary clips go; defaults to the source's directory */
  workDir?: string;
  files?: BenchmarkFiles;
  now?: () => number;
}

const defaultFiles: BenchmarkFiles = {
  size: statSizeOrNull,
  read: safeReadFile,
  remove: removeFile,
};

/**
 * VMAF points per estimated GiB
 */
export function efficiency(result: BenchmarkResult): number {
  const gib = result.estimatedTotalBytes / GIB;
  return gib > 0 ? result.vmafScore / gib : 0;
}

/**
 * Full-file size from a sample: video scaled by duration, plus audio
 */
export function estimateTotalBytes(
  sampleBytes: number,
  sampleSeconds: number,
  durationSeconds: number,
  audioBitrate: string
): number {
  const video = (sampleBytes / sampleSeconds) * durationSeconds;
  const audio = ((bitrateKbps(audioBitrate) * 1000) / 8) * durationSeconds;
  return video + audio;
}

/**
 * Events:
 * - 'reference' (path) once the reference clip exists
 * - 'preset:start' (preset, position, total)
 * - 'preset:metric' (preset, 'vmaf' | 'ssim')
 * - 'preset:failed' (preset, diagnostics)
 * - 'preset:done' (BenchmarkResult)
 */
export class BenchmarkEngine extends EventEmitter {
  private runner: EncodeRunner;
  private prober: MediaProber;
  private ffmpegPath: string;
  private run: CommandRunner;
  private sampleSeconds: number;
  private workDir?: string;
  private files: BenchmarkFiles;
  private now: () => number;

  constructor(options: BenchmarkEngineOptions) {
    super();
    this.runner = options.runner;
    this.prober = options.prober;
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.run = options.run ?? executeCommand;
    this.sampleSeconds = options.sampleSeconds ?? 45;
    this.workDir = options.workDir;
    this.files = options.files ?? defaultFiles;
    this.now = options.now ?? Date.now;
  }

  /**
   * Benchmark `presets` on a clip from the middle of `file`.
   * Results are sorted by VMAF, best first. Presets whose sample encode
   * or quality measurement fails are left out.
   * 
   * @throws ProbeError when the source cannot be probed
   * @throws EncodeqError when the reference clip cannot be cut, or with
   *   code BENCHMARK_INTERRUPTED when a sample encode is interrupted
   */
  async bench(file: string, presets: readonly Preset[]): Promise<BenchmarkResult[]> {
    const info = await this.prober.inspect(file);
    if (!info) {
      throw new ProbeError(file, 'no metadata');
    }

    const duration = info.durationSeconds;
    const frameRate = primaryVideoStream(info)?.frameRate ?? DEFAULT_FRAME_RATE;
    const reference = referenceClipPath(file, this.workDir);

    await this.cutReference(file, reference, duration / 2);
    this.emit('reference', reference);

    const results: BenchmarkResult[] = [];
    try {
      for (const [i, preset] of presets.entries()) {
        this.emit('preset:start', preset, i + 1, presets.length);
        const result = await this.benchPreset(reference, preset, duration, frameRate);
        if (result) {
          results.push(result);
          this.emit('preset:done', result);
        }
      }
    } finally {
      await this.files.remove(reference);
    }

    return results.sort((a, b) => b.vmafScore - a.vmafScore);
  }

  private async cutReference(file: string, reference: string, start: number): Promise<void> {
    const args = createReferenceClipCommand(file, reference, start, this.sampleSeconds).build();
    const result = await this.run(this.ffmpegPath, args, { timeout: 0 });
    const size = await this.files.size(reference);

    if (size === null || size < MIN_REFERENCE_BYTES) {
      await this.files.remove(reference);
      throw new EncodeqError(
        `Could not create the ${this.sampleSeconds}s reference clip from ${file}`,
        'BENCHMARK_REFERENCE_FAILED',
        { file, exitCode: result.exitCode, size, stderr: result.stderr.substring(0, 1000) }
      );
    }
  }

  private async benchPreset(
    reference: string,
    preset: Preset,
    duration: number,
    frameRate: number
  ): Promise<BenchmarkResult | null> {
    const sample = sampleOutputPath(reference, preset);
    const args = createSampleEncodeCommand(reference, sample, preset).build();

    const startedAt = this.now();
    const outcome = await this.runner.run(args, this.sampleSeconds);
    const elapsedSeconds = (this.now() - startedAt) / 1000;

    try {
      if (outcome.interrupted) {
        log.warn({ preset: preset.name }, 'Benchmark interrupted');
        throw new EncodeqError('Benchmark interrupted', 'BENCHMARK_INTERRUPTED', { preset: preset.name });
      }

      const sampleBytes = outcome.success ? await this.files.size(sample) : null;
      if (!sampleBytes) {
        log.warn({ preset: preset.name, exitCode: outcome.exitCode }, 'Sample encode produced nothing');
        this.emit('preset:failed', preset, outcome.diagnostics);
        return null;
      }

      let vmafScore = 100;
      let ssimScore: number | undefined = 1;
      if (!isCopyPreset(preset)) {
        try {
          vmafScore = await this.measureVmaf(sample, reference, preset);
          ssimScore = await this.measureSsim(sample, reference, preset);
        } catch (error) {
          log.warn({ preset: preset.name, err: error }, 'Quality measurement failed');
          this.emit('preset:failed', preset, errorMessage(error));
          return null;
        }
      }

      return {
        preset,
        measuredFps: elapsedSeconds > 0 ? (this.sampleSeconds * frameRate) / elapsedSeconds : 0,
        vmafScore,
        ssimScore,
        estimatedTotalBytes: estimateTotalBytes(sampleBytes, this.sampleSeconds, duration, preset.audioBitrate),
        elapsedSeconds,
      };
    } finally {
      await this.files.remove(sample);
    }
  }

  private async measureVmaf(sample: string, reference: string, preset: Preset): Promise<number> {
    this.emit('preset:metric', preset, 'vmaf');
    const logPath = sample.replace(/\.mkv$/, '.json');
    const args = createSampleMetricCommand(sample, reference, preset, { kind: 'vmaf', logPath }).build();

    try {
      const result = await this.run(this.ffmpegPath, args, { timeout: 0 });
      const json = await this.files.read(logPath);
      const score = json === null ? undefined : parseVmafLog(json);
      if (score === undefined) {
        if (result.exitCode !== 0) {
          throw new CommandExecutionError(this.ffmpegPath, result.exitCode, result.stderr);
        }
        log.warn({ preset: preset.name, logPath }, 'No VMAF score in log');
      }
      return score ?? 0;
    } finally {
      await this.files.remove(logPath);
    }
  }

  private async measureSsim(sample: string, reference: string, preset: Preset): Promise<number | undefined> {
    this.emit('preset:metric', preset, 'ssim');
    const args = createSampleMetricCommand(sample, reference, preset, { kind: 'ssim' }).build();
    const result = await this.run(this.ffmpegPath, args, { timeout: 0 });
    const score = parseMeanScore(result.stderr);
    if (score === undefined && result.exitCode !== 0) {
      throw new CommandExecutionError(this.ffmpegPath, result.exitCode, result.stderr);
    }
    return score;
  }
}
