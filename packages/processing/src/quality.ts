/**
 * Quality Analyzer
 * 
 * Stand-alone VMAF or SSIM comparison of an encode against its source.
 */

import { basename, dirname, extname, join } from 'node:path';
import { createLogger, executeCommand, safeReadFile, type CommandRunner } from '@encodeq/utils';
import type { CropSpec } from '@encodeq/core';
import {
  frameSizeOf,
  MediaProber,
  parseMeanScore,
  parseVmafLog,
  qualityVerdict,
  verdictNote,
  type FrameSize,
  type QualityMetric,
  type QualityVerdict,
} from '@encodeq/media';
import { createQualityCommand } from './commandBuilder.js';

const log = createLogger({ component: 'quality' });

export const VMAF_MODELS = {
  '4k': 'vmaf_4k_v0.6.1',
  hd: 'vmaf_v0.6.1',
} as const;

export interface CompareOptions {
  metric: QualityMetric;
  /** VMAF model version */
  model?: string;
  /** Centre-crop a larger reference down to the distorted size */
  autoCrop?: boolean;
}

export interface QualityReport {
  metric: QualityMetric;
  /** Undefined when the engine produced no readable score */
  score?: number;
  verdict?: QualityVerdict;
  note?: string;
  /** JSON log (VMAF) or per-frame stats file (SSIM) */
  reportPath: string;
  referenceCrop?: CropSpec;
  exitCode: number;
}

/**
 * Centred crop of `reference` to `distorted` when the reference is larger
 * in at least one dimension and smaller in neither
 */
export function alignmentCrop(reference: FrameSize, distorted: FrameSize): CropSpec | undefined {
  const larger = reference.width > distorted.width || reference.height > distorted.height;
  const fits = reference.width >= distorted.width && reference.height >= distorted.height;
  if (!larger || !fits) return undefined;

  return {
    width: distorted.width,
    height: distorted.height,
    x: Math.floor((reference.width - distorted.width) / 2),
    y: Math.floor((reference.height - distorted.height) / 2),
  };
}

export interface QualityAnalyzerOptions {
  prober: MediaProber;
  ffmpegPath?: string;
  run?: CommandRunner;
  readFile?: (filePath: string) => Promise<string | null>;
}

export class QualityAnalyzer {
  private prober: MediaProber;
  private ffmpegPath: string;
  private run: CommandRunner;
  private readFile: (filePath: string) => Promise<string | null>;

  constructor(options: QualityAnalyzerOptions) {
    this.prober = options.prober;
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.run = options.run ?? executeCommand;
    this.readFile = options.readFile ?? safeReadFile;
  }

  async compare(reference: string, distorted: string, options: CompareOptions): Promise<QualityReport> {
    const referenceCrop = options.autoCrop === false
      ? undefined
      : await this.findAlignmentCrop(reference, distorted);

    const dir = dirname(distorted);
    const stem = basename(distorted, extname(distorted));
    const reportPath = options.metric === 'vmaf'
      ? join(dir, `vmaf_report_${stem}.json`)
      : join(dir, `quality_log_${stem}.txt`);

    const command = options.metric === 'vmaf'
      ? createQualityCommand(reference, distorted, {
          kind: 'vmaf',
          model: options.model ?? VMAF_MODELS.hd,
          logPath: reportPath,
        }, referenceCrop)
      : createQualityCommand(reference, distorted, { kind: 'ssim', statsPath: reportPath }, referenceCrop);

    log.info({ reference, distorted, metric: options.metric, referenceCrop }, 'Starting quality analysis');
    const result = await this.run(this.ffmpegPath, command.build(), { timeout: 0 });

    let score: number | undefined;
    if (options.metric === 'vmaf') {
      const json = await this.readFile(reportPath);
      score = json === null ? undefined : parseVmafLog(json);
    } else {
      score = parseMeanScore(result.stderr);
    }

    if (score === undefined) {
      log.warn({ exitCode: result.exitCode }, 'No score in engine output');
    }

    return {
      metric: options.metric,
      score,
      verdict: score === undefined ? undefined : qualityVerdict(score, options.metric),
      note: score === undefined ? undefined : verdictNote(score, options.metric),
      reportPath,
      referenceCrop,
      exitCode: result.exitCode,
    };
  }

  private async findAlignmentCrop(reference: string, distorted: string): Promise<CropSpec | undefined> {
    const [refInfo, distInfo] = await Promise.all([
      this.prober.inspect(reference),
      this.prober.inspect(distorted),
    ]);
    const refSize = refInfo ? frameSizeOf(refInfo) : undefined;
    const distSize = distInfo ? frameSizeOf(distInfo) : undefined;
    if (!refSize || !distSize) return undefined;

    return alignmentCrop(refSize, distSize);
  }
}
