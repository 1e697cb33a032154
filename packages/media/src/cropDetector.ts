/**
 * Crop Detector
 * 
 * Finds letterbox bars by running ffmpeg's cropdetect filter at three
 * points of the file and taking the most common geometry. Only
 * full-width, top/bottom crops are trusted; anything else is noise from
 * dark scenes or logos.
 */

import { executeCommand, createLogger, type CommandRunner } from '@encodeq/utils';
import { ValidationError, type CropSpec } from '@encodeq/core';
import type { FrameSize } from './types.js';

const log = createLogger({ component: 'crop-detector' });

const CROP_PATTERN = /crop=(\d+):(\d+):(\d+):(\d+)/g;

export interface CropDetectorOptions {
  ffmpegPath?: string;
  run?: CommandRunner;
  /** Fractions of the duration to sample at */
  samplePoints?: readonly number[];
  /** Frames decoded per sample point, including the skipped ones */
  framesPerSample?: number;
  /** Leading frames ignored while cropdetect settles */
  skipFrames?: number;
  /** Minimum height difference (px) for a crop to count */
  noiseThreshold?: number;
}

/**
 * Pull every `crop=W:H:X:Y` from cropdetect's stderr, keeping only
 * full-width crops at x=0 that remove more than `noiseThreshold` rows.
 */
export function parseCropObservations(
  stderr: string,
  frame: FrameSize,
  noiseThreshold: number = 10
): CropSpec[] {
  const observations: CropSpec[] = [];

  for (const match of stderr.matchAll(CROP_PATTERN)) {
    const [width, height, x, y] = match.slice(1, 5).map(v => parseInt(v ?? '', 10));
    if (width === undefined || height === undefined || x === undefined || y === undefined) continue;
    if (width !== frame.width || x !== 0) continue;
    if (Math.abs(frame.height - height) <= noiseThreshold) continue;
    observations.push({ width, height, x, y });
  }

  return observations;
}

/**
 * The single most frequent value, or undefined when the input is empty
 * or two values tie for most frequent.
 */
export function statisticalMode(values: readonly number[]): number | undefined {
  const counts = new Map<number, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best: number | undefined;
  let bestCount = 0;
  let tied = false;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
      tied = false;
    } else if (count === bestCount) {
      tied = true;
    }
  }

  return tied ? undefined : best;
}

/**
 * Mode of heights, then mode of y-offsets among crops with that height.
 * Falls back to the most recent observation when either mode is undefined.
 */
export function consolidateCrops(observations: readonly CropSpec[]): CropSpec | undefined {
  const last = observations[observations.length - 1];
  if (!last) return undefined;

  const height = statisticalMode(observations.map(c => c.height));
  if (height === undefined) return { ...last };

  const y = statisticalMode(observations.filter(c => c.height === height).map(c => c.y));
  if (y === undefined) return { ...last };

  return { width: last.width, height, x: 0, y };
}

export function formatCropFilter(crop: CropSpec): string {
  return `crop=${crop.width}:${crop.height}:${crop.x}:${crop.y}`;
}

/**
 * Parse a crop typed by the user: "W:H:X:Y" or "crop=W:H:X:Y".
 * 
 * @throws ValidationError on malformed input or a rectangle outside the frame
 */
export function parseCropSpec(text: string, frame?: FrameSize): CropSpec {
  const trimmed = text.trim().replace(/^crop=/, '');
  const match = trimmed.match(/^(\d+):(\d+):(\d+):(\d+)$/);
  if (!match) {
    throw new ValidationError('crop', `expected W:H:X:Y, got "${text.trim()}"`);
  }

  const [width, height, x, y] = match.slice(1, 5).map(v => parseInt(v ?? '0', 10));
  const crop: CropSpec = { width: width ?? 0, height: height ?? 0, x: x ?? 0, y: y ?? 0 };

  if (crop.width === 0 || crop.height === 0) {
    throw new ValidationError('crop', 'width and height must be positive');
  }
  if (frame && (crop.width + crop.x > frame.width || crop.height + crop.y > frame.height)) {
    throw new ValidationError(
      'crop',
      `${formatCropFilter(crop)} does not fit a ${frame.width}x${frame.height} frame`
    );
  }
  return crop;
}

export class CropDetector {
  private ffmpegPath: string;
  private run: CommandRunner;
  private samplePoints: readonly number[];
  private framesPerSample: number;
  private skipFrames: number;
  private noiseThreshold: number;

  constructor(options: CropDetectorOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.run = options.run ?? executeCommand;
    this.samplePoints = options.samplePoints ?? [0.2, 0.5, 0.75];
    this.framesPerSample = options.framesPerSample ?? 40;
    this.skipFrames = options.skipFrames ?? 20;
    this.noiseThreshold = options.noiseThreshold ?? 10;
  }

  /**
   * Detect letterboxing. Undefined means "use the full frame", including
   * when the source size is unknown or no sample produced a usable crop.
   */
  async detect(
    inputPath: string,
    durationSeconds: number,
    frame: FrameSize | undefined
  ): Promise<CropSpec | undefined> {
    if (!frame || frame.width === 0 || frame.height === 0) {
      log.debug({ inputPath }, 'No video dimensions, skipping crop detection');
      return undefined;
    }

    const observations: CropSpec[] = [];

    for (const point of this.samplePoints) {
      const timestamp = durationSeconds * point;
      const stderr = await this.sample(inputPath, timestamp);
      observations.push(...parseCropObservations(stderr, frame, this.noiseThreshold));
    }

    const crop = consolidateCrops(observations);
    log.debug({ inputPath, observations: observations.length, crop }, 'Crop detection finished');
    return crop;
  }

  /**
   * Build the cropdetect invocation for one sample point
   */
  buildSampleArgs(inputPath: string, timestamp: number): string[] {
    return [
      '-hide_banner', '-y',
      '-ss', timestamp.toFixed(3),
      '-i', inputPath,
      '-frames:v', String(this.framesPerSample),
      '-vf', `select=gte(n\\,${this.skipFrames}),cropdetect=0.1:2:0`,
      '-f', 'null', '-',
    ];
  }

  private async sample(inputPath: string, timestamp: number): Promise<string> {
    try {
      const result = await this.run(this.ffmpegPath, this.buildSampleArgs(inputPath, timestamp), {
        timeout: 120000,
      });
      if (result.exitCode !== 0) {
        log.debug({ inputPath, timestamp, exitCode: result.exitCode }, 'cropdetect sample exited non-zero');
      }
      return result.stderr;
    } catch (error) {
      log.warn({ inputPath, timestamp, err: error }, 'cropdetect sample could not run');
      return '';
    }
  }
}
