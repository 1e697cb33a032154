/**
 * Job Types
 */

import type { Preset } from './preset.js';

/**
 * Rectangle kept from each frame: `width:height` at offset `x:y`.
 */
export interface CropSpec {
  readonly width: number;
  readonly height: number;
  readonly x: number;
  readonly y: number;
}

/**
 * A chosen input track, addressed by its absolute stream index in the container.
 */
export interface TrackSelection {
  readonly index: number;
  readonly language: string;
  readonly codecName: string;
  readonly channels: number;
}

export const AUDIO_MODES = ['copy', 'smart-surround', 'stereo'] as const;

/**
 * - copy: passthrough, AC3 fallback for codecs the preset cannot carry
 * - smart-surround: EAC3 for multichannel sources that aren't already Dolby
 * - stereo: AAC 2.0 down-mix
 */
export type AudioMode = (typeof AUDIO_MODES)[number];

export interface Job {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly durationSeconds: number;
  readonly isHdr: boolean;
  readonly crop?: CropSpec;
  readonly selectedAudio: readonly TrackSelection[];
  readonly selectedSubtitles: readonly TrackSelection[];
  readonly audioMode: AudioMode;
  readonly preset: Preset;
}

/**
 * Freeze a job (and its nested records) so later stages cannot alter it.
 */
export function freezeJob(job: Job): Job {
  return Object.freeze({
    ...job,
    crop: job.crop ? Object.freeze({ ...job.crop }) : undefined,
    selectedAudio: Object.freeze(job.selectedAudio.map(t => Object.freeze({ ...t }))),
    selectedSubtitles: Object.freeze(job.selectedSubtitles.map(t => Object.freeze({ ...t }))),
  });
}
