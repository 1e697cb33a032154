/**
 * Video filter chains
 */

import type { CropSpec, Preset } from '@encodeq/core';
import { formatCropFilter } from '@encodeq/media';
import { isCopyPreset, targets1080p, usesTenBit } from './presets.js';

export const TONE_MAP_FILTER = 'zscale';

const DOWNSCALE = 'scale=1920:-2:flags=lanczos';
const TONE_MAP_DOWNSCALE = 'scale=1920:-2,zscale=t=bt709:p=bt709:m=bt709:r=tv';
const TEN_BIT = 'format=p010le';

export interface JobFilterContext {
  isHdr: boolean;
  /** Whether the engine was built with the tone-mapping filter */
  toneMapAvailable: boolean;
}

/**
 * Filters for a full encode: crop first, then scale/format by preset.
 * Copy presets never get a chain since no filter graph runs.
 */
export function buildJobFilterChain(
  preset: Preset,
  crop: CropSpec | undefined,
  context: JobFilterContext
): string[] {
  if (isCopyPreset(preset)) return [];

  const chain: string[] = [];
  if (crop) chain.push(formatCropFilter(crop));

  if (targets1080p(preset)) {
    // HDR into a BT.709 target needs tone mapping; without zscale the
    // colours come out washed but the encode still runs
    chain.push(context.isHdr && context.toneMapAvailable
      ? `${TONE_MAP_DOWNSCALE},${TEN_BIT}`
      : `${DOWNSCALE},${TEN_BIT}`);
  } else if (preset.type === 'gpu') {
    chain.push(TEN_BIT);
  }

  return chain;
}

/**
 * Filters for a benchmark sample: scale and pixel format only, no crop
 */
export function buildSampleFilterChain(preset: Preset): string[] {
  if (isCopyPreset(preset)) return [];

  if (targets1080p(preset)) {
    return [usesTenBit(preset) ? `${DOWNSCALE},${TEN_BIT}` : DOWNSCALE];
  }
  if (preset.type === 'gpu') return [TEN_BIT];
  return [];
}

/**
 * Filters that bring the reference clip to the sample's geometry and
 * depth before comparison; empty when it can be compared as is.
 */
export function buildReferenceChain(preset: Preset): string[] {
  const chain: string[] = [];
  if (usesTenBit(preset)) chain.push('format=yuv420p10le');
  if (targets1080p(preset)) chain.push(DOWNSCALE);
  return chain;
}
