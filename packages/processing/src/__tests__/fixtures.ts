import type { Job, Preset, TrackSelection } from '@encodeq/core';
import { PresetCatalog } from '../presets.js';

const catalog = new PresetCatalog();

export function preset(id: string): Preset {
  const found = catalog.get(id);
  if (!found) throw new Error(`no preset ${id}`);
  return found;
}

export const TRUEHD_71: TrackSelection = { index: 1, language: 'eng', codecName: 'truehd', channels: 8 };
export const AAC_STEREO: TrackSelection = { index: 2, language: 'eng', codecName: 'aac', channels: 2 };
export const ENG_SUBS: TrackSelection = { index: 4, language: 'eng', codecName: 'subrip', channels: 2 };

export function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    inputPath: '/films/Movie.mkv',
    outputPath: '/encoded/Movie_enc_4K VideoToolbox (CQ 65).mkv',
    durationSeconds: 6000,
    isHdr: true,
    crop: { width: 3840, height: 1600, x: 0, y: 280 },
    selectedAudio: [TRUEHD_71, AAC_STEREO],
    selectedSubtitles: [ENG_SUBS],
    audioMode: 'smart-surround',
    preset: preset('1'),
    ...overrides,
  };
}
