import { describe, it, expect } from 'vitest';
import { describeJob, describePlan } from '../planSummary.js';
import { makeJob, preset } from './fixtures.js';

describe('describeJob', () => {
  it('labels each audio track with the action the executor will take', () => {
    expect(describeJob(makeJob())).toEqual([
      'File: Movie.mkv',
      'Video: 4K VideoToolbox (CQ 65) (HDR source)',
      'Crop: crop=3840:1600:0:280',
      'Audio:',
      '  - [ENG] truehd: CONVERT (EAC3 640k)',
      '  - [GER] ac3: SMART COPY (Native AC3/EAC3)',
      'Subtitles:',
      '  - [ENG] subrip: COPY',
      'Output: /encoded/Movie_enc_4K VideoToolbox (CQ 65).mkv',
    ]);
  });

  it('shows the AC3 fallback for codecs the preset cannot pass through', () => {
    const job = makeJob({
      preset: preset('2'),
      audioMode: 'copy',
      isHdr: false,
      crop: undefined,
      selectedAudio: [{ index: 1, language: 'eng', codecName: 'flac', channels: 2 }],
      selectedSubtitles: [],
    });

    expect(describeJob(job).slice(1)).toEqual([
      'Video: 1080p VideoToolbox (CQ 65)',
      'Crop: none',
      'Audio:',
      '  - [ENG] flac: CONVERT (Fallback AC3 256k)',
      'Subtitles:',
      '  - None',
      'Output: /encoded/Movie_enc_4K VideoToolbox (CQ 65).mkv',
    ]);
  });
});

describe('describePlan', () => {
  it('separates jobs with a rule', () => {
    const lines = describePlan([makeJob(), makeJob()]);

    expect(lines.filter(l => l === '---')).toHaveLength(2);
    expect(lines.at(-1)).toBe('---');
  });
});
