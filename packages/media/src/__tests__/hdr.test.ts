import { describe, it, expect } from 'vitest';
import { isHdr } from '../hdr.js';
import type { StreamDescriptor } from '../types.js';

const video = (colorTransfer: string, colorPrimaries: string): StreamDescriptor => ({
  index: 0,
  codecType: 'video',
  codecName: 'hevc',
  language: 'und',
  width: 3840,
  height: 2160,
  colorTransfer,
  colorPrimaries,
});

describe('isHdr', () => {
  it('classifies a PQ transfer as HDR regardless of primaries', () => {
    expect(isHdr([video('smpte2084', 'bt709')])).toBe(true);
  });

  it('classifies BT.2020 primaries as HDR regardless of transfer', () => {
    expect(isHdr([video('bt709', 'bt2020')])).toBe(true);
  });

  it('classifies BT.709 throughout as SDR', () => {
    expect(isHdr([video('bt709', 'bt709')])).toBe(false);
  });

  it('recognises HLG', () => {
    expect(isHdr([video('arib-std-b67', 'bt2020')])).toBe(true);
  });

  it('only looks at the first video stream', () => {
    expect(isHdr([video('bt709', 'bt709'), { ...video('smpte2084', 'bt2020'), index: 3 }])).toBe(false);
  });

  it('is false without a video stream', () => {
    expect(isHdr([{ index: 0, codecType: 'audio', codecName: 'aac', language: 'eng', channels: 2 }])).toBe(false);
  });
});
