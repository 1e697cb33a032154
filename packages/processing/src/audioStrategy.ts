/**
 * Audio Strategy
 * 
 * Per-track decision table for the three audio modes. The plan summary
 * and the executor both read from here so what is shown is what runs.
 * 
 * | mode           | condition                 | action                 |
 * |----------------|---------------------------|------------------------|
 * | copy           | codec in passthrough      | copy                   |
 * | copy           | otherwise                 | AC3 at preset bitrate  |
 * | smart-surround | codec is AC3/EAC3         | copy                   |
 * | smart-surround | channels <= 2             | copy                   |
 * | smart-surround | otherwise                 | EAC3 640k              |
 * | stereo         | any                       | AAC 256k, 2 channels   |
 */

import type { AudioMode, Preset, TrackSelection } from '@encodeq/core';

export const SURROUND_BITRATE = '640k';
export const STEREO_BITRATE = '256k';

const DOLBY_CODECS: readonly string[] = ['ac3', 'eac3'];

export type CopyReason = 'passthrough' | 'native-dolby' | 'stereo-source';

export type AudioAction =
  | { readonly kind: 'copy'; readonly reason: CopyReason }
  | {
      readonly kind: 'transcode';
      readonly codec: 'ac3' | 'eac3' | 'aac';
      readonly bitrate: string;
      /** Forced down-mix */
      readonly channels?: number;
    };

type AudioTrack = Pick<TrackSelection, 'codecName' | 'channels'>;

export function resolveAudioAction(
  mode: AudioMode,
  track: AudioTrack,
  preset: Pick<Preset, 'passthrough' | 'audioBitrate'>
): AudioAction {
  const codec = track.codecName.toLowerCase();

  switch (mode) {
    case 'copy':
      if (preset.passthrough.includes(codec)) {
        return { kind: 'copy', reason: 'passthrough' };
      }
      return { kind: 'transcode', codec: 'ac3', bitrate: preset.audioBitrate };

    case 'smart-surround':
      if (DOLBY_CODECS.includes(codec)) {
        return { kind: 'copy', reason: 'native-dolby' };
      }
      // Stereo and mono gain nothing from a multichannel format
      if (track.channels <= 2) {
        return { kind: 'copy', reason: 'stereo-source' };
      }
      return { kind: 'transcode', codec: 'eac3', bitrate: SURROUND_BITRATE };

    case 'stereo':
      return { kind: 'transcode', codec: 'aac', bitrate: STEREO_BITRATE, channels: 2 };
  }
}

const COPY_LABELS: Record<CopyReason, string> = {
  'passthrough': 'COPY',
  'native-dolby': 'SMART COPY (Native AC3/EAC3)',
  'stereo-source': 'SMART COPY (Stereo source)',
};

/**
 * Label shown in the encoding plan
 */
export function describeAudioAction(action: AudioAction): string {
  if (action.kind === 'copy') return COPY_LABELS[action.reason];

  switch (action.codec) {
    case 'ac3':
      return `CONVERT (Fallback AC3 ${action.bitrate})`;
    case 'eac3':
      return `CONVERT (EAC3 ${action.bitrate})`;
    case 'aac':
      return 'CONVERT (AAC 2.0)';
  }
}

/**
 * Codec arguments for output audio stream `outputIndex`
 */
export function audioCodecArgs(action: AudioAction, outputIndex: number): string[] {
  if (action.kind === 'copy') {
    return [`-c:a:${outputIndex}`, 'copy'];
  }

  const args = [`-c:a:${outputIndex}`, action.codec, `-b:a:${outputIndex}`, action.bitrate];
  if (action.channels !== undefined) {
    args.push(`-ac:a:${outputIndex}`, String(action.channels));
  }
  return args;
}
