/**
 * Media Prober
 * 
 * Turns ffprobe output into StreamDescriptors. A probe failure is
 * reported as "no metadata" (null) so batch callers can skip the file.
 */

import { createLogger } from '@encodeq/utils';
import { FFProbe, type FFProbeResult, type FFProbeStream } from './probes/ffprobe.js';
import type { CodecType, MediaInfo, StreamDescriptor } from './types.js';

const log = createLogger({ component: 'prober' });

const CODEC_TYPES: readonly CodecType[] = ['video', 'audio', 'subtitle', 'data', 'attachment'];

function toCodecType(value: string | undefined): CodecType {
  return CODEC_TYPES.find(t => t === value) ?? 'data';
}

/**
 * Parse an ffprobe rational ("24000/1001") or plain number
 */
export function parseFrameRate(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const [num, den] = value.split('/');
  const numerator = Number(num);
  const denominator = den === undefined ? 1 : Number(den);
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0 || numerator <= 0) {
    return undefined;
  }
  return numerator / denominator;
}

function toDescriptor(stream: FFProbeStream): StreamDescriptor {
  const codecType = toCodecType(stream.codec_type);
  const tags = stream.tags ?? {};
  const title = tags['title'];

  return Object.freeze({
    index: stream.index,
    codecType,
    codecName: stream.codec_name ?? 'unknown',
    channels: codecType === 'audio' ? stream.channels : undefined,
    language: (tags['language'] ?? 'und').toLowerCase(),
    title: title && title.trim() !== '' ? title : undefined,
    width: codecType === 'video' ? stream.width : undefined,
    height: codecType === 'video' ? stream.height : undefined,
    colorTransfer: stream.color_transfer?.toLowerCase(),
    colorPrimaries: stream.color_primaries?.toLowerCase(),
    frameRate: codecType === 'video'
      ? parseFrameRate(stream.avg_frame_rate) ?? parseFrameRate(stream.r_frame_rate)
      : undefined,
  });
}

/**
 * Build a MediaInfo from a raw probe result
 */
export function toMediaInfo(filePath: string, result: FFProbeResult): MediaInfo {
  const duration = Number(result.format?.duration ?? 0);

  return Object.freeze({
    filePath,
    durationSeconds: Number.isFinite(duration) && duration > 0 ? duration : 0,
    streams: Object.freeze(result.streams.map(toDescriptor)),
  });
}

export class MediaProber {
  private ffprobe: FFProbe;

  constructor(ffprobe: FFProbe = new FFProbe()) {
    this.ffprobe = ffprobe;
  }

  /**
   * Read stream metadata and duration, or null when the file cannot be probed
   */
  async inspect(filePath: string): Promise<MediaInfo | null> {
    try {
      const result = await this.ffprobe.probe(filePath);
      return toMediaInfo(filePath, result);
    } catch (error) {
      log.warn({ filePath, err: error }, 'Probe failed');
      return null;
    }
  }
}
