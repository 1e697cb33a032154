/**
 * Media Types
 */

export type CodecType = 'video' | 'audio' | 'subtitle' | 'data' | 'attachment';

/**
 * Read-only view of one elementary stream. `index` is the absolute
 * stream index assigned by the container and is what `-map 0:<index>` takes.
 */
export interface StreamDescriptor {
  readonly index: number;
  readonly codecType: CodecType;
  readonly codecName: string;
  /** Audio only */
  readonly channels?: number;
  /** Lower-cased ISO 639 tag, "und" when untagged */
  readonly language: string;
  readonly title?: string;
  /** Video only */
  readonly width?: number;
  readonly height?: number;
  readonly colorTransfer?: string;
  readonly colorPrimaries?: string;
  /** Average frame rate, video only */
  readonly frameRate?: number;
}

export interface MediaInfo {
  readonly filePath: string;
  /** Container duration; 0 when the container does not report one */
  readonly durationSeconds: number;
  readonly streams: readonly StreamDescriptor[];
}

export interface FrameSize {
  readonly width: number;
  readonly height: number;
}

/**
 * First video stream, the one every decision in this program is based on
 */
export function primaryVideoStream(info: MediaInfo): StreamDescriptor | undefined {
  return info.streams.find(s => s.codecType === 'video');
}

export function frameSizeOf(info: MediaInfo): FrameSize | undefined {
  const video = primaryVideoStream(info);
  if (!video?.width || !video.height) return undefined;
  return { width: video.width, height: video.height };
}
