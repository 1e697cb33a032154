/**
 * Preset Types
 */

export type PresetType = 'copy' | 'gpu' | 'cpu';

/**
 * A named encoder configuration. `videoOpts` is handed to the engine
 * verbatim; nothing in this codebase interprets individual flags beyond
 * detecting a stream-copy video codec and the 10-bit pixel format.
 */
export interface Preset {
  readonly id: string;
  readonly name: string;
  readonly type: PresetType;
  readonly videoOpts: readonly string[];
  /** Bitrate used when an audio track has to be re-encoded in passthrough mode, e.g. "320k" */
  readonly audioBitrate: string;
  /** Codec names that may be stream-copied in passthrough mode */
  readonly passthrough: readonly string[];
}
