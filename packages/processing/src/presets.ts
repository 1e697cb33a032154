/**
 * Encoding Presets
 * 
 * A preset is opaque encoder configuration: its video options are passed
 * to ffmpeg verbatim. The catalog is built once at startup and handed to
 * whoever needs it; nothing mutates it afterwards.
 */

import { z } from 'zod';
import { safeReadFile, createLogger } from '@encodeq/utils';
import { ValidationError, type Preset } from '@encodeq/core';

const log = createLogger({ component: 'presets' });

const FULL_PASSTHROUGH = ['aac', 'ac3', 'eac3', 'dtshd', 'dts', 'mp3', 'opus', 'truehd', 'flac'];

const HDR10_COLOR = [
  '-color_range', 'tv',
  '-color_primaries', 'bt2020',
  '-color_trc', 'smpte2084',
  '-colorspace', 'bt2020nc',
];

export const DEFAULT_PRESETS: readonly Preset[] = [
  {
    id: '0',
    name: 'Remux (Video Copy - Audio-Sub Only)',
    type: 'copy',
    videoOpts: ['-c:v', 'copy'],
    audioBitrate: '320k',
    passthrough: FULL_PASSTHROUGH,
  },
  {
    id: '1',
    name: '4K VideoToolbox (CQ 65)',
    type: 'gpu',
    videoOpts: [
      '-c:v', 'hevc_videotoolbox',
      '-profile:v', 'main10',
      '-pix_fmt', 'p010le',
      '-fps_mode', 'vfr',
      ...HDR10_COLOR,
      '-q:v', '65',
    ],
    audioBitrate: '320k',
    passthrough: FULL_PASSTHROUGH,
  },
  {
    id: '2',
    name: '1080p VideoToolbox (CQ 65)',
    type: 'gpu',
    videoOpts: [
      '-c:v', 'hevc_videotoolbox',
      '-profile:v', 'main10',
      '-pix_fmt', 'p010le',
      '-fps_mode', 'vfr',
      '-color_range', 'tv',
      '-color_primaries', 'bt709',
      '-color_trc', 'bt709',
      '-colorspace', 'bt709',
      '-q:v', '65',
    ],
    audioBitrate: '256k',
    passthrough: ['aac', 'ac3', 'eac3', 'dtshd', 'dts', 'mp3', 'truehd'],
  },
  {
    id: '3',
    name: '4K CPU x265 (Medium - CRF 18)',
    type: 'cpu',
    videoOpts: [
      '-c:v', 'libx265',
      '-preset', 'medium',
      '-crf', '18',
      '-profile:v', 'main10',
      '-pix_fmt', 'yuv420p10le',
      '-x265-params', 'sao=0:aq-mode=2:hdr10_opt=1:repeat-headers=1',
      ...HDR10_COLOR,
      '-tag:v', 'hvc1',
    ],
    audioBitrate: '320k',
    passthrough: FULL_PASSTHROUGH,
  },
  {
    id: '4',
    name: '4K High Bitrate VBR (24Mbps)',
    type: 'gpu',
    videoOpts: [
      '-c:v', 'hevc_videotoolbox',
      '-profile:v', 'main10',
      '-pix_fmt', 'p010le',
      '-fps_mode', 'vfr',
      ...HDR10_COLOR,
      '-tag:v', 'hvc1',
      '-b:v', '24000k',
      '-maxrate', '35000k',
      '-bufsize', '35000k',
    ],
    audioBitrate: '320k',
    passthrough: FULL_PASSTHROUGH,
  },
];

/**
 * On-disk shape of a preset, shared by preset files and queue files
 */
export const presetRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  type: z.enum(['copy', 'gpu', 'cpu']),
  video_opts: z.array(z.string()),
  audio_bitrate: z.string().regex(/^\d+k$/, 'expected a bitrate such as "320k"'),
  passthrough: z.array(z.string()),
});

export type PresetRecord = z.infer<typeof presetRecordSchema>;

export function presetFromRecord(record: PresetRecord): Preset {
  return {
    id: record.id,
    name: record.name,
    type: record.type,
    videoOpts: record.video_opts,
    audioBitrate: record.audio_bitrate,
    passthrough: record.passthrough,
  };
}

export function presetToRecord(preset: Preset): PresetRecord {
  return {
    id: preset.id,
    name: preset.name,
    type: preset.type,
    video_opts: [...preset.videoOpts],
    audio_bitrate: preset.audioBitrate,
    passthrough: [...preset.passthrough],
  };
}

function freezePreset(preset: Preset): Preset {
  return Object.freeze({
    ...preset,
    videoOpts: Object.freeze([...preset.videoOpts]),
    passthrough: Object.freeze([...preset.passthrough]),
  });
}

/**
 * Read-only registry of presets keyed by id, in catalog order
 */
export class PresetCatalog {
  private readonly presets: ReadonlyMap<string, Preset>;

  constructor(presets: readonly Preset[] = DEFAULT_PRESETS) {
    const entries = new Map<string, Preset>();
    for (const preset of presets) {
      if (entries.has(preset.id)) {
        throw new ValidationError('presets', `duplicate preset id "${preset.id}"`);
      }
      entries.set(preset.id, freezePreset(preset));
    }
    this.presets = entries;
  }

  get(id: string): Preset | undefined {
    return this.presets.get(id.trim());
  }

  list(): readonly Preset[] {
    return [...this.presets.values()];
  }

  get size(): number {
    return this.presets.size;
  }
}

/**
 * Build the catalog, from a JSON file of preset records when one is given.
 * 
 * @throws ValidationError when the file is missing or malformed
 */
export async function loadPresetCatalog(filePath?: string): Promise<PresetCatalog> {
  if (!filePath) return new PresetCatalog();

  const content = await safeReadFile(filePath);
  if (content === null) {
    throw new ValidationError('presets', `cannot read ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ValidationError('presets', `${filePath} is not valid JSON`);
  }

  const parsed = z.array(presetRecordSchema).min(1).safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError('presets', `${issue?.path.join('.') ?? ''} ${issue?.message ?? 'invalid preset file'}`.trim());
  }

  log.info({ filePath, count: parsed.data.length }, 'Loaded preset catalog');
  return new PresetCatalog(parsed.data.map(presetFromRecord));
}

/**
 * Pure stream copy: the video is not re-encoded, so no filter graph runs.
 */
export function isCopyPreset(preset: Preset): boolean {
  if (preset.type === 'copy') return true;
  const codecAt = preset.videoOpts.indexOf('-c:v');
  return codecAt >= 0 && preset.videoOpts[codecAt + 1] === 'copy';
}

/**
 * Presets that downscale to 1920 wide
 */
export function targets1080p(preset: Preset): boolean {
  return preset.name.includes('1080p') || preset.videoOpts.some(opt => opt.includes('1080p'));
}

export function usesTenBit(preset: Preset): boolean {
  return preset.videoOpts.includes('p010le');
}

export function vmafModelFor(preset: Preset): string {
  return preset.name.includes('4K') ? 'vmaf_4k_v0.6.1' : 'vmaf_v0.6.1';
}

/**
 * Numeric kbps of an "NNNk" bitrate; 320 when unparseable
 */
export function bitrateKbps(bitrate: string): number {
  const kbps = parseInt(bitrate.replace(/k$/i, ''), 10);
  return Number.isFinite(kbps) && kbps > 0 ? kbps : 320;
}
