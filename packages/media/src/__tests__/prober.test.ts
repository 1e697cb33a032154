import { describe, it, expect, vi } from 'vitest';
import type { CommandRunner } from '@encodeq/utils';
import { ProbeError } from '@encodeq/core';
import { FFProbe } from '../probes/ffprobe.js';
import { MediaProber, parseFrameRate } from '../prober.js';
import { frameSizeOf, primaryVideoStream } from '../types.js';

const PROBE_OUTPUT = JSON.stringify({
  streams: [
    {
      index: 0,
      codec_name: 'hevc',
      codec_type: 'video',
      width: 3840,
      height: 2160,
      color_transfer: 'smpte2084',
      color_primaries: 'bt2020',
      avg_frame_rate: '24000/1001',
      r_frame_rate: '24000/1001',
    },
    { index: 1, codec_name: 'truehd', codec_type: 'audio', channels: 8, tags: { language: 'ENG', title: 'Atmos' } },
    { index: 2, codec_name: 'ac3', codec_type: 'audio', channels: 6 },
    { index: 3, codec_name: 'subrip', codec_type: 'subtitle', tags: { language: 'ger', title: '' } },
  ],
  format: { duration: '7265.480000' },
});

const ok = (stdout: string) => ({ exitCode: 0, stdout, stderr: '', duration: 5, timedOut: false });

describe('FFProbe', () => {
  it('asks for streams and container duration as JSON', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(ok(PROBE_OUTPUT));

    await new FFProbe('/opt/bin/ffprobe', run).probe('/films/movie.mkv');

    expect(run).toHaveBeenCalledWith(
      '/opt/bin/ffprobe',
      ['-v', 'quiet', '-print_format', 'json', '-show_streams', '-show_entries', 'format=duration', '/films/movie.mkv'],
      { timeout: 60000 }
    );
  });

  it('throws ProbeError on a non-zero exit', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({ ...ok(''), exitCode: 1 });

    await expect(new FFProbe('ffprobe', run).probe('/films/missing.mkv')).rejects.toBeInstanceOf(ProbeError);
  });

  it('throws ProbeError on output that is not JSON', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(ok('not json'));

    await expect(new FFProbe('ffprobe', run).probe('/films/movie.mkv')).rejects.toThrow('unparseable ffprobe output');
  });
});

describe('MediaProber', () => {
  it('builds read-only stream descriptors', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(ok(PROBE_OUTPUT));
    const info = await new MediaProber(new FFProbe('ffprobe', run)).inspect('/films/movie.mkv');

    expect(info?.durationSeconds).toBeCloseTo(7265.48);
    expect(info?.streams).toHaveLength(4);
    expect(info?.streams[1]).toEqual({
      index: 1,
      codecType: 'audio',
      codecName: 'truehd',
      channels: 8,
      language: 'eng',
      title: 'Atmos',
      width: undefined,
      height: undefined,
      colorTransfer: undefined,
      colorPrimaries: undefined,
      frameRate: undefined,
    });
    expect(info?.streams[2]?.language).toBe('und');
    expect(info?.streams[3]?.title).toBeUndefined();
    expect(Object.isFrozen(info?.streams[0])).toBe(true);
  });

  it('exposes the first video stream and its frame size', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(ok(PROBE_OUTPUT));
    const info = await new MediaProber(new FFProbe('ffprobe', run)).inspect('/films/movie.mkv');
    if (!info) throw new Error('expected media info');

    expect(primaryVideoStream(info)?.frameRate).toBeCloseTo(23.976, 3);
    expect(frameSizeOf(info)).toEqual({ width: 3840, height: 2160 });
  });

  it('reports a failed probe as no metadata', async () => {
    const run = vi.fn<CommandRunner>().mockRejectedValue(new Error('spawn ffprobe ENOENT'));

    await expect(new MediaProber(new FFProbe('ffprobe', run)).inspect('/films/movie.mkv')).resolves.toBeNull();
  });
});

describe('parseFrameRate', () => {
  it('reads rationals and plain numbers', () => {
    expect(parseFrameRate('25/1')).toBe(25);
    expect(parseFrameRate('50')).toBe(50);
  });

  it('rejects empty and zero rates', () => {
    expect(parseFrameRate(undefined)).toBeUndefined();
    expect(parseFrameRate('0/0')).toBeUndefined();
  });
});
