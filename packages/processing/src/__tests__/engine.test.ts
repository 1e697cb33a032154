import { describe, it, expect, vi } from 'vitest';
import type { CommandRunner } from '@encodeq/utils';
import { hasFilter } from '../engine.js';

const FILTER_LIST = [
  'Filters:',
  '  T.. = Timeline support',
  ' ------',
  ' ... cropdetect         V->V       Auto-detect crop size.',
  ' ... zscale             V->V       Apply resizing, colorspace and bit depth conversion.',
  ' ... libvmaf            VV->V      Calculate the VMAF between two video streams.',
].join('\n');

describe('hasFilter', () => {
  it('finds a filter by its exact name', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({
      exitCode: 0, stdout: FILTER_LIST, stderr: '', duration: 3, timedOut: false,
    });

    await expect(hasFilter('zscale', '/opt/ffmpeg', run)).resolves.toBe(true);
    expect(run).toHaveBeenCalledWith('/opt/ffmpeg', ['-hide_banner', '-filters'], { timeout: 10000 });
  });

  it('does not match on a prefix or description', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({
      exitCode: 0, stdout: FILTER_LIST, stderr: '', duration: 3, timedOut: false,
    });

    await expect(hasFilter('scale', 'ffmpeg', run)).resolves.toBe(false);
    await expect(hasFilter('VMAF', 'ffmpeg', run)).resolves.toBe(false);
  });

  it('treats a failed query as unavailable', async () => {
    const run = vi.fn<CommandRunner>().mockRejectedValue(new Error('spawn ffmpeg ENOENT'));

    await expect(hasFilter('zscale', 'ffmpeg', run)).resolves.toBe(false);
  });
});
