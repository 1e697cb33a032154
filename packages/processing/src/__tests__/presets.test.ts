import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ValidationError } from '@encodeq/core';
import {
  bitrateKbps,
  isCopyPreset,
  loadPresetCatalog,
  PresetCatalog,
  presetFromRecord,
  presetToRecord,
  targets1080p,
  usesTenBit,
  vmafModelFor,
} from '../presets.js';
import { preset } from './fixtures.js';

describe('PresetCatalog', () => {
  it('lists the built-in presets in id order', () => {
    const catalog = new PresetCatalog();

    expect(catalog.size).toBe(5);
    expect(catalog.list().map(p => p.id)).toEqual(['0', '1', '2', '3', '4']);
    expect(catalog.get(' 3 ')?.name).toBe('4K CPU x265 (Medium - CRF 18)');
    expect(catalog.get('9')).toBeUndefined();
  });

  it('hands out frozen presets', () => {
    const hd = preset('2');

    expect(Object.isFrozen(hd)).toBe(true);
    expect(Object.isFrozen(hd.videoOpts)).toBe(true);
    expect(Object.isFrozen(hd.passthrough)).toBe(true);
  });

  it('rejects duplicate ids', () => {
    const remux = preset('0');
    expect(() => new PresetCatalog([remux, remux])).toThrow(ValidationError);
  });
});

describe('preset classification', () => {
  it('recognises pure stream copy', () => {
    expect(isCopyPreset(preset('0'))).toBe(true);
    expect(isCopyPreset(preset('1'))).toBe(false);
    expect(isCopyPreset({ ...preset('3'), type: 'cpu', videoOpts: ['-c:v', 'copy'] })).toBe(true);
  });

  it('recognises 1080p targets and 10-bit GPU output', () => {
    expect(targets1080p(preset('2'))).toBe(true);
    expect(targets1080p(preset('1'))).toBe(false);
    expect(usesTenBit(preset('1'))).toBe(true);
    expect(usesTenBit(preset('3'))).toBe(false);
  });

  it('picks the VMAF model by name', () => {
    expect(vmafModelFor(preset('4'))).toBe('vmaf_4k_v0.6.1');
    expect(vmafModelFor(preset('2'))).toBe('vmaf_v0.6.1');
  });

  it('reads kbps from a bitrate string', () => {
    expect(bitrateKbps('256k')).toBe(256);
    expect(bitrateKbps('loud')).toBe(320);
  });
});

describe('loadPresetCatalog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'encodeq-presets-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the built-in catalog without a file', async () => {
    expect((await loadPresetCatalog()).size).toBe(5);
  });

  it('loads preset records from JSON', async () => {
    const file = join(dir, 'presets.json');
    await writeFile(file, JSON.stringify([
      {
        id: 'av1',
        name: 'AV1 SVT (CRF 30)',
        type: 'cpu',
        video_opts: ['-c:v', 'libsvtav1', '-crf', '30'],
        audio_bitrate: '192k',
        passthrough: ['opus'],
      },
    ]));

    const catalog = await loadPresetCatalog(file);

    expect(catalog.list()).toEqual([{
      id: 'av1',
      name: 'AV1 SVT (CRF 30)',
      type: 'cpu',
      videoOpts: ['-c:v', 'libsvtav1', '-crf', '30'],
      audioBitrate: '192k',
      passthrough: ['opus'],
    }]);
  });

  it('rejects records that do not match the preset shape', async () => {
    const file = join(dir, 'presets.json');
    await writeFile(file, JSON.stringify([{ id: 'x', name: 'X', type: 'gpu', video_opts: [], audio_bitrate: 'loud', passthrough: [] }]));

    await expect(loadPresetCatalog(file)).rejects.toThrow('Validation failed for presets: 0.audio_bitrate');
  });

  it('rejects a missing file', async () => {
    await expect(loadPresetCatalog(join(dir, 'absent.json'))).rejects.toBeInstanceOf(ValidationError);
  });

  it('converts between records and presets without loss', () => {
    const original = preset('3');
    expect(presetFromRecord(presetToRecord(original))).toEqual(original);
  });
});
