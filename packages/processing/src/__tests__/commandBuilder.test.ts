import { describe, it, expect } from 'vitest';
import {
  createJobCommand,
  createQualityCommand,
  createReferenceClipCommand,
  createSampleEncodeCommand,
  createSampleMetricCommand,
  escapeFilterPath,
  FFmpegCommandBuilder,
  referenceClipPath,
  sampleOutputPath,
} from '../commandBuilder.js';
import { AAC_STEREO, ENG_SUBS, makeJob, preset, TRUEHD_71 } from './fixtures.js';

describe('createJobCommand', () => {
  it('maps video, audio per strategy and subtitles in order', () => {
    const job = makeJob();

    expect(createJobCommand(job, { toneMapAvailable: true }).build()).toEqual([
      '-y',
      '-i', '/films/Movie.mkv',
      '-map', '0:v:0',
      ...preset('1').videoOpts,
      '-vf', 'crop=3840:1600:0:280,format=p010le',
      '-map', '0:1', '-c:a:0', 'eac3', '-b:a:0', '640k',
      '-map', '0:2', '-c:a:1', 'copy',
      '-map', '0:4',
      '-c:s', 'copy',
      '/encoded/Movie_enc_4K VideoToolbox (CQ 65).mkv',
    ]);
  });

  it('tone-maps HDR into a 1080p preset when zscale is there', () => {
    const job = makeJob({ preset: preset('2'), crop: undefined, selectedSubtitles: [] });
    const args = createJobCommand(job, { toneMapAvailable: true }).build();

    expect(args[args.indexOf('-vf') + 1]).toBe('scale=1920:-2,zscale=t=bt709:p=bt709:m=bt709:r=tv,format=p010le');
    expect(args).not.toContain('-c:s');
  });

  it('falls back to a lanczos downscale without zscale', () => {
    const job = makeJob({ preset: preset('2') });
    const args = createJobCommand(job, { toneMapAvailable: false }).build();

    expect(args[args.indexOf('-vf') + 1]).toBe('crop=3840:1600:0:280,scale=1920:-2:flags=lanczos,format=p010le');
  });

  it('uses the lanczos downscale for SDR sources', () => {
    const job = makeJob({ preset: preset('2'), isHdr: false, crop: undefined });
    const args = createJobCommand(job, { toneMapAvailable: true }).build();

    expect(args[args.indexOf('-vf') + 1]).toBe('scale=1920:-2:flags=lanczos,format=p010le');
  });

  it('crops only for CPU presets', () => {
    const withCrop = createJobCommand(makeJob({ preset: preset('3') }), { toneMapAvailable: true }).build();
    const withoutCrop = createJobCommand(makeJob({ preset: preset('3'), crop: undefined }), { toneMapAvailable: true }).build();

    expect(withCrop[withCrop.indexOf('-vf') + 1]).toBe('crop=3840:1600:0:280');
    expect(withoutCrop).not.toContain('-vf');
  });

  it('never adds a filter chain to a copy preset', () => {
    const args = createJobCommand(makeJob({ preset: preset('0') }), { toneMapAvailable: true }).build();

    expect(args).not.toContain('-vf');
    expect(args.slice(3, 7)).toEqual(['-map', '0:v:0', '-c:v', 'copy']);
  });

  it('down-mixes every track in stereo mode', () => {
    const job = makeJob({ audioMode: 'stereo', selectedAudio: [TRUEHD_71, AAC_STEREO], selectedSubtitles: [ENG_SUBS] });
    const args = createJobCommand(job, { toneMapAvailable: true }).build();
    const start = args.indexOf('0:1') - 1;

    expect(args.slice(start, start + 16)).toEqual([
      '-map', '0:1', '-c:a:0', 'aac', '-b:a:0', '256k', '-ac:a:0', '2',
      '-map', '0:2', '-c:a:1', 'aac', '-b:a:1', '256k', '-ac:a:1', '2',
    ]);
  });

  it('falls back to AC3 for codecs outside the passthrough set', () => {
    const job = makeJob({
      preset: preset('2'),
      audioMode: 'copy',
      selectedAudio: [{ index: 3, language: 'ita', codecName: 'flac', channels: 2 }],
      selectedSubtitles: [],
    });
    const args = createJobCommand(job, { toneMapAvailable: true }).build();

    expect(args.slice(-7)).toEqual(['-map', '0:3', '-c:a:0', 'ac3', '-b:a:0', '256k', job.outputPath]);
  });
});

describe('FFmpegCommandBuilder', () => {
  it('requires an output', () => {
    expect(() => new FFmpegCommandBuilder().addInput('/a.mkv').build()).toThrow('Output file not specified');
  });

  it('renders a loggable command line', () => {
    const line = new FFmpegCommandBuilder()
      .addInput('/films/My Movie.mkv')
      .setOutputFormat('null')
      .setOutput('-')
      .buildString('/usr/bin/ffmpeg');

    expect(line).toBe('/usr/bin/ffmpeg -i "/films/My Movie.mkv" -f null -');
  });
});

describe('benchmark commands', () => {
  it('cuts the reference clip by stream copy', () => {
    const args = createReferenceClipCommand('/films/Movie.mkv', '/films/bench_ref_Movie.mkv', 3000, 45).build();

    expect(args).toEqual([
      '-y',
      '-flags2', '+ignorecrop', '-ss', '3000', '-t', '45', '-i', '/films/Movie.mkv',
      '-map', '0:v:0', '-c:v', 'copy',
      '-an', '-sn',
      '/films/bench_ref_Movie.mkv',
    ]);
  });

  it('names temporary files after the source and preset', () => {
    expect(referenceClipPath('/films/A Very Long Title.mkv')).toBe('/films/bench_ref_A Very Lon.mkv');
    expect(referenceClipPath('/films/Movie.mkv', '/tmp/bench')).toBe('/tmp/bench/bench_ref_Movie.mkv');
    expect(sampleOutputPath('/tmp/bench/bench_ref_Movie.mkv', preset('2'))).toBe(
      '/tmp/bench/bench_res_1080p_VideoToolbox_(CQ_65).mkv'
    );
  });

  it('encodes the sample with scale and format only', () => {
    const args = createSampleEncodeCommand('/w/ref.mkv', '/w/out.mkv', preset('2')).build();

    expect(args.slice(0, 7)).toEqual(['-y', '-flags2', '+ignorecrop', '-i', '/w/ref.mkv', '-map', '0:v:0']);
    expect(args.slice(-3)).toEqual(['-vf', 'scale=1920:-2:flags=lanczos,format=p010le', '/w/out.mkv']);
  });

  it('brings the reference to the sample depth before VMAF', () => {
    const args = createSampleMetricCommand('/w/out.mkv', '/w/ref.mkv', preset('1'), {
      kind: 'vmaf',
      logPath: '/w/out.json',
    }).build();

    expect(args).toEqual([
      '-flags2', '+ignorecrop', '-i', '/w/out.mkv',
      '-flags2', '+ignorecrop', '-i', '/w/ref.mkv',
      '-filter_complex',
      '[1:v]format=yuv420p10le[ref];[0:v][ref]libvmaf=model=version=vmaf_4k_v0.6.1:n_subsample=10:log_fmt=json:log_path=/w/out.json',
      '-f', 'null', '-',
    ]);
  });

  it('compares directly when no reference chain is needed', () => {
    const args = createSampleMetricCommand('/w/out.mkv', '/w/ref.mkv', preset('3'), { kind: 'ssim' }).build();

    expect(args[args.indexOf('-filter_complex') + 1]).toBe('[0:v][1:v]ssim');
  });
});

describe('createQualityCommand', () => {
  it('centre-crops the reference when asked', () => {
    const args = createQualityCommand('/r.mkv', '/d.mkv', {
      kind: 'vmaf',
      model: 'vmaf_4k_v0.6.1',
      logPath: '/vmaf_report_d.json',
    }, { width: 3840, height: 1600, x: 0, y: 280 }).build();

    expect(args).toEqual([
      '-i', '/r.mkv',
      '-i', '/d.mkv',
      '-filter_complex',
      '[0:v]crop=3840:1600:0:280[ref_cropped];[1:v][ref_cropped]libvmaf=model=version=vmaf_4k_v0.6.1:n_subsample=10:log_fmt=json:log_path=/vmaf_report_d.json',
      '-f', 'null', '-',
    ]);
  });

  it('writes SSIM stats without a crop', () => {
    const args = createQualityCommand('/r.mkv', '/d.mkv', { kind: 'ssim', statsPath: '/quality_log_d.txt' }).build();

    expect(args[args.indexOf('-filter_complex') + 1]).toBe('[1:v][0:v]ssim=stats_file=/quality_log_d.txt');
  });
});

describe('escapeFilterPath', () => {
  it('leaves a plain POSIX path alone', () => {
    expect(escapeFilterPath('/films/out/vmaf_report_Movie.json')).toBe('/films/out/vmaf_report_Movie.json');
  });

  it('escapes colons and commas for both parser levels', () => {
    expect(escapeFilterPath('/tmp/a:b,c.json')).toBe('/tmp/a\\\\:b\\,c.json');
  });

  it('escapes a Windows drive path', () => {
    expect(escapeFilterPath('C:\\enc\\r.json')).toBe('C\\\\:\\\\\\\\enc\\\\\\\\r.json');
  });

  it('is applied to the VMAF log path of a quality comparison', () => {
    const args = createQualityCommand('/r.mkv', '/d.mkv', {
      kind: 'vmaf',
      model: 'vmaf_v0.6.1',
      logPath: '/w/Film: Cut/vmaf_report_d.json',
    }).build();

    expect(args[args.indexOf('-filter_complex') + 1]).toBe(
      '[1:v][0:v]libvmaf=model=version=vmaf_v0.6.1:n_subsample=10:log_fmt=json:log_path=/w/Film\\\\: Cut/vmaf_report_d.json'
    );
  });
});
