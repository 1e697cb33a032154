/**
 * FFmpeg Command Builder
 * 
 * Fluent API for building ffmpeg argument vectors, plus the factories
 * for every invocation this program makes.
 */

import { basename, dirname, extname, join } from 'node:path';
import { logger, formatCommandLine, sanitizeFilename } from '@encodeq/utils';
import type { CropSpec, Job, Preset } from '@encodeq/core';
import { formatCropFilter } from '@encodeq/media';
import { audioCodecArgs, resolveAudioAction } from './audioStrategy.js';
import {
  buildJobFilterChain,
  buildReferenceChain,
  buildSampleFilterChain,
  type JobFilterContext,
} from './filters.js';
import { vmafModelFor } from './presets.js';

export interface InputOptions {
  seekTo?: number;        // -ss before input (fast seek)
  duration?: number;      // -t duration
  extraArgs?: string[];   // Additional input args
}

interface StreamEntry {
  spec: string;           // e.g. '0:1'
  args: string[];         // codec args for the mapped stream
}

export class FFmpegCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private globalArgs: string[] = [];
  private complexFilter: string | null = null;
  private videoMappings: string[] = [];
  private videoOptions: string[] = [];
  private videoFilters: string[] = [];
  private streams: StreamEntry[] = [];
  private trailingArgs: string[] = [];
  private outputFormat: string | null = null;
  private outputFile: string = '';

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Map the video stream the encoder options apply to
   */
  mapVideo(spec: string = '0:v:0'): this {
    this.videoMappings.push(spec);
    return this;
  }

  /**
   * Encoder options, passed through verbatim
   */
  setVideoOptions(options: readonly string[]): this {
    this.videoOptions = [...options];
    return this;
  }

  /**
   * Add video filter
   */
  addVideoFilter(...filters: string[]): this {
    this.videoFilters.push(...filters);
    return this;
  }

  /**
   * Set complex filter graph
   */
  setComplexFilter(filterGraph: string): this {
    this.complexFilter = filterGraph;
    return this;
  }

  /**
   * Map one more stream, followed by its codec arguments
   */
  addStream(spec: string, args: string[] = []): this {
    this.streams.push({ spec, args });
    return this;
  }

  /**
   * Arguments placed after all mappings, before the output
   */
  addOutputArgs(...args: string[]): this {
    this.trailingArgs.push(...args);
    return this;
  }

  setOutputFormat(format: string): this {
    this.outputFormat = format;
    return this;
  }

  /**
   * Set output file
   */
  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    // Global args
    args.push(...this.globalArgs);

    // Inputs
    for (const input of this.inputs) {
      if (input.options.extraArgs) {
        args.push(...input.options.extraArgs);
      }
      if (input.options.seekTo !== undefined) {
        args.push('-ss', input.options.seekTo.toString());
      }
      if (input.options.duration !== undefined) {
        args.push('-t', input.options.duration.toString());
      }
      args.push('-i', input.file);
    }

    // Complex filter (before mappings)
    if (this.complexFilter) {
      args.push('-filter_complex', this.complexFilter);
    }

    // Video
    for (const spec of this.videoMappings) {
      args.push('-map', spec);
    }
    args.push(...this.videoOptions);

    // Video filters (only if not copying)
    if (this.videoFilters.length > 0) {
      if (this.isVideoCopy()) {
        logger.warn('Video filters specified but codec is copy - filters will be ignored');
      } else {
        args.push('-vf', this.videoFilters.join(','));
      }
    }

    // Audio and subtitle streams
    for (const stream of this.streams) {
      args.push('-map', stream.spec, ...stream.args);
    }

    args.push(...this.trailingArgs);

    if (this.outputFormat) {
      args.push('-f', this.outputFormat);
    }

    // Output file
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }

  /**
   * Build command as string for logging
   */
  buildString(ffmpegPath: string = 'ffmpeg'): string {
    return formatCommandLine(ffmpegPath, this.build());
  }

  private isVideoCopy(): boolean {
    const codecAt = this.videoOptions.indexOf('-c:v');
    return codecAt >= 0 && this.videoOptions[codecAt + 1] === 'copy';
  }
}

/**
 * `-flags2 +ignorecrop`: compare the coded picture, not the container's crop
 */
const IGNORE_CONTAINER_CROP = ['-flags2', '+ignorecrop'];

/**
 * Create the full encode for a job.
 * 
 * -y -i in -map 0:v:0 <video opts> [-vf ...] (-map 0:N -c:a:K ...)* (-map 0:N)* [-c:s copy] out
 */
export function createJobCommand(job: Job, context: Omit<JobFilterContext, 'isHdr'>): FFmpegCommandBuilder {
  const builder = new FFmpegCommandBuilder()
    .addGlobalArg('-y')
    .addInput(job.inputPath)
    .mapVideo()
    .setVideoOptions(job.preset.videoOpts)
    .addVideoFilter(...buildJobFilterChain(job.preset, job.crop, { ...context, isHdr: job.isHdr }));

  job.selectedAudio.forEach((track, outputIndex) => {
    const action = resolveAudioAction(job.audioMode, track, job.preset);
    builder.addStream(`0:${track.index}`, audioCodecArgs(action, outputIndex));
  });

  for (const track of job.selectedSubtitles) {
    builder.addStream(`0:${track.index}`);
  }
  if (job.selectedSubtitles.length > 0) {
    builder.addOutputArgs('-c:s', 'copy');
  }

  return builder.setOutput(job.outputPath);
}

/**
 * Stream-copy `seconds` of video from `start` into a reference clip
 */
export function createReferenceClipCommand(
  inputFile: string,
  outputFile: string,
  start: number,
  seconds: number
): FFmpegCommandBuilder {
  return new FFmpegCommandBuilder()
    .addGlobalArg('-y')
    .addInput(inputFile, { seekTo: start, duration: seconds, extraArgs: IGNORE_CONTAINER_CROP })
    .mapVideo()
    .setVideoOptions(['-c:v', 'copy'])
    .addOutputArgs('-an', '-sn')
    .setOutput(outputFile);
}

/**
 * Encode the reference clip with a preset, without crop
 */
export function createSampleEncodeCommand(
  referenceFile: string,
  outputFile: string,
  preset: Preset
): FFmpegCommandBuilder {
  return new FFmpegCommandBuilder()
    .addGlobalArg('-y')
    .addInput(referenceFile, { extraArgs: IGNORE_CONTAINER_CROP })
    .mapVideo()
    .setVideoOptions(preset.videoOpts)
    .addVideoFilter(...buildSampleFilterChain(preset))
    .setOutput(outputFile);
}

/**
 * Path of the encoded sample for a preset, next to the reference clip
 */
export function sampleOutputPath(referenceFile: string, preset: Preset): string {
  const name = sanitizeFilename(preset.name).replace(/\s+/g, '_');
  return join(dirname(referenceFile), `bench_res_${name}.mkv`);
}

export function referenceClipPath(inputFile: string, workDir: string = dirname(inputFile)): string {
  const stem = basename(inputFile, extname(inputFile));
  return join(workDir, `bench_ref_${stem.slice(0, 10)}.mkv`);
}

/**
 * Escape a file path used as a filter option inside a filtergraph. Two
 * levels: backslash, quote and colon for the option parser, then
 * backslash, quote, brackets, comma and semicolon for the graph parser.
 */
export function escapeFilterPath(path: string): string {
  const option = path.replace(/[\\':]/g, '\\$&');
  return option.replace(/[\\'[\],;]/g, '\\$&');
}

export type SampleMetric =
  | { kind: 'vmaf'; logPath: string }
  | { kind: 'ssim' };

/**
 * Compare an encoded sample (input 0) against its reference clip (input 1)
 */
export function createSampleMetricCommand(
  sampleFile: string,
  referenceFile: string,
  preset: Preset,
  metric: SampleMetric
): FFmpegCommandBuilder {
  const refChain = buildReferenceChain(preset);
  const filter = metric.kind === 'vmaf'
    ? `libvmaf=model=version=${vmafModelFor(preset)}:n_subsample=10:log_fmt=json:log_path=${escapeFilterPath(metric.logPath)}`
    : 'ssim';
  const graph = refChain.length > 0
    ? `[1:v]${refChain.join(',')}[ref];[0:v][ref]${filter}`
    : `[0:v][1:v]${filter}`;

  return new FFmpegCommandBuilder()
    .addInput(sampleFile, { extraArgs: IGNORE_CONTAINER_CROP })
    .addInput(referenceFile, { extraArgs: IGNORE_CONTAINER_CROP })
    .setComplexFilter(graph)
    .setOutputFormat('null')
    .setOutput('-');
}

export type QualityMetricRequest =
  | { kind: 'vmaf'; model: string; logPath: string }
  | { kind: 'ssim'; statsPath: string };

/**
 * Compare a distorted file (input 1) against its reference (input 0),
 * centre-cropping the reference when `referenceCrop` is given
 */
export function createQualityCommand(
  referenceFile: string,
  distortedFile: string,
  metric: QualityMetricRequest,
  referenceCrop?: CropSpec
): FFmpegCommandBuilder {
  const cropChain = referenceCrop
    ? `[0:v]${formatCropFilter(referenceCrop)}[ref_cropped];`
    : '';
  const refLabel = referenceCrop ? '[ref_cropped]' : '[0:v]';
  const filter = metric.kind === 'vmaf'
    ? `libvmaf=model=version=${metric.model}:n_subsample=10:log_fmt=json:log_path=${escapeFilterPath(metric.logPath)}`
    : `ssim=stats_file=${escapeFilterPath(metric.statsPath)}`;

  return new FFmpegCommandBuilder()
    .addInput(referenceFile)
    .addInput(distortedFile)
    .setComplexFilter(`${cropChain}[1:v]${refLabel}${filter}`)
    .setOutputFormat('null')
    .setOutput('-');
}
