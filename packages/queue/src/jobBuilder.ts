/**
 * Job Builder
 *
 * Walks the user through each input file (crop, tracks, audio handling)
 * and turns the answers plus one preset into frozen Jobs. Backing out of
 * any prompt abandons the whole batch.
 */

import { EventEmitter } from 'node:events';
import { basename, join } from 'node:path';
import {
  createLogger,
  findFilesByExtension,
  getBasename,
  isDirectory,
  isFile,
  sanitizeFilename,
} from '@encodeq/utils';
import {
  cancelled,
  freezeJob,
  isBackAnswer,
  isCancelled,
  selected,
  ValidationError,
  type AudioMode,
  type CropSpec,
  type Job,
  type Preset,
  type Prompter,
  type Selection,
} from '@encodeq/core';
import {
  CropDetector,
  formatCropFilter,
  frameSizeOf,
  isHdr,
  MediaProber,
  parseCropSpec,
  type FrameSize,
  type MediaInfo,
} from '@encodeq/media';
import { isCopyPreset } from '@encodeq/processing';
import { TrackSelector } from './trackSelector.js';

const log = createLogger({ component: 'job-builder' });

export const MEDIA_EXTENSIONS: readonly string[] = ['.mkv', '.mp4', '.mov', '.avi'];

const AUDIO_MODE_CHOICES: Readonly<Record<string, AudioMode>> = {
  '': 'copy',
  '1': 'copy',
  '2': 'smart-surround',
  '3': 'stereo',
};

/**
 * Mode for an answer to the audio strategy prompt; undefined when the
 * answer is not one of the listed choices
 */
export function audioModeFor(answer: string): AudioMode | undefined {
  return AUDIO_MODE_CHOICES[answer.trim()];
}

/**
 * `<outputDir>/<stem>_enc_<preset name>.mkv`, with "/" and ":" in the
 * preset name replaced. An existing file at that path is overwritten.
 */
export function outputPathFor(inputPath: string, preset: Preset, outputDir: string): string {
  return join(outputDir, `${getBasename(inputPath)}_enc_${sanitizeFilename(preset.name)}.mkv`);
}

/**
 * A single file, or every media file below a directory (sorted)
 */
export async function collectInputFiles(path: string): Promise<string[]> {
  if (await isFile(path)) return [path];
  if (await isDirectory(path)) return findFilesByExtension(path, MEDIA_EXTENSIONS);
  return [];
}

export interface JobBuilderOptions {
  prober: MediaProber;
  cropDetector: CropDetector;
  trackSelector: TrackSelector;
  prompter: Prompter;
  outputDir: string;
}

/**
 * Events:
 * - 'file:start' (file, position, total)
 * - 'file:skipped' (file, reason)
 * - 'crop:start' (file)
 * - 'crop:done' (file, CropSpec | undefined)
 */
export class JobBuilder extends EventEmitter {
  private prober: MediaProber;
  private cropDetector: CropDetector;
  private trackSelector: TrackSelector;
  private prompter: Prompter;
  private outputDir: string;

  constructor(options: JobBuilderOptions) {
    super();
    this.prober = options.prober;
    this.cropDetector = options.cropDetector;
    this.trackSelector = options.trackSelector;
    this.prompter = options.prompter;
    this.outputDir = options.outputDir;
  }

  /**
   * Configure one job per file, in sorted path order. Files that cannot
   * be probed are skipped.
   */
  async build(files: readonly string[], preset: Preset): Promise<Selection<Job[]>> {
    const ordered = [...files].sort();
    const jobs: Job[] = [];

    for (const [i, file] of ordered.entries()) {
      this.emit('file:start', file, i + 1, ordered.length);
      this.prompter.say(`=== Configuring file ${i + 1}/${ordered.length}: ${basename(file)} ===`);

      const info = await this.prober.inspect(file);
      if (!info) {
        log.warn({ file }, 'No metadata, file skipped');
        this.emit('file:skipped', file, 'no metadata');
        this.prompter.say(`Skipping ${basename(file)}: no metadata.`);
        continue;
      }

      const job = await this.configure(info, preset);
      if (isCancelled(job)) {
        log.info({ file, built: jobs.length }, 'Job building cancelled');
        return cancelled();
      }
      jobs.push(job.value);
    }

    return selected(jobs);
  }

  private async configure(info: MediaInfo, preset: Preset): Promise<Selection<Job>> {
    const hdr = isHdr(info.streams);
    if (hdr) {
      this.prompter.say('HDR source.');
    }

    const crop = await this.resolveCrop(info, preset);
    if (isCancelled(crop)) return cancelled();

    const audio = await this.trackSelector.select(info.streams, 'audio');
    if (isCancelled(audio)) return cancelled();

    const subtitles = await this.trackSelector.select(info.streams, 'subtitle');
    if (isCancelled(subtitles)) return cancelled();

    const audioMode = await this.askAudioMode();
    if (isCancelled(audioMode)) return cancelled();

    return selected(freezeJob({
      inputPath: info.filePath,
      outputPath: outputPathFor(info.filePath, preset, this.outputDir),
      durationSeconds: info.durationSeconds,
      isHdr: hdr,
      crop: crop.value,
      selectedAudio: audio.value,
      selectedSubtitles: subtitles.value,
      audioMode: audioMode.value,
      preset,
    }));
  }

  private async resolveCrop(info: MediaInfo, preset: Preset): Promise<Selection<CropSpec | undefined>> {
    if (isCopyPreset(preset)) {
      this.prompter.say('Remux mode: auto-crop disabled (video copy).');
      return selected(undefined);
    }

    const frame = frameSizeOf(info);
    this.emit('crop:start', info.filePath);
    const detected = await this.cropDetector.detect(info.filePath, info.durationSeconds, frame);
    this.emit('crop:done', info.filePath, detected);

    if (!detected) {
      this.prompter.say('No black bars detected.');
      return this.askManualCrop('Manual crop or Enter for the full frame (q=Back): ', frame);
    }

    this.prompter.say(`Crop detected: ${formatCropFilter(detected)}`);
    const answer = await this.prompter.ask('Confirm? [y/n] (Enter=Yes, n=Manual, q=Back): ');
    if (isBackAnswer(answer)) return cancelled();
    if (answer.trim().toLowerCase() !== 'n') return selected(detected);

    return this.askManualCrop('Manual crop (e.g. 3840:1608:0:276) or Enter for none (q=Back): ', frame);
  }

  /**
   * Ask until the answer is empty (no crop), "q", or a crop that fits the frame
   */
  private async askManualCrop(question: string, frame: FrameSize | undefined): Promise<Selection<CropSpec | undefined>> {
    while (true) {
      const answer = (await this.prompter.ask(question)).trim();
      if (isBackAnswer(answer)) return cancelled();
      if (answer === '') return selected(undefined);

      try {
        return selected(parseCropSpec(answer, frame));
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        this.prompter.say(error.message);
      }
    }
  }

  private async askAudioMode(): Promise<Selection<AudioMode>> {
    this.prompter.say('Choose audio strategy:');
    this.prompter.say(' [1] Passthrough (copy 1:1) - default');
    this.prompter.say(' [2] Convert to EAC3 (smart surround, 7.1 support)');
    this.prompter.say(' [3] Convert to AAC stereo (save space)');

    const answer = await this.prompter.ask('> ');
    if (isBackAnswer(answer)) return cancelled();

    const mode = audioModeFor(answer);
    if (mode === undefined) {
      this.prompter.say(`Unknown choice "${answer.trim()}", using passthrough.`);
      return selected('copy');
    }
    return selected(mode);
  }
}
