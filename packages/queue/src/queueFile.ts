/**
 * Queue file format
 *
 * A queue is saved as JSON: a version, an export timestamp and one flat
 * snake_case record per job, with every path as a plain string.
 */

import { z } from 'zod';
import { safeReadFile, safeWriteFile } from '@encodeq/utils';
import { AUDIO_MODES, freezeJob, QueueFormatError, type Job, type TrackSelection } from '@encodeq/core';
import { presetFromRecord, presetRecordSchema, presetToRecord } from '@encodeq/processing';

export const QUEUE_FILE_VERSION = 1;

const cropRecordSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  x: z.number().int().nonnegative(),
  y: z.number().int().nonnegative(),
});

const trackRecordSchema = z.object({
  index: z.number().int().nonnegative(),
  language: z.string(),
  codec_name: z.string(),
  channels: z.number().int().positive(),
});

export const jobRecordSchema = z.object({
  input_path: z.string().min(1),
  output_path: z.string().min(1),
  duration_seconds: z.number().nonnegative(),
  is_hdr: z.boolean(),
  crop: cropRecordSchema.nullable(),
  selected_audio: z.array(trackRecordSchema),
  selected_subtitles: z.array(trackRecordSchema),
  audio_mode: z.enum(AUDIO_MODES),
  preset: presetRecordSchema,
});

export const queueFileSchema = z.object({
  version: z.literal(QUEUE_FILE_VERSION),
  exported_at: z.string().datetime(),
  jobs: z.array(jobRecordSchema),
});

export type JobRecord = z.infer<typeof jobRecordSchema>;
export type QueueFile = z.infer<typeof queueFileSchema>;

type TrackRecord = z.infer<typeof trackRecordSchema>;

function trackToRecord(track: TrackSelection): TrackRecord {
  return {
    index: track.index,
    language: track.language,
    codec_name: track.codecName,
    channels: track.channels,
  };
}

function trackFromRecord(record: TrackRecord): TrackSelection {
  return {
    index: record.index,
    language: record.language,
    codecName: record.codec_name,
    channels: record.channels,
  };
}

export function jobToRecord(job: Job): JobRecord {
  return {
    input_path: job.inputPath,
    output_path: job.outputPath,
    duration_seconds: job.durationSeconds,
    is_hdr: job.isHdr,
    crop: job.crop ? { ...job.crop } : null,
    selected_audio: job.selectedAudio.map(trackToRecord),
    selected_subtitles: job.selectedSubtitles.map(trackToRecord),
    audio_mode: job.audioMode,
    preset: presetToRecord(job.preset),
  };
}

export function jobFromRecord(record: JobRecord): Job {
  return freezeJob({
    inputPath: record.input_path,
    outputPath: record.output_path,
    durationSeconds: record.duration_seconds,
    isHdr: record.is_hdr,
    crop: record.crop ?? undefined,
    selectedAudio: record.selected_audio.map(trackFromRecord),
    selectedSubtitles: record.selected_subtitles.map(trackFromRecord),
    audioMode: record.audio_mode,
    preset: presetFromRecord(record.preset),
  });
}

export function serializeQueue(jobs: readonly Job[], exportedAt: Date = new Date()): string {
  const file: QueueFile = {
    version: QUEUE_FILE_VERSION,
    exported_at: exportedAt.toISOString(),
    jobs: jobs.map(jobToRecord),
  };
  return JSON.stringify(file, null, 2);
}

/**
 * Parse queue file contents into jobs.
 *
 * @throws QueueFormatError when the text is not JSON or not a queue
 */
export function parseQueue(content: string, filePath: string): Job[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new QueueFormatError(filePath, 'not valid JSON');
  }

  const parsed = queueFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new QueueFormatError(filePath, `${where}${issue?.message ?? 'unexpected structure'}`);
  }

  return parsed.data.jobs.map(jobFromRecord);
}

/**
 * @throws QueueFormatError when the file is missing or malformed
 */
export async function readQueueFile(filePath: string): Promise<Job[]> {
  const content = await safeReadFile(filePath);
  if (content === null) {
    throw new QueueFormatError(filePath, 'file not found');
  }
  return parseQueue(content, filePath);
}

export async function writeQueueFile(filePath: string, jobs: readonly Job[], exportedAt?: Date): Promise<void> {
  await safeWriteFile(filePath, serializeQueue(jobs, exportedAt));
}
