/**
 * Encoding plan
 *
 * Text shown before a queue starts, one block per job. Audio actions
 * come from the same table the executor uses.
 */

import { basename } from 'node:path';
import type { Job, TrackSelection } from '@encodeq/core';
import { formatCropFilter } from '@encodeq/media';
import { describeAudioAction, resolveAudioAction } from '@encodeq/processing';

function trackLabel(track: TrackSelection): string {
  return `[${track.language.toUpperCase()}] ${track.codecName}`;
}

export function describeJob(job: Job): string[] {
  const lines = [
    `File: ${basename(job.inputPath)}`,
    `Video: ${job.preset.name}${job.isHdr ? ' (HDR source)' : ''}`,
    `Crop: ${job.crop ? formatCropFilter(job.crop) : 'none'}`,
    'Audio:',
  ];

  if (job.selectedAudio.length === 0) {
    lines.push('  - None');
  }
  for (const track of job.selectedAudio) {
    const action = resolveAudioAction(job.audioMode, track, job.preset);
    lines.push(`  - ${trackLabel(track)}: ${describeAudioAction(action)}`);
  }

  lines.push('Subtitles:');
  if (job.selectedSubtitles.length === 0) {
    lines.push('  - None');
  }
  for (const track of job.selectedSubtitles) {
    lines.push(`  - ${trackLabel(track)}: COPY`);
  }

  lines.push(`Output: ${job.outputPath}`);
  return lines;
}

export function describePlan(jobs: readonly Job[]): string[] {
  return jobs.flatMap(job => [...describeJob(job), '---']);
}
