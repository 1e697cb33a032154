/**
 * FFProbe Wrapper
 * 
 * Safe wrapper for ffprobe command execution.
 * Extracts stream metadata and container duration in JSON format.
 */

import { executeCommand, type CommandRunner } from '@encodeq/utils';
import { ProbeError } from '@encodeq/core';
import { z } from 'zod';

const streamSchema = z.object({
  index: z.number().int(),
  codec_name: z.string().optional(),
  codec_type: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  color_transfer: z.string().optional(),
  color_primaries: z.string().optional(),
  avg_frame_rate: z.string().optional(),
  r_frame_rate: z.string().optional(),
  channels: z.number().optional(),
  tags: z.record(z.string()).optional(),
}).passthrough();

const resultSchema = z.object({
  format: z.object({
    duration: z.string().optional(),
  }).passthrough().optional(),
  streams: z.array(streamSchema).default([]),
});

export type FFProbeStream = z.infer<typeof streamSchema>;
export type FFProbeResult = z.infer<typeof resultSchema>;

export class FFProbe {
  private ffprobePath: string;
  private run: CommandRunner;

  constructor(ffprobePath: string = 'ffprobe', run: CommandRunner = executeCommand) {
    this.ffprobePath = ffprobePath;
    this.run = run;
  }

  /**
   * Probe a media file for its streams and container duration
   * 
   * @throws ProbeError when ffprobe fails or prints something unparseable
   */
  async probe(filePath: string): Promise<FFProbeResult> {
    const args = [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_streams',
      '-show_entries', 'format=duration',
      filePath,
    ];

    let stdout: string;
    try {
      const result = await this.run(this.ffprobePath, args, {
        timeout: 60000, // 1 minute timeout
      });
      if (result.exitCode !== 0) {
        throw new ProbeError(filePath, `ffprobe exited with code ${result.exitCode}`);
      }
      stdout = result.stdout;
    } catch (error) {
      if (error instanceof ProbeError) throw error;
      throw new ProbeError(filePath, error instanceof Error ? error.message : String(error));
    }

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch {
      throw new ProbeError(filePath, `unparseable ffprobe output: ${stdout.substring(0, 200)}`);
    }

    const parsed = resultSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProbeError(filePath, parsed.error.issues[0]?.message ?? 'unexpected ffprobe output');
    }
    return parsed.data;
  }
}
