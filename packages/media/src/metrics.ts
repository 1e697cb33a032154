/**
 * Quality metric parsing
 * 
 * The engine computes VMAF and SSIM; this module only reads what it prints.
 */

import { z } from 'zod';

export type QualityMetric = 'vmaf' | 'ssim';

export type QualityVerdict = 'EXCELLENT' | 'GREAT' | 'GOOD' | 'ACCEPTABLE' | 'POOR';

const MEAN_PATTERN = /(?:all|mean|average)[:\s]+([0-9.]+)/i;

/**
 * Walk the lines mentioning `tag` from the end and read the score that
 * follows the first `All:`, `mean:` or `average:` token found.
 */
export function parseMeanScore(text: string, tag: string = 'SSIM'): number | undefined {
  const lines = text.split(/\r?\n/).filter(line => line.includes(tag)).reverse();

  for (const line of lines) {
    const match = line.match(MEAN_PATTERN);
    if (!match) continue;
    const score = parseFloat(match[1] ?? '');
    if (Number.isFinite(score)) return score;
  }
  return undefined;
}

const vmafLogSchema = z.object({
  pooled_metrics: z.object({
    vmaf: z.object({
      mean: z.number(),
    }).passthrough(),
  }).passthrough(),
}).passthrough();

/**
 * Pooled mean from a libvmaf JSON log, undefined when the log is
 * unreadable or lacks the field.
 */
export function parseVmafLog(json: string): number | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return undefined;
  }
  const parsed = vmafLogSchema.safeParse(raw);
  return parsed.success ? parsed.data.pooled_metrics.vmaf.mean : undefined;
}

type VerdictBand = readonly [threshold: number, verdict: QualityVerdict, note: string];

const VERDICT_BANDS: Record<QualityMetric, readonly VerdictBand[]> = {
  vmaf: [
    [95, 'EXCELLENT', 'Indistinguishable from the source'],
    [93, 'GREAT', 'Imperceptible differences'],
    [90, 'GOOD', 'High quality'],
    [80, 'ACCEPTABLE', 'Visible compression'],
  ],
  ssim: [
    [0.99, 'EXCELLENT', 'Identical'],
    [0.98, 'GOOD', 'High fidelity'],
    [0.95, 'ACCEPTABLE', 'Good'],
  ],
};

const POOR_NOTES: Record<QualityMetric, string> = {
  vmaf: 'Artifacts',
  ssim: 'Different',
};

function band(score: number, metric: QualityMetric): VerdictBand | undefined {
  return VERDICT_BANDS[metric].find(([threshold]) => score >= threshold);
}

export function qualityVerdict(score: number, metric: QualityMetric): QualityVerdict {
  return band(score, metric)?.[1] ?? 'POOR';
}

/**
 * One-line reading of a verdict for people
 */
export function verdictNote(score: number, metric: QualityMetric): string {
  return band(score, metric)?.[2] ?? POOR_NOTES[metric];
}
