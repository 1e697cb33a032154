/**
 * Settings
 * 
 * Environment-driven configuration, validated with zod.
 * A `.env` file in the working directory is loaded first.
 */

import { config as dotenvConfig } from 'dotenv';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_NODE_ENV } from '@encodeq/utils';
import { ValidationError } from '../errors/index.js';
import { getBinariesConfig, type BinariesConfig } from './binaries.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default(DEFAULT_NODE_ENV),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  ENCODEQ_OUTPUT_DIR: z.string().optional(),
  ENCODEQ_PREFERRED_LANGUAGE: z.string().regex(/^[a-z]{2,3}$/i, 'expected an ISO 639 code').default('eng'),
  ENCODEQ_COOLDOWN_MS: z.coerce.number().int().min(0).default(5000),
  ENCODEQ_SAMPLE_SECONDS: z.coerce.number().int().min(5).max(600).default(45),
  ENCODEQ_PRESETS_FILE: z.string().optional(),
});

export interface Settings {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  /** Root directory for encoded files */
  outputDir: string;
  /** Audio language picked when a track prompt is left empty */
  preferredLanguage: string;
  /** Pause between consecutive queue jobs */
  cooldownMs: number;
  /** Length of the benchmark reference clip */
  sampleSeconds: number;
  /** Replacement preset catalog (JSON), if any */
  presetsFile?: string;
  binaries: BinariesConfig;
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Parse settings from an environment map.
 * 
 * @throws ValidationError on the first invalid variable
 */
export function parseSettings(env: NodeJS.ProcessEnv): Settings {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      issue?.path.join('.') || 'environment',
      issue?.message ?? 'invalid configuration'
    );
  }

  const data = parsed.data;
  const outputDir = blankToUndefined(data.ENCODEQ_OUTPUT_DIR);
  const presetsFile = blankToUndefined(data.ENCODEQ_PRESETS_FILE);

  return {
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
    outputDir: outputDir ? resolve(outputDir) : join(homedir(), 'Movies'),
    preferredLanguage: data.ENCODEQ_PREFERRED_LANGUAGE.toLowerCase(),
    cooldownMs: data.ENCODEQ_COOLDOWN_MS,
    sampleSeconds: data.ENCODEQ_SAMPLE_SECONDS,
    presetsFile: presetsFile ? resolve(presetsFile) : undefined,
    binaries: getBinariesConfig(env),
  };
}

/**
 * Load `.env` (if present) into process.env, then parse.
 */
export function loadSettings(envFile?: string): Settings {
  dotenvConfig(envFile ? { path: envFile } : {});
  return parseSettings(process.env);
}
