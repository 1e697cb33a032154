/**
 * Binary Configuration
 * 
 * Resolution of the external tools this program drives.
 * 
 * Priority order:
 * 1. Environment variables (FFMPEG_PATH, FFPROBE_PATH)
 * 2. System PATH
 */

import { executeCommand, type CommandRunner } from '@encodeq/utils';
import { MissingDependencyError } from '../errors/index.js';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

function resolveBinaryPath(name: string, envVar: string, env: NodeJS.ProcessEnv): BinaryConfig {
  const envPath = env[envVar];
  return {
    name,
    envVar,
    // Bare name lets the system PATH resolve it
    resolvedPath: envPath && envPath.trim() !== '' ? envPath : name,
  };
}

/**
 * Get all binary configurations
 */
export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', env),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH', env),
  };
}

/**
 * Check if a binary answers `-version`
 */
export async function isBinaryAvailable(
  binaryPath: string,
  run: CommandRunner = executeCommand
): Promise<boolean> {
  try {
    const result = await run(binaryPath, ['-version'], { timeout: 5000 });
    return result.exitCode === 0;
  } catch {
    return false;
  }
}

/**
 * Verify every required tool is installed.
 * 
 * @throws MissingDependencyError naming each tool that could not be run
 */
export async function checkDependencies(
  binaries: BinariesConfig = getBinariesConfig(),
  run: CommandRunner = executeCommand
): Promise<void> {
  const missing: string[] = [];
  for (const binary of [binaries.ffmpeg, binaries.ffprobe]) {
    if (!(await isBinaryAvailable(binary.resolvedPath, run))) {
      missing.push(binary.name);
    }
  }
  if (missing.length > 0) {
    throw new MissingDependencyError(missing);
  }
}
