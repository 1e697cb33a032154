/**
 * Engine capabilities
 */

import { executeCommand, createLogger, type CommandRunner } from '@encodeq/utils';

const log = createLogger({ component: 'engine' });

/**
 * Whether the ffmpeg build lists `filterName` in `-filters`.
 * A failing query counts as "not available".
 */
export async function hasFilter(
  filterName: string,
  ffmpegPath: string = 'ffmpeg',
  run: CommandRunner = executeCommand
): Promise<boolean> {
  try {
    const result = await run(ffmpegPath, ['-hide_banner', '-filters'], { timeout: 10000 });
    return result.stdout.split('\n').some(line => line.trim().split(/\s+/)[1] === filterName);
  } catch (error) {
    log.warn({ err: error, filterName }, 'Could not list engine filters');
    return false;
  }
}
