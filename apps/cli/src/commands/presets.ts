/**
 * Presets Command
 */

import chalk from 'chalk';
import { errorMessage } from '@encodeq/core';
import { loadConfig } from '../config/index.js';
import { printError, printHeader, printKeyValue } from '../lib/output.js';

interface PresetsOptions {
  verbose?: boolean;
}

export async function presetsCommand(options: PresetsOptions): Promise<void> {
  try {
    const { catalog } = await loadConfig();
    printHeader('Presets');

    for (const preset of catalog.list()) {
      console.log(`${chalk.cyan(`[${preset.id}]`)} ${preset.name} ${chalk.gray(`(${preset.type})`)}`);
      if (options.verbose) {
        printKeyValue('Video', preset.videoOpts.join(' '));
        printKeyValue('Audio bitrate', preset.audioBitrate);
        printKeyValue('Passthrough', preset.passthrough.length > 0 ? preset.passthrough.join(', ') : 'none');
      }
    }
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }
}
