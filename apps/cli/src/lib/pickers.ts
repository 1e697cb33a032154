/**
 * Shared prompts for the interactive commands
 */

import { cleanInputPath } from '@encodeq/utils';
import { isBackAnswer, type Preset, type Prompter } from '@encodeq/core';
import type { PresetCatalog } from '@encodeq/processing';
import { printWarning } from './output.js';

/**
 * One preset by id; undefined on "q" or an unknown id
 */
export async function choosePreset(prompter: Prompter, catalog: PresetCatalog): Promise<Preset | undefined> {
  prompter.say('Select preset (q=Back):');
  for (const preset of catalog.list()) {
    prompter.say(` [${preset.id}] ${preset.name}`);
  }

  const answer = await prompter.ask('> ');
  if (isBackAnswer(answer)) return undefined;

  const preset = catalog.get(answer);
  if (!preset) {
    printWarning(`No preset "${answer.trim()}".`);
  }
  return preset;
}

/**
 * Presets by id, separated by commas or spaces. Unknown ids are dropped
 * with a warning; undefined on "q".
 */
export async function choosePresets(prompter: Prompter, catalog: PresetCatalog): Promise<Preset[] | undefined> {
  prompter.say('Select presets to compare (e.g. 1,3,4; q=Back):');
  for (const preset of catalog.list()) {
    prompter.say(` [${preset.id}] ${preset.name}`);
  }

  const answer = await prompter.ask('> ');
  if (isBackAnswer(answer)) return undefined;

  const presets: Preset[] = [];
  for (const id of answer.split(/[\s,]+/).filter(t => t !== '')) {
    const preset = catalog.get(id);
    if (!preset) {
      printWarning(`No preset "${id}", skipped.`);
    } else if (!presets.includes(preset)) {
      presets.push(preset);
    }
  }
  return presets;
}

/**
 * A path typed or dragged into the terminal; undefined on "q"
 */
export async function askPath(prompter: Prompter, question: string): Promise<string | undefined> {
  const answer = await prompter.ask(question);
  if (isBackAnswer(answer)) return undefined;
  return cleanInputPath(answer);
}
