/**
 * CLI Configuration
 *
 * Settings come from the environment (and `.env`); the preset catalog
 * from the built-in list or ENCODEQ_PRESETS_FILE.
 */

import { loadSettings, type Settings } from '@encodeq/core';
import { loadPresetCatalog, type PresetCatalog } from '@encodeq/processing';

export interface CliConfig {
  settings: Settings;
  catalog: PresetCatalog;
}

/**
 * @throws ValidationError on a bad setting or preset file
 */
export async function loadConfig(): Promise<CliConfig> {
  const settings = loadSettings();
  const catalog = await loadPresetCatalog(settings.presetsFile);
  return { settings, catalog };
}
