/**
 * @encodeq/core
 * 
 * Core package containing:
 * - Domain types (presets, jobs, crop, track selections)
 * - Interactive outcome type and prompting seam
 * - Error handling
 * - External binary resolution and settings
 */

// Types
export type { Preset, PresetType } from './types/preset.js';
export {
  AUDIO_MODES,
  freezeJob,
  type AudioMode,
  type CropSpec,
  type Job,
  type TrackSelection,
} from './types/job.js';
export {
  selected,
  cancelled,
  isCancelled,
  isBackAnswer,
  CANCELLED,
  type Selection,
} from './types/selection.js';
export type { Prompter } from './types/prompt.js';

// Errors
export {
  EncodeqError,
  MissingDependencyError,
  ProbeError,
  QueueFormatError,
  ValidationError,
  CommandExecutionError,
  errorMessage,
} from './errors/index.js';

// Configuration
export {
  getBinariesConfig,
  isBinaryAvailable,
  checkDependencies,
  type BinaryConfig,
  type BinariesConfig,
} from './config/binaries.js';
export { parseSettings, loadSettings, type Settings } from './config/settings.js';
