/**
 * @encodeq/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Time and byte formatting
 * - Logger
 */

// Command execution
export {
  executeCommand,
  formatCommandLine,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  statSizeOrNull,
  isFile,
  isDirectory,
  removeFile,
  findFilesByExtension,
} from './file.js';

// Path utilities
export {
  sanitizeFilename,
  cleanInputPath,
  getBasename,
} from './path.js';

// Time utilities
export {
  sleep,
  formatDuration,
  formatClock,
} from './time.js';

// Byte formatting
export { formatBytes, GIB } from './format.js';

// Logger
export { logger, createLogger, nodeEnvFrom, DEFAULT_NODE_ENV, type Logger } from './logger.js';
