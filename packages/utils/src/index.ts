/**
 * @cutline/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Time utilities
 * - Logger
 */

// Command execution
export {
  executeCommand,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  getFileSizeBytes,
  removeFile,
} from './file.js';

// Time utilities
export {
  sleep,
  formatDuration,
  parseTimecode,
  formatTimecode,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
