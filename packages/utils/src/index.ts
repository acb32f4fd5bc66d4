/**
 * @hiresdl/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Type guards
 * - Formatting
 * - Counting semaphore
 */

// Command execution
export {
  executeCommand,
  execFFmpeg,
  CommandFailedError,
  type CommandResult,
  type CommandOptions,
} from './command.js';

// File operations
export {
  ensureDir,
  safeReadFile,
  appendLine,
  isFile,
  removeFile,
  moveFile,
  findFiles,
} from './file.js';

// Path utilities
export { sanitizeFilename, sanitizePath } from './path.js';

// Type guards
export {
  isString,
  isObject,
  isNonEmptyString,
} from './guards.js';

// Formatting
export { formatElapsed, formatMebibytes, formatBytes } from './time.js';

// Concurrency
export { Semaphore, SemaphoreClosedError } from './semaphore.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
