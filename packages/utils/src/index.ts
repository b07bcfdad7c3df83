/**
 * @reelkeeper/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Option string parsing
 */

// Command execution
export {
  executeCommand,
  lastNonEmptyLine,
  type CommandResult,
  type CommandOptions,
} from './command.js';

// File operations
export {
  ensureDir,
  isFile,
  isDirectory,
  getFileSizeBytes,
  listFiles,
  walkFiles,
  removeFile,
  moveFile,
  copyFile,
  readFileHeader,
} from './file.js';

// Path utilities
export {
  sanitizeFilename,
  splitFilename,
  dottedExtension,
} from './path.js';

// Option strings
export { parseOptionString } from './options.js';

// Time utilities
export {
  sleep,
  formatDuration,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
