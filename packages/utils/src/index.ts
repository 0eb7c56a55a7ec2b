/**
 * @transcoder/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - Path and time helpers
 * - Type guards
 * - Logger
 */

// Command execution
export { executeCommand, type CommandResult, type CommandOptions } from './command.js';

// Path utilities
export { getExtension } from './path.js';

// Type guards
export { isNonEmptyString } from './guards.js';

// Time utilities
export {
  formatDuration,
  parseTimecode,
  formatTimecode,
} from './time.js';

// Logger
export { logger, createLogger, createJobLogger, type Logger } from './logger.js';
