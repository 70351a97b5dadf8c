/**
 * Logger Module
 *
 * Captures observer events and direct messages and writes them
 * to a stream as plain, colored, or JSON lines.
 */

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LoggerConfig,
    LoggerState,
} from './types.js';

export { LOG_LEVEL_PRIORITY, ENTRY_LEVEL_PRIORITY, DEFAULT_LOGGER_CONFIG } from './types.js';

// Classifier
export { classifyEvent, isLevelEnabled, shouldLog } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, serializeEntry } from './formatter.js';
export { formatColorLine } from './color.js';

// Logger
export { Logger, type LoggerOptions } from './logger.js';
