/**
 * Event Classifier
 *
 * Classifies observer events by log level based on naming patterns.
 *
 * Classification rules:
 * - 'error' or '*:error', '*:failed' -> error
 * - '*:warning' -> warn
 * - '*:start', '*:complete', '*:open', etc. -> info
 * - Everything else -> debug
 */
import type { EntryLevel, LogLevel } from './types.js';
import { ENTRY_LEVEL_PRIORITY, LOG_LEVEL_PRIORITY } from './types.js';

/**
 * Patterns that classify an event as error level.
 */
const ERROR_PATTERNS = [/^error$/, /:error$/, /:failed$/];

/**
 * Patterns that classify an event as warn level.
 */
const WARN_PATTERNS = [/:warning$/];

/**
 * Patterns that classify an event as info level.
 * Lifecycle events worth logging at default verbosity.
 */
const INFO_PATTERNS = [
    /:start$/,
    /:complete$/,
    /:open$/,
    /:close$/,
];

/**
 * Classify an event name to determine its log level.
 *
 * @example
 * ```typescript
 * classifyEvent('connection:error') // 'error'
 * classifyEvent('query:complete')   // 'info'
 * classifyEvent('query:before')     // 'debug'
 * ```
 */
export function classifyEvent(event: string): EntryLevel {

    if (ERROR_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'error';

    }

    if (WARN_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'warn';

    }

    if (INFO_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'info';

    }

    return 'debug';

}

/**
 * Check if an entry level passes the configured verbosity.
 *
 * @example
 * ```typescript
 * isLevelEnabled('error', 'warn')   // true
 * isLevelEnabled('debug', 'info')   // false
 * isLevelEnabled('debug', 'verbose') // true
 * ```
 */
export function isLevelEnabled(level: EntryLevel, configLevel: LogLevel): boolean {

    return ENTRY_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[configLevel];

}

/**
 * Check if an event should be logged at the given verbosity level.
 *
 * @example
 * ```typescript
 * shouldLog('query:failed', 'error')  // true (errors always logged)
 * shouldLog('query:before', 'info')   // false (debug event at info level)
 * shouldLog('query:before', 'verbose') // true (everything at verbose)
 * ```
 */
export function shouldLog(event: string, configLevel: LogLevel): boolean {

    if (configLevel === 'silent') {

        return false;

    }

    return isLevelEnabled(classifyEvent(event), configLevel);

}
