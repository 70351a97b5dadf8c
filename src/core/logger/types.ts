/**
 * Logger Types
 *
 * The logger captures observer events plus direct messages and
 * writes them to a stream with configurable verbosity.
 */

/**
 * Log verbosity levels.
 *
 * - silent: No logging
 * - error: Errors only
 * - warn: Errors + warnings
 * - info: Errors + warnings + info (default)
 * - verbose: All events including debug
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

/**
 * Numeric priority for log levels.
 * Higher numbers = more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * Entry level of a single line.
 * Maps to standard logging conventions.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Numeric priority for entry levels.
 * Lower priority = more severe/important.
 */
export const ENTRY_LEVEL_PRIORITY: Record<EntryLevel, number> = {
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

/**
 * A single log entry, as written in JSON mode.
 *
 * @example
 * ```json
 * {
 *     "timestamp": "2024-01-15T10:30:00.000Z",
 *     "level": "info",
 *     "event": "query:complete",
 *     "message": "Query executed successfully: 3 rows returned"
 * }
 * ```
 */
export interface LogEntry {
    /** ISO 8601 timestamp */
    timestamp: string;

    /** Entry severity level */
    level: EntryLevel;

    /** Observer event name (absent for direct messages) */
    event?: string;

    /** Human-readable summary */
    message: string;

    /** Payload (included at verbose level) */
    data?: Record<string, unknown>;

    /** Additional context (database path, command) */
    context?: Record<string, unknown>;
}

/**
 * Logger configuration.
 */
export interface LoggerConfig {
    /** Enable logging */
    enabled: boolean;

    /** Minimum level to write */
    level: LogLevel;
}

/**
 * Default logger configuration.
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
    enabled: true,
    level: 'info',
};

/**
 * Logger state for lifecycle management.
 */
export type LoggerState = 'idle' | 'running' | 'stopped';
