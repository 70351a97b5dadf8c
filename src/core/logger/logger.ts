/**
 * Logger
 *
 * Stream-based logger. Captures every observer event plus direct
 * messages and writes them as plain, colored, or JSON lines.
 *
 * @example
 * ```typescript
 * const logger = new Logger({
 *     config: { level: 'verbose' },
 *     console: process.stderr,
 * })
 *
 * await logger.start()
 * // Observer events are now written with their level and message
 * logger.error('Query execution failed: table not found')
 * await logger.stop()
 * ```
 */
import type { Writable } from 'node:stream';

import { observer } from '../observer.js';
import { classifyEvent, isLevelEnabled, shouldLog } from './classifier.js';
import { formatColorLine } from './color.js';
import { formatEntry, generateMessage, sanitizeData, serializeEntry } from './formatter.js';
import type { EntryLevel, LogLevel, LoggerConfig, LoggerState } from './types.js';
import { DEFAULT_LOGGER_CONFIG } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {
    /** Logger configuration */
    config?: Partial<LoggerConfig>;

    /** Context to include with every JSON entry */
    context?: Record<string, unknown>;

    /** Stream to write to (defaults to stderr) */
    console?: Writable;

    /** Write JSON lines instead of text */
    json?: boolean;

    /** Colorize text lines */
    color?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {

    return typeof value === 'object' && value !== null && !Array.isArray(value);

}

/**
 * Logger that captures observer events and writes to a stream.
 */
export class Logger {

    #config: LoggerConfig;
    #context: Record<string, unknown>;
    #console: Writable;
    #json: boolean;
    #color: boolean;
    #state: LoggerState = 'idle';
    #unsubscribe: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#config = { ...DEFAULT_LOGGER_CONFIG, ...options.config };
        this.#context = options.context ?? {};
        this.#console = options.console ?? process.stderr;
        this.#json = options.json ?? false;
        this.#color = !this.#json && (options.color ?? false);

    }

    /**
     * Get the current logger state.
     */
    get state(): LoggerState {

        return this.#state;

    }

    /**
     * Get the current log level.
     */
    get level(): LogLevel {

        return this.#config.level;

    }

    /**
     * Check if logging is enabled.
     */
    get isEnabled(): boolean {

        return this.#config.enabled && this.#config.level !== 'silent';

    }

    /**
     * Update the logging context.
     *
     * Context is included with every JSON entry.
     */
    setContext(context: Record<string, unknown>): void {

        this.#context = { ...this.#context, ...context };

    }

    /**
     * Clear the logging context.
     */
    clearContext(): void {

        this.#context = {};

    }

    /**
     * Start the logger and begin capturing observer events.
     */
    async start(): Promise<void> {

        if (this.#state !== 'idle' || !this.isEnabled) {

            return;

        }

        this.#unsubscribe = observer.onPattern(/./, ({ event, data }) => {

            this.#handleEvent(String(event), isRecord(data) ? data : {});

        });

        this.#state = 'running';

    }

    /**
     * Stop capturing events. Direct log calls are ignored afterwards.
     */
    async stop(): Promise<void> {

        if (this.#state !== 'running') {

            return;

        }

        if (this.#unsubscribe) {

            this.#unsubscribe();
            this.#unsubscribe = null;

        }

        this.#state = 'stopped';

    }

    /**
     * Handle an observer event.
     */
    #handleEvent(event: string, data: Record<string, unknown>): void {

        if (!shouldLog(event, this.#config.level)) {

            return;

        }

        this.#write(classifyEvent(event), generateMessage(event, data), { event, data });

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging methods
    // ─────────────────────────────────────────────────────────────

    /**
     * Log an info message directly.
     */
    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    /**
     * Log a warning message directly.
     */
    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    /**
     * Log an error message directly.
     */
    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    /**
     * Log a debug message directly.
     */
    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (!this.isEnabled || this.#state !== 'running') {

            return;

        }

        if (!isLevelEnabled(level, this.#config.level)) {

            return;

        }

        this.#write(level, message, { data });

    }

    /**
     * Write one line in the configured output mode.
     *
     * Event payloads are only written at verbose level.
     */
    #write(
        level: EntryLevel,
        message: string,
        extra: { event?: string; data?: Record<string, unknown> },
    ): void {

        const verbose = this.#config.level === 'verbose';
        const data = extra.data && Object.keys(extra.data).length > 0
            ? sanitizeData(extra.data)
            : undefined;

        if (this.#json) {

            const entry = formatEntry(level, message, {
                event: extra.event,
                data,
                context: this.#context,
                includeData: verbose,
            });

            this.#console.write(serializeEntry(entry));

            return;

        }

        if (this.#color) {

            this.#console.write(`${formatColorLine(level, message, verbose ? data : undefined)}\n`);

            return;

        }

        const timestamp = new Date().toISOString();
        const levelLabel = level.toUpperCase().padEnd(5);

        let line = `[${timestamp}] [${levelLabel}] ${message}`;

        if (verbose && data) {

            line += ` ${JSON.stringify(data)}`;

        }

        this.#console.write(`${line}\n`);

    }

}
