/**
 * Central event system.
 *
 * Core modules emit events, the CLI logger subscribes. Keeps the database
 * wrappers free of any knowledge about how (or whether) they are reported.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('query:before', { sql })
 *
 * // In CLI - subscribe to events
 * const cleanup = observer.on('query:complete', (data) => report(data))
 *
 * // Pattern matching for multiple events
 * observer.onPattern(/^export:/, ({ event, data }) => logExport(event, data))
 * ```
 */
import { EventEmitter } from 'node:events'

import { isDebug } from './environment.js'


/**
 * File formats moved in and out of the database.
 */
export type TransferFormat = 'csv' | 'parquet'


/**
 * All events emitted by the core modules.
 *
 * Events are namespaced by module:
 * - `connection:*` - Database handle lifecycle
 * - `query:*` - SQL execution
 * - `file:*` - SQL file execution
 * - `export:*` - Query results written to files
 * - `import:*` - Files loaded into tables
 */
export interface ClientEvents {

    // Connection
    'connection:open': { database: string }
    'connection:close': { database: string }
    'connection:error': { database: string; error: string }

    // Query execution
    'query:before': { sql: string }
    'query:complete': { sql: string; rowCount: number; durationMs: number }
    'query:failed': { sql: string; error: string; durationMs: number }

    // SQL files
    'file:start': { filepath: string }

    // Export
    'export:start': { format: TransferFormat; output: string }
    'export:complete': { format: TransferFormat; output: string; rowCount?: number }

    // Import
    'import:start': { format: TransferFormat; file: string; table: string }
    'import:complete': { format: TransferFormat; file: string; table: string }
}

export type ClientEventNames = keyof ClientEvents;

/**
 * Event name and payload, as delivered to pattern listeners.
 */
export type ClientEventEntry = {
    [K in ClientEventNames]: { event: K; data: ClientEvents[K] }
}[ClientEventNames];

const ANY_EVENT = '*'


/**
 * Typed event bus over `EventEmitter`.
 *
 * `onPattern()` listeners receive `{ event, data }`. Every subscription
 * returns its own cleanup function.
 */
export class ClientObserver {

    #emitter = new EventEmitter()
    #name: string
    #spy: boolean

    constructor(options: { name: string; spy?: boolean }) {

        this.#name = options.name
        this.#spy = options.spy ?? false

        this.#emitter.setMaxListeners(0)

    }

    emit<K extends ClientEventNames>(event: K, data: ClientEvents[K]): void {

        if (this.#spy) {

            console.error(`[${this.#name}:emit] ${event}`)

        }

        this.#emitter.emit(event, data)
        this.#emitter.emit(ANY_EVENT, { event, data })

    }

    on<K extends ClientEventNames>(event: K, listener: (data: ClientEvents[K]) => void): () => void {

        this.#emitter.on(event, listener)

        return () => { this.#emitter.off(event, listener) }

    }

    /**
     * Subscribe to every event whose name matches `pattern`.
     */
    onPattern(pattern: RegExp, listener: (entry: ClientEventEntry) => void): () => void {

        const matcher = (entry: ClientEventEntry) => {

            if (pattern.test(entry.event)) {

                listener(entry)

            }

        }

        this.#emitter.on(ANY_EVENT, matcher)

        return () => { this.#emitter.off(ANY_EVENT, matcher) }

    }

}

/**
 * Global observer instance.
 *
 * Enable spy output with `DUCKDB_CLI_DEBUG=1` to see all events as they occur.
 */
export const observer = new ClientObserver({
    name: 'duckdb-client',
    spy: isDebug(),
});
