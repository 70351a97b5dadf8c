/**
 * Log Formatter
 *
 * Converts observer events into human-readable messages and LogEntry
 * objects. JSON mode writes each entry as a single line.
 */
import type { EntryLevel, LogEntry } from './types.js'


/**
 * Human-readable message templates for known events.
 * Keys are event names, values generate the message from the event data.
 */
const MESSAGE_TEMPLATES: Record<string, (data: Record<string, unknown>) => string> = {

    // Connection
    'connection:open': (d) => `Connected to DuckDB: ${d['database']}`,
    'connection:close': (d) => `Database connection closed: ${d['database']}`,
    'connection:error': (d) => `Failed to connect to ${d['database']}: ${d['error']}`,

    // Query
    'query:before': (d) => `Executing query: ${d['sql']}`,
    'query:complete': (d) => `Query executed successfully: ${d['rowCount']} rows returned (${d['durationMs']}ms)`,
    'query:failed': (d) => `Query failed after ${d['durationMs']}ms: ${d['sql']}`,

    // Files
    'file:start': (d) => `Executing SQL file: ${d['filepath']}`,

    // Transfer
    'export:start': (d) => `Exporting query result to ${String(d['format']).toUpperCase()}: ${d['output']}`,
    'export:complete': (d) => d['rowCount'] === undefined
        ? `Successfully exported to ${d['output']}`
        : `Successfully exported ${d['rowCount']} rows to ${d['output']}`,
    'import:start': (d) => `Importing ${String(d['format']).toUpperCase()} to table '${d['table']}': ${d['file']}`,
    'import:complete': (d) => `Successfully imported ${d['file']} to table '${d['table']}'`,
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to generic format.
 *
 * @example
 * ```typescript
 * generateMessage('file:start', { filepath: 'report.sql' })
 * // 'Executing SQL file: report.sql'
 *
 * generateMessage('custom:thing', { id: 4 })
 * // 'custom thing: id=4'
 * ```
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        return template(data)
    }

    // Generic format: "event name" or "event name: key=value, ..."
    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and formats objects.
 */
function summarizeValue(value: unknown): string {

    if (value === null || value === undefined) {

        return String(value)
    }

    if (typeof value === 'string') {

        if (value.length > 50) {

            return `"${value.slice(0, 47)}..."`
        }

        return `"${value}"`
    }

    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {

        return String(value)
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (typeof value === 'object') {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Build a LogEntry.
 *
 * @param level - Entry severity level
 * @param message - Human-readable message
 * @param options.event - Observer event name, when the entry came from one
 * @param options.data - Payload, only kept when `includeData` is set
 * @param options.context - Logger context
 *
 * @example
 * ```typescript
 * const entry = formatEntry('info', 'Connected to DuckDB: :memory:', {
 *     event: 'connection:open',
 *     context: { command: 'tables' },
 * })
 * ```
 */
export function formatEntry(
    level: EntryLevel,
    message: string,
    options: {
        event?: string
        data?: Record<string, unknown>
        context?: Record<string, unknown>
        includeData?: boolean
    } = {},
): LogEntry {

    const { event, data, context, includeData = false } = options

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
    }

    if (event) {

        entry.event = event
    }

    if (includeData && data && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Sanitize data for logging.
 * Handles values JSON cannot represent.
 */
export function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        if (value instanceof Error) {

            result[key] = {
                name: value.name,
                message: value.message,
                stack: value.stack?.split('\n').slice(0, 3).join('\n'),
            }
            continue
        }

        if (value instanceof Date) {

            result[key] = value.toISOString()
            continue
        }

        if (typeof value === 'bigint') {

            result[key] = value.toString()
            continue
        }

        // Circular references / non-serializable
        try {

            JSON.stringify(value)
            result[key] = value
        }
        catch {

            result[key] = String(value)
        }
    }

    return result
}


/**
 * Serialize a LogEntry to a JSON line.
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}
