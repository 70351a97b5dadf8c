/**
 * SDK Types.
 */

// ─────────────────────────────────────────────────────────────
// Factory Options
// ─────────────────────────────────────────────────────────────

/**
 * Options for creating a client.
 *
 * @example
 * ```typescript
 * // In-memory database
 * const client = createClient()
 *
 * // File-backed database, opened read-only
 * const client = createClient({ database: './analytics.duckdb', readOnly: true })
 * ```
 */
export interface CreateClientOptions {

    /** Database file path. Defaults to `:memory:`. */
    database?: string;

    /** Open the database read-only. */
    readOnly?: boolean;

}
