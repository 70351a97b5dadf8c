/**
 * Connection types.
 *
 * A connection wraps one DuckDB instance and a single connection to it.
 * The database is either a file path or `:memory:`.
 */
import type { DuckDBConnection } from '@duckdb/node-api';

/**
 * Path used for an in-memory database.
 */
export const IN_MEMORY = ':memory:';

/**
 * Database connection configuration.
 *
 * @example
 * ```typescript
 * const memory: ConnectionConfig = { database: ':memory:' }
 * const file: ConnectionConfig = { database: './warehouse.duckdb' }
 * ```
 */
export interface ConnectionConfig {
    /** Database file path, or `:memory:` */
    database: string;

    /** Open the database file read-only */
    readOnly?: boolean;
}

/**
 * Result of creating a connection.
 */
export interface ConnectionResult {
    connection: DuckDBConnection;
    database: string;

    /** Close the connection and its instance. Safe to call twice. */
    destroy: () => void;
}
