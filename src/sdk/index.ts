/**
 * duckdb-client SDK
 *
 * Programmatic access to DuckDB databases.
 *
 * @example
 * ```typescript
 * import { withClient } from 'duckdb-client'
 *
 * const tables = await withClient({ database: 'analytics.duckdb' }, async (client) => {
 *
 *     await client.importCsv('./sales.csv', 'sales')
 *     return client.showTables()
 * })
 * ```
 */
import { Client } from './client.js';
import type { CreateClientOptions } from './types.js';

// ─────────────────────────────────────────────────────────────
// Factory Functions
// ─────────────────────────────────────────────────────────────

/**
 * Create a client.
 *
 * @returns Unconnected client (call connect() to use)
 */
export function createClient(options: CreateClientOptions = {}): Client {

    return new Client(options);

}

/**
 * Run `fn` with a connected client, closing it afterwards.
 *
 * The client is closed whether `fn` resolves or throws; errors are rethrown.
 *
 * @example
 * ```typescript
 * const result = await withClient({}, (client) => client.executeQuery('SELECT 42 AS answer'))
 * result.rows  // [[42]]
 * ```
 */
export async function withClient<T>(
    options: CreateClientOptions,
    fn: (client: Client) => Promise<T>,
): Promise<T> {

    const client = createClient(options);

    await client.connect();

    try {

        return await fn(client);

    }
    finally {

        client.close();

    }

}

// ─────────────────────────────────────────────────────────────
// Re-exports
// ─────────────────────────────────────────────────────────────

export { Client } from './client.js';

// Types
export type { CreateClientOptions } from './types.js';
export type { ClientEvents, ClientEventNames, ClientEventEntry, ClientObserver, TransferFormat } from '../core/observer.js';
export type { CellValue, ParamValue, QueryParams, QueryResult } from '../core/query/index.js';
export type { ImportOptions } from '../core/transfer/index.js';
export type { OutputFormat } from '../core/format/index.js';

// Errors (for catching)
export { NotConnectedError } from './guards.js';
export { QueryError } from '../core/query/index.js';
export { MissingFileError } from '../core/shared/index.js';

// Rendering
export { renderTable, renderResult, renderJson, OUTPUT_FORMATS } from '../core/format/index.js';
