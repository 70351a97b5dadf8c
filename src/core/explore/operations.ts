/**
 * Explore operations.
 *
 * Table listing, schema description and row sampling. Each one is a
 * single statement handed to the engine; unknown tables surface as
 * QueryError with the engine's message.
 */
import type { DuckDBConnection } from '@duckdb/node-api';

import { runQuery } from '../query/executor.js';
import { quoteIdentifier } from '../query/sql.js';
import type { QueryResult } from '../query/types.js';

/**
 * Default number of rows returned by sampleTable.
 */
export const DEFAULT_SAMPLE_LIMIT = 10;

/**
 * List tables of the current database.
 *
 * @example
 * ```typescript
 * const result = await listTables(connection)
 * // columns: ['name'], rows: [['orders'], ['users']]
 * ```
 */
export async function listTables(connection: DuckDBConnection): Promise<QueryResult> {

    return runQuery(connection, 'SHOW TABLES');

}

/**
 * Describe the columns of a table.
 *
 * Result columns follow DuckDB's DESCRIBE: column_name, column_type,
 * null, key, default, extra.
 */
export async function describeTable(connection: DuckDBConnection, table: string): Promise<QueryResult> {

    return runQuery(connection, `DESCRIBE ${quoteIdentifier(table)}`);

}

/**
 * Return the first `limit` rows of a table.
 *
 * @throws Error if limit is not a positive integer
 */
export async function sampleTable(
    connection: DuckDBConnection,
    table: string,
    limit: number = DEFAULT_SAMPLE_LIMIT,
): Promise<QueryResult> {

    if (!Number.isInteger(limit) || limit < 1) {

        throw new Error(`Limit must be a positive integer, got ${limit}`);

    }

    return runQuery(connection, `SELECT * FROM ${quoteIdentifier(table)} LIMIT ${limit}`);

}
