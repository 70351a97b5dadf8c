/**
 * SQL executor.
 *
 * Runs SQL through a DuckDB connection and returns structured results.
 */
import type { DuckDBConnection, DuckDBResultReader } from '@duckdb/node-api';

import { observer } from '../observer.js';
import { toError } from '../shared/errors.js';
import { QueryError } from './errors.js';
import { normalizeRow } from './values.js';
import type { QueryParams, QueryResult, SqlExecutionResult } from './types.js';

/**
 * Execute SQL and return structured results.
 *
 * Several statements may be passed at once; the result of the last
 * one is returned. Emits observer events before and after execution.
 *
 * @example
 * ```typescript
 * const result = await executeSql(connection, 'SELECT * FROM users WHERE age > $age', { age: 18 })
 *
 * if (result.success) {
 *     console.log(result.columns)  // ['id', 'name', 'age']
 *     console.log(result.rows)     // [[1, 'Alice', 30], ...]
 * }
 * else {
 *     console.error(result.errorMessage)
 * }
 * ```
 */
export async function executeSql(
    connection: DuckDBConnection,
    sql: string,
    params?: QueryParams,
): Promise<SqlExecutionResult> {

    const start = performance.now();

    observer.emit('query:before', { sql });

    let reader: DuckDBResultReader;

    try {

        reader = await connection.runAndReadAll(sql, params);

    }
    catch (err) {

        const durationMs = Math.round(performance.now() - start);
        const errorMessage = toError(err).message;

        observer.emit('query:failed', { sql, error: errorMessage, durationMs });

        return {
            success: false,
            errorMessage,
            durationMs,
        };

    }

    const durationMs = Math.round(performance.now() - start);

    const columns = reader.columnNames();
    const rows = reader.getRows().map(normalizeRow);

    observer.emit('query:complete', { sql, rowCount: rows.length, durationMs });

    return {
        success: true,
        columns,
        rows,
        durationMs,
    };

}

/**
 * Execute SQL and return the result, throwing on failure.
 *
 * @throws QueryError with the engine's message
 */
export async function runQuery(
    connection: DuckDBConnection,
    sql: string,
    params?: QueryParams,
): Promise<QueryResult> {

    const result = await executeSql(connection, sql, params);

    if (!result.success) {

        throw new QueryError(sql, result.errorMessage);

    }

    const { columns, rows, durationMs } = result;

    return { columns, rows, durationMs };

}
