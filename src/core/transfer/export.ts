/**
 * Export query results to CSV and Parquet files.
 *
 * CSV is written from the fetched rows with csv-stringify. Parquet is
 * written by the engine itself through COPY ... TO.
 */
import { writeFile } from 'node:fs/promises';

import { stringify } from 'csv-stringify/sync';
import type { DuckDBConnection } from '@duckdb/node-api';

import { observer } from '../observer.js';
import { runQuery } from '../query/executor.js';
import { quoteLiteral, stripTrailingSemicolons } from '../query/sql.js';
import type { QueryResult } from '../query/types.js';

/**
 * Render a result as CSV text: a header line, then one line per row.
 *
 * NULL becomes an empty field, booleans are written as true/false.
 *
 * @example
 * ```typescript
 * toCsv({ columns: ['id', 'name'], rows: [[1, 'Alice'], [2, null]], durationMs: 0 })
 * // 'id,name\n1,Alice\n2,\n'
 * ```
 */
export function toCsv(result: QueryResult): string {

    return stringify([result.columns, ...result.rows], {
        cast: {
            boolean: (value) => (value ? 'true' : 'false'),
        },
    });

}

/**
 * Write an already fetched result to a CSV file.
 *
 * @returns Number of data rows written
 */
export async function writeCsv(result: QueryResult, output: string): Promise<number> {

    await writeFile(output, toCsv(result), 'utf-8');

    return result.rows.length;

}

/**
 * Run a query and write its result to a CSV file.
 *
 * @returns Number of data rows written
 *
 * @example
 * ```typescript
 * const count = await exportCsv(connection, 'SELECT * FROM sales', 'sales.csv')
 * ```
 */
export async function exportCsv(
    connection: DuckDBConnection,
    sql: string,
    output: string,
): Promise<number> {

    observer.emit('export:start', { format: 'csv', output });

    const result = await runQuery(connection, sql);
    const rowCount = await writeCsv(result, output);

    observer.emit('export:complete', { format: 'csv', output, rowCount });

    return rowCount;

}

/**
 * Write a query result to a Parquet file using the engine's COPY.
 *
 * @returns Number of rows written, as reported by COPY
 *
 * @example
 * ```typescript
 * await exportParquet(connection, 'SELECT * FROM sales;', 'sales.parquet')
 * // runs: COPY (\nSELECT * FROM sales\n) TO 'sales.parquet' (FORMAT PARQUET)
 * ```
 */
export async function exportParquet(
    connection: DuckDBConnection,
    sql: string,
    output: string,
): Promise<number | undefined> {

    observer.emit('export:start', { format: 'parquet', output });

    // Newlines keep a trailing `--` comment off the closing paren
    const copy = `COPY (\n${stripTrailingSemicolons(sql)}\n) TO ${quoteLiteral(output)} (FORMAT PARQUET)`;
    const result = await runQuery(connection, copy);

    const count = result.rows[0]?.[0];
    const rowCount = typeof count === 'number' ? count : undefined;

    observer.emit('export:complete', { format: 'parquet', output, rowCount });

    return rowCount;

}
