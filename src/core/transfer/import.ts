/**
 * Import CSV and Parquet files into new tables.
 *
 * The engine reads the file (read_csv_auto / read_parquet) and infers
 * the column types; this module only checks that the file exists.
 */
import type { DuckDBConnection } from '@duckdb/node-api';

import { observer } from '../observer.js';
import { runQuery } from '../query/executor.js';
import { quoteIdentifier, quoteLiteral } from '../query/sql.js';
import { assertFileExists } from '../shared/files.js';
import type { ImportOptions, TransferFormat } from './types.js';

const READERS: Record<TransferFormat, { fn: string; label: string }> = {
    csv: { fn: 'read_csv_auto', label: 'CSV' },
    parquet: { fn: 'read_parquet', label: 'Parquet' },
};

/**
 * Build the CREATE TABLE ... AS statement for an import.
 *
 * @example
 * ```typescript
 * buildImportSql('csv', 'data/users.csv', 'users')
 * // CREATE TABLE "users" AS SELECT * FROM read_csv_auto('data/users.csv')
 * ```
 */
export function buildImportSql(
    format: TransferFormat,
    file: string,
    table: string,
    options: ImportOptions = {},
): string {

    const create = options.replace ? 'CREATE OR REPLACE TABLE' : 'CREATE TABLE';

    return `${create} ${quoteIdentifier(table)} AS SELECT * FROM ${READERS[format].fn}(${quoteLiteral(file)})`;

}

async function importFile(
    connection: DuckDBConnection,
    format: TransferFormat,
    file: string,
    table: string,
    options: ImportOptions,
): Promise<void> {

    await assertFileExists(file, READERS[format].label);

    observer.emit('import:start', { format, file, table });

    await runQuery(connection, buildImportSql(format, file, table, options));

    observer.emit('import:complete', { format, file, table });

}

/**
 * Create a table from a CSV file.
 *
 * @throws MissingFileError if the file does not exist
 * @throws QueryError if the table exists (without `replace`) or the file cannot be parsed
 */
export async function importCsv(
    connection: DuckDBConnection,
    file: string,
    table: string,
    options: ImportOptions = {},
): Promise<void> {

    await importFile(connection, 'csv', file, table, options);

}

/**
 * Create a table from a Parquet file.
 *
 * @throws MissingFileError if the file does not exist
 * @throws QueryError if the table exists (without `replace`) or the file cannot be read
 */
export async function importParquet(
    connection: DuckDBConnection,
    file: string,
    table: string,
    options: ImportOptions = {},
): Promise<void> {

    await importFile(connection, 'parquet', file, table, options);

}
