/**
 * SDK Client Implementation.
 *
 * The Client class owns one DuckDB database handle and exposes every
 * operation of the CLI as a method.
 */
import type { DuckDBConnection } from '@duckdb/node-api';

import { createConnection, IN_MEMORY, type ConnectionResult } from '../core/connection/index.js';
import { runQuery, type QueryParams, type QueryResult } from '../core/query/index.js';
import {
    DEFAULT_SAMPLE_LIMIT,
    listTables,
    describeTable as coreDescribeTable,
    sampleTable,
} from '../core/explore/index.js';
import {
    exportCsv,
    exportParquet,
    importCsv as coreImportCsv,
    importParquet as coreImportParquet,
    type ImportOptions,
} from '../core/transfer/index.js';
import { readSqlFile } from '../core/shared/index.js';
import { observer, type ClientObserver } from '../core/observer.js';

import { requireConnection } from './guards.js';
import type { CreateClientOptions } from './types.js';

// ─────────────────────────────────────────────────────────────
// Client Class
// ─────────────────────────────────────────────────────────────

/**
 * DuckDB client.
 *
 * @example
 * ```typescript
 * const client = createClient({ database: 'analytics.duckdb' })
 * await client.connect()
 *
 * const result = await client.executeQuery('SELECT count(*) AS n FROM sales')
 * console.log(result.rows[0])  // [1024]
 *
 * client.close()
 * ```
 */
export class Client {

    #connection: ConnectionResult | null = null;
    #options: CreateClientOptions;

    constructor(options: CreateClientOptions = {}) {

        this.#options = options;

    }

    // ─────────────────────────────────────────────────────────
    // Read-only Properties
    // ─────────────────────────────────────────────────────────

    /**
     * Database path, as opened (or as it will be opened).
     */
    get database(): string {

        return this.#connection?.database ?? (this.#options.database?.trim() || IN_MEMORY);

    }

    get connected(): boolean {

        return this.#connection !== null;

    }

    get observer(): ClientObserver {

        return observer;

    }

    // ─────────────────────────────────────────────────────────
    // Lifecycle
    // ─────────────────────────────────────────────────────────

    /**
     * Open the database. Does nothing when already connected.
     */
    async connect(): Promise<void> {

        if (this.#connection) return;

        this.#connection = await createConnection({
            database: this.#options.database ?? IN_MEMORY,
            readOnly: this.#options.readOnly,
        });

    }

    /**
     * Close the database. Safe to call more than once.
     */
    close(): void {

        if (!this.#connection) return;

        this.#connection.destroy();
        this.#connection = null;

    }

    #require(operation: string): DuckDBConnection {

        return requireConnection(this.#connection, operation).connection;

    }

    // ─────────────────────────────────────────────────────────
    // SQL Execution
    // ─────────────────────────────────────────────────────────

    /**
     * Run SQL and return the result of its last statement.
     *
     * @example
     * ```typescript
     * await client.executeQuery('SELECT * FROM users WHERE age > ?', [30])
     * await client.executeQuery('SELECT * FROM users WHERE name = $name', { name: 'Alice' })
     * ```
     */
    async executeQuery(sql: string, params?: QueryParams): Promise<QueryResult> {

        return runQuery(this.#require('execute query'), sql, params);

    }

    /**
     * Run the SQL in a file and return the result of its last statement.
     *
     * @throws MissingFileError if the file does not exist
     */
    async executeFile(filepath: string): Promise<QueryResult> {

        const connection = this.#require('execute file');

        observer.emit('file:start', { filepath });

        const sql = await readSqlFile(filepath);

        return runQuery(connection, sql);

    }

    // ─────────────────────────────────────────────────────────
    // Exploration
    // ─────────────────────────────────────────────────────────

    /**
     * List tables in the database.
     */
    async showTables(): Promise<QueryResult> {

        return listTables(this.#require('show tables'));

    }

    /**
     * Column names, types and constraints of a table.
     */
    async describeTable(table: string): Promise<QueryResult> {

        return coreDescribeTable(this.#require('describe table'), table);

    }

    /**
     * First `limit` rows of a table.
     */
    async getTableSample(table: string, limit: number = DEFAULT_SAMPLE_LIMIT): Promise<QueryResult> {

        return sampleTable(this.#require('sample table'), table, limit);

    }

    // ─────────────────────────────────────────────────────────
    // Import / Export
    // ─────────────────────────────────────────────────────────

    /**
     * Write a query result to a CSV file.
     *
     * @returns Number of rows written
     */
    async exportToCsv(sql: string, output: string): Promise<number> {

        return exportCsv(this.#require('export to CSV'), sql, output);

    }

    /**
     * Write a query result to a Parquet file.
     *
     * @returns Number of rows written, when the engine reports it
     */
    async exportToParquet(sql: string, output: string): Promise<number | undefined> {

        return exportParquet(this.#require('export to Parquet'), sql, output);

    }

    /**
     * Create `table` from a CSV file, with column types detected by the engine.
     */
    async importCsv(file: string, table: string, options: ImportOptions = {}): Promise<void> {

        await coreImportCsv(this.#require('import CSV'), file, table, options);

    }

    /**
     * Create `table` from a Parquet file.
     */
    async importParquet(file: string, table: string, options: ImportOptions = {}): Promise<void> {

        await coreImportParquet(this.#require('import Parquet'), file, table, options);

    }

}
