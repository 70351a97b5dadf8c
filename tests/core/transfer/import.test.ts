/**
 * Import tests.
 */
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { createConnection, type ConnectionResult } from '../../../src/core/connection/index.js';
import { runQuery, QueryError } from '../../../src/core/query/index.js';
import { buildImportSql, importCsv } from '../../../src/core/transfer/index.js';
import { MissingFileError } from '../../../src/core/shared/index.js';
import { observer } from '../../../src/core/observer.js';

const USERS_CSV = join(process.cwd(), 'tests', 'fixtures', 'users.csv');

describe('transfer: import', () => {

    describe('buildImportSql', () => {

        it('should build a CREATE TABLE for CSV', () => {

            expect(buildImportSql('csv', 'data/users.csv', 'users'))
                .toBe(`CREATE TABLE "users" AS SELECT * FROM read_csv_auto('data/users.csv')`);

        });

        it('should build a CREATE OR REPLACE TABLE for Parquet', () => {

            expect(buildImportSql('parquet', "o'brien.parquet", 'main.events', { replace: true }))
                .toBe(`CREATE OR REPLACE TABLE "main"."events" AS SELECT * FROM read_parquet('o''brien.parquet')`);

        });

    });

    describe('importCsv', () => {

        let conn: ConnectionResult;

        beforeEach(async () => {

            conn = await createConnection({ database: ':memory:' });

        });

        afterEach(() => {

            conn.destroy();

        });

        it('should create a table with detected columns', async () => {

            await importCsv(conn.connection, USERS_CSV, 'users');

            const result = await runQuery(conn.connection, 'SELECT name, age FROM users ORDER BY id');

            expect(result.rows).toEqual([
                ['Alice', 34],
                ['Bob', 28],
                ['Carol', 45],
            ]);

        });

        it('should fail when the table exists', async () => {

            await importCsv(conn.connection, USERS_CSV, 'users');

            await expect(importCsv(conn.connection, USERS_CSV, 'users'))
                .rejects.toBeInstanceOf(QueryError);

        });

        it('should replace an existing table with replace', async () => {

            await runQuery(conn.connection, 'CREATE TABLE users AS SELECT 1 AS only_column');

            await importCsv(conn.connection, USERS_CSV, 'users', { replace: true });

            const result = await runQuery(conn.connection, 'SELECT count(*) AS n FROM users');

            expect(result.rows).toEqual([[3]]);

        });

        it('should throw MissingFileError before touching the engine', async () => {

            const events: string[] = [];
            const cleanup = observer.onPattern(/^(import|query):/, ({ event }) => {

                events.push(String(event));

            });

            await expect(importCsv(conn.connection, 'no/such/file.csv', 'users'))
                .rejects.toThrow(new MissingFileError('CSV', 'no/such/file.csv'));

            cleanup();

            expect(events).toEqual([]);

        });

    });

});
