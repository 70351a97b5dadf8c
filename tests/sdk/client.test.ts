/**
 * SDK client tests.
 */
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
    createClient,
    withClient,
    Client,
    NotConnectedError,
    MissingFileError,
    QueryError,
} from '../../src/sdk/index.js';
import { makeTestDir, removeTestDir } from '../utils/tmp.js';

const USERS_CSV = join(process.cwd(), 'tests', 'fixtures', 'users.csv');

describe('sdk: client', () => {

    let dir: string;

    beforeEach(async () => {

        dir = await makeTestDir();

    });

    afterEach(async () => {

        await removeTestDir(dir);

    });

    describe('lifecycle', () => {

        it('should start unconnected on an in-memory database', () => {

            const client = createClient();

            expect(client).toBeInstanceOf(Client);
            expect(client.connected).toBe(false);
            expect(client.database).toBe(':memory:');

        });

        it('should throw NotConnectedError before connect', async () => {

            const client = createClient();

            await expect(client.showTables()).rejects.toThrow(
                new NotConnectedError('show tables'),
            );
            await expect(client.showTables()).rejects.toThrow(
                'Cannot show tables: not connected. Call connect() first.',
            );

        });

        it('should throw NotConnectedError after close', async () => {

            const client = createClient();

            await client.connect();
            client.close();
            client.close();

            expect(client.connected).toBe(false);
            await expect(client.executeQuery('SELECT 1')).rejects.toBeInstanceOf(NotConnectedError);

        });

        it('should connect once', async () => {

            const client = createClient();

            await client.connect();
            await client.executeQuery('CREATE TABLE kept (x INTEGER)');
            await client.connect();

            const tables = await client.showTables();
            client.close();

            expect(tables.rows).toEqual([['kept']]);

        });

    });

    describe('withClient', () => {

        it('should return the callback result', async () => {

            const result = await withClient({}, (client) => client.executeQuery('SELECT 42 AS answer'));

            expect(result.rows).toEqual([[42]]);

        });

        it('should close the client when the callback throws', async () => {

            const seen: { client?: Client } = {};

            const failing = withClient({}, async (client) => {

                seen.client = client;
                throw new Error('boom');

            });

            await expect(failing).rejects.toThrow('boom');
            expect(seen.client?.connected).toBe(false);

        });

    });

    describe('operations', () => {

        let client: Client;

        beforeEach(async () => {

            client = createClient({ database: join(dir, 'sdk.duckdb') });
            await client.connect();
            await client.importCsv(USERS_CSV, 'users');

        });

        afterEach(() => {

            client.close();

        });

        it('should run parameterized queries', async () => {

            const result = await client.executeQuery('SELECT name FROM users WHERE city = $city', { city: 'Oslo' });

            expect(result.columns).toEqual(['name']);
            expect(result.rows).toEqual([['Bob']]);

        });

        it('should run a SQL file', async () => {

            const sqlFile = join(dir, 'count.sql');
            await writeFile(sqlFile, 'SELECT count(*) AS n FROM users;');

            const result = await client.executeFile(sqlFile);

            expect(result.rows).toEqual([[3]]);

        });

        it('should throw MissingFileError for a missing SQL file', async () => {

            await expect(client.executeFile(join(dir, 'none.sql'))).rejects.toBeInstanceOf(MissingFileError);

        });

        it('should describe and sample a table', async () => {

            const schema = await client.describeTable('users');
            const sample = await client.getTableSample('users', 1);

            expect(schema.rows.map((row) => row[0])).toEqual(['id', 'name', 'age', 'city']);
            expect(sample.rows).toEqual([[1, 'Alice', 34, 'Lisbon']]);

        });

        it('should throw QueryError for bad SQL', async () => {

            await expect(client.executeQuery('SELECT FROM WHERE')).rejects.toBeInstanceOf(QueryError);

        });

        it('should export to CSV and Parquet', async () => {

            const csv = join(dir, 'out.csv');
            const parquet = join(dir, 'out.parquet');

            expect(await client.exportToCsv('SELECT id, city FROM users ORDER BY id', csv)).toBe(3);
            expect(await client.exportToParquet('SELECT * FROM users', parquet)).toBe(3);

            expect(await readFile(csv, 'utf-8')).toBe('id,city\n1,Lisbon\n2,Oslo\n3,Lima\n');

            await client.importParquet(parquet, 'users_parquet');

            const result = await client.executeQuery('SELECT count(*) AS n FROM users_parquet');

            expect(result.rows).toEqual([[3]]);

        });

        it('should replace a table on import with replace', async () => {

            await client.importCsv(USERS_CSV, 'users', { replace: true });

            const tables = await client.showTables();

            expect(tables.rows).toEqual([['users']]);

        });

    });

});
