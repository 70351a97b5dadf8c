/**
 * Connection factory tests.
 */
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { createConnection, resolveDatabasePath } from '../../../src/core/connection/index.js';
import { runQuery } from '../../../src/core/query/index.js';
import { observer } from '../../../src/core/observer.js';
import { makeTestDir, removeTestDir } from '../../utils/tmp.js';

describe('connection: factory', () => {

    describe('resolveDatabasePath', () => {

        it('should fall back to in-memory for empty input', () => {

            expect(resolveDatabasePath(undefined)).toBe(':memory:');
            expect(resolveDatabasePath('   ')).toBe(':memory:');

        });

        it('should trim a path', () => {

            expect(resolveDatabasePath('  data.duckdb ')).toBe('data.duckdb');

        });

    });

    describe('createConnection', () => {

        let dir: string;
        let events: Array<{ event: string; data: unknown }>;
        let cleanup: () => void;

        beforeEach(async () => {

            dir = await makeTestDir();
            events = [];
            cleanup = observer.onPattern(/^connection:/, ({ event, data }) => {

                events.push({ event: String(event), data });

            });

        });

        afterEach(async () => {

            cleanup();
            await removeTestDir(dir);

        });

        it('should open an in-memory database', async () => {

            const conn = await createConnection({ database: '' });

            const result = await runQuery(conn.connection, 'SELECT 1 AS n');

            expect(conn.database).toBe(':memory:');
            expect(result.rows).toEqual([[1]]);

            conn.destroy();

        });

        it('should emit open and close once each', async () => {

            const conn = await createConnection({ database: ':memory:' });

            conn.destroy();
            conn.destroy();

            expect(events).toEqual([
                { event: 'connection:open', data: { database: ':memory:' } },
                { event: 'connection:close', data: { database: ':memory:' } },
            ]);

        });

        it('should persist data in a file database', async () => {

            const database = join(dir, 'persist.duckdb');

            const first = await createConnection({ database });
            await runQuery(first.connection, "CREATE TABLE notes AS SELECT 'kept' AS body");
            first.destroy();

            const second = await createConnection({ database });
            const result = await runQuery(second.connection, 'SELECT body FROM notes');
            second.destroy();

            expect(result.rows).toEqual([['kept']]);

        });

        it('should emit connection:error and rethrow when the path cannot be opened', async () => {

            const database = join(dir, 'missing', 'nested', 'db.duckdb');

            await expect(createConnection({ database })).rejects.toThrow();

            expect(events.map((e) => e.event)).toEqual(['connection:error']);

        });

    });

});
