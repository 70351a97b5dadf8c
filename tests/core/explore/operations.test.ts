/**
 * Explore operations tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { createConnection, type ConnectionResult } from '../../../src/core/connection/index.js';
import { runQuery, QueryError } from '../../../src/core/query/index.js';
import { listTables, describeTable, sampleTable } from '../../../src/core/explore/index.js';

describe('explore: operations', () => {

    let conn: ConnectionResult;

    beforeEach(async () => {

        conn = await createConnection({ database: ':memory:' });

    });

    afterEach(() => {

        conn.destroy();

    });

    async function seed(): Promise<void> {

        await runQuery(
            conn.connection,
            "CREATE TABLE users (id INTEGER, name VARCHAR); INSERT INTO users VALUES (1, 'Alice'), (2, 'Bob'), (3, 'Carol')",
        );

    }

    describe('listTables', () => {

        it('should return no rows for an empty database', async () => {

            const result = await listTables(conn.connection);

            expect(result.columns).toEqual(['name']);
            expect(result.rows).toEqual([]);

        });

        it('should list created tables', async () => {

            await seed();

            const result = await listTables(conn.connection);

            expect(result.rows).toEqual([['users']]);

        });

    });

    describe('describeTable', () => {

        it('should return column names and types', async () => {

            await seed();

            const result = await describeTable(conn.connection, 'users');

            expect(result.columns[0]).toBe('column_name');
            expect(result.columns[1]).toBe('column_type');
            expect(result.rows.map((row) => row.slice(0, 2))).toEqual([
                ['id', 'INTEGER'],
                ['name', 'VARCHAR'],
            ]);

        });

        it('should throw QueryError for a missing table', async () => {

            await expect(describeTable(conn.connection, 'ghosts')).rejects.toBeInstanceOf(QueryError);

        });

    });

    describe('sampleTable', () => {

        it('should return at most limit rows', async () => {

            await seed();

            const result = await sampleTable(conn.connection, 'users', 2);

            expect(result.rows).toEqual([
                [1, 'Alice'],
                [2, 'Bob'],
            ]);

        });

        it('should default to ten rows', async () => {

            await runQuery(conn.connection, 'CREATE TABLE nums AS SELECT range AS n FROM range(25)');

            const result = await sampleTable(conn.connection, 'nums');

            expect(result.rows).toHaveLength(10);

        });

        it('should reject a non-positive limit', async () => {

            await seed();

            await expect(sampleTable(conn.connection, 'users', 0))
                .rejects.toThrow('Limit must be a positive integer, got 0');

        });

    });

});
