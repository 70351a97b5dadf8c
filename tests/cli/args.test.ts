/**
 * Argument parsing tests.
 */
import { describe, it, expect } from 'vitest';

import { parseCli, parseRouteFromInput, isRoute } from '../../src/cli/args.js';

describe('cli: args', () => {

    describe('parseRouteFromInput', () => {

        it('should return no route for empty input', () => {

            expect(parseRouteFromInput([])).toEqual({ route: null, params: {} });

        });

        it('should map positionals by command', () => {

            expect(parseRouteFromInput(['query', 'SELECT 1'])).toEqual({
                route: 'query',
                params: { sql: 'SELECT 1' },
            });

            expect(parseRouteFromInput(['export-csv', 'SELECT 1', 'out.csv'])).toEqual({
                route: 'export-csv',
                params: { sql: 'SELECT 1', output: 'out.csv' },
            });

            expect(parseRouteFromInput(['import-parquet', 'e.parquet', 'events'])).toEqual({
                route: 'import-parquet',
                params: { file: 'e.parquet', table: 'events' },
            });

        });

        it('should leave missing positionals unset', () => {

            expect(parseRouteFromInput(['import-csv', 'u.csv'])).toEqual({
                route: 'import-csv',
                params: { file: 'u.csv' },
            });

        });

        it('should collect extra positionals', () => {

            expect(parseRouteFromInput(['tables', 'extra'])).toEqual({
                route: 'tables',
                params: { rest: ['extra'] },
            });

        });

        it('should pass unknown commands through without params', () => {

            expect(parseRouteFromInput(['frobnicate', 'x'])).toEqual({
                route: 'frobnicate',
                params: {},
            });

        });

    });

    describe('isRoute', () => {

        it('should recognize commands only', () => {

            expect(isRoute('sample')).toBe(true);
            expect(isRoute('toString')).toBe(false);
            expect(isRoute('nope')).toBe(false);

        });

    });

    describe('parseCli', () => {

        it('should parse global and command flags', () => {

            const parsed = parseCli([
                '--db', 'app.duckdb',
                'sample', 'users',
                '--limit', '3',
                '--format', 'grid',
                '-v',
            ]);

            expect(parsed.route).toBe('sample');
            expect(parsed.params).toEqual({ table: 'users' });
            expect(parsed.flags).toEqual({
                db: 'app.duckdb',
                verbose: true,
                format: 'grid',
                json: false,
                limit: 3,
                outputCsv: undefined,
                outputParquet: undefined,
                replace: false,
            });

        });

        it('should camel-case dashed flags', () => {

            const parsed = parseCli(['query', 'SELECT 1', '--output-csv', 'out.csv', '--json']);

            expect(parsed.flags.outputCsv).toBe('out.csv');
            expect(parsed.flags.json).toBe(true);

        });

        it('should default every flag', () => {

            const parsed = parseCli([]);

            expect(parsed.route).toBeNull();
            expect(parsed.flags.db).toBeUndefined();
            expect(parsed.flags.verbose).toBe(false);
            expect(parsed.flags.replace).toBe(false);

        });

        it('should keep numeric positionals as strings', () => {

            expect(parseCli(['import-csv', 'a.csv', '2024']).params).toEqual({ file: 'a.csv', table: '2024' });
            expect(parseCli(['query', '0']).params).toEqual({ sql: '0' });

        });

    });

});
