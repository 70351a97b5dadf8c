/**
 * Table renderer tests.
 */
import { describe, it, expect } from 'vitest';

import {
    renderTable,
    renderResult,
    renderJson,
    toRowObjects,
} from '../../../src/core/format/index.js';
import type { QueryResult } from '../../../src/core/query/index.js';

const users: QueryResult = {
    columns: ['id', 'name'],
    rows: [
        [1, 'Alice'],
        [2, 'Bob'],
    ],
    durationMs: 0,
};

describe('format: renderTable', () => {

    it('should render psql style with borders and a header rule', () => {

        expect(renderTable(users, 'psql')).toBe([
            '+------+--------+',
            '|   id | name   |',
            '|------+--------|',
            '|    1 | Alice  |',
            '|    2 | Bob    |',
            '+------+--------+',
        ].join('\n'));

    });

    it('should render grid style with a rule after every row', () => {

        expect(renderTable(users, 'grid')).toBe([
            '+------+--------+',
            '|   id | name   |',
            '+======+========+',
            '|    1 | Alice  |',
            '+------+--------+',
            '|    2 | Bob    |',
            '+------+--------+',
        ].join('\n'));

    });

    it('should render simple style with dashes under the header', () => {

        expect(renderTable(users, 'simple')).toBe([
            '  id  name',
            '----  ------',
            '   1  Alice',
            '   2  Bob',
        ].join('\n'));

    });

    it('should render plain style without rules', () => {

        expect(renderTable(users, 'plain')).toBe([
            '  id  name',
            '   1  Alice',
            '   2  Bob',
        ].join('\n'));

    });

    it('should render markdown with alignment colons', () => {

        expect(renderTable(users, 'markdown')).toBe([
            '|   id | name   |',
            '|-----:|:-------|',
            '|    1 | Alice  |',
            '|    2 | Bob    |',
        ].join('\n'));

    });

    it('should widen a column to its widest cell', () => {

        const result: QueryResult = {
            columns: ['c'],
            rows: [['abcdef']],
            durationMs: 0,
        };

        expect(renderTable(result, 'psql')).toBe([
            '+--------+',
            '| c      |',
            '|--------|',
            '| abcdef |',
            '+--------+',
        ].join('\n'));

    });

    it('should render NULL and escape newlines', () => {

        const result: QueryResult = {
            columns: ['id', 'note'],
            rows: [
                [1, null],
                [2, 'a\nb'],
            ],
            durationMs: 0,
        };

        expect(renderTable(result, 'plain')).toBe([
            '  id  note',
            '   1  NULL',
            '   2  a\\nb',
        ].join('\n'));

    });

    it('should right align numeric text', () => {

        const result: QueryResult = {
            columns: ['price'],
            rows: [['1.50'], ['10']],
            durationMs: 0,
        };

        expect(renderTable(result, 'plain')).toBe([
            '  price',
            '   1.50',
            '     10',
        ].join('\n'));

    });

    it('should left align a column holding only NULL', () => {

        const result: QueryResult = {
            columns: ['x'],
            rows: [[null]],
            durationMs: 0,
        };

        expect(renderTable(result, 'plain')).toBe('x\nNULL');

    });

    it('should escape pipes in markdown cells', () => {

        const result: QueryResult = {
            columns: ['a|b'],
            rows: [['x|y']],
            durationMs: 0,
        };

        expect(renderTable(result, 'markdown')).toBe([
            '| a\\|b   |',
            '|:-------|',
            '| x\\|y   |',
        ].join('\n'));

    });

});

describe('format: renderResult', () => {

    it('should print No results. for an empty result', () => {

        const empty: QueryResult = { columns: ['id'], rows: [], durationMs: 0 };

        expect(renderResult(empty, 'psql')).toBe('No results.');

    });

    it('should append the row count', () => {

        expect(renderResult(users, 'plain')).toBe([
            '  id  name',
            '   1  Alice',
            '   2  Bob',
            '',
            '(2 rows)',
        ].join('\n'));

    });

    it('should keep the plural count for one row', () => {

        const one: QueryResult = { columns: ['n'], rows: [[7]], durationMs: 0 };

        expect(renderResult(one, 'plain')).toBe('  n\n  7\n\n(1 rows)');

    });

});

describe('format: renderJson', () => {

    it('should render rows as objects keyed by column', () => {

        expect(JSON.parse(renderJson(users))).toEqual([
            { id: 1, name: 'Alice' },
            { id: 2, name: 'Bob' },
        ]);

    });

    it('should render an empty result as an empty array', () => {

        expect(renderJson({ columns: ['id'], rows: [], durationMs: 0 })).toBe('[]');

    });

    it('should keep the last value of a repeated column name', () => {

        const result: QueryResult = {
            columns: ['v', 'v'],
            rows: [[1, 2]],
            durationMs: 0,
        };

        expect(toRowObjects(result)).toEqual([{ v: 2 }]);

    });

});
