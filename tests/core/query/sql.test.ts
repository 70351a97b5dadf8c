/**
 * SQL helper tests.
 */
import { describe, it, expect } from 'vitest';

import {
    quoteIdentifier,
    quoteLiteral,
    stripTrailingSemicolons,
} from '../../../src/core/query/index.js';

describe('query: sql helpers', () => {

    describe('quoteIdentifier', () => {

        it('should quote a plain name', () => {

            expect(quoteIdentifier('users')).toBe('"users"');

        });

        it('should quote each part of a dotted name', () => {

            expect(quoteIdentifier('main.users')).toBe('"main"."users"');

        });

        it('should double embedded quotes', () => {

            expect(quoteIdentifier('odd"name')).toBe('"odd""name"');

        });

        it('should trim surrounding whitespace', () => {

            expect(quoteIdentifier('  users ')).toBe('"users"');

        });

        it('should throw on a blank name', () => {

            expect(() => quoteIdentifier('   ')).toThrow('Table name is required');

        });

    });

    describe('quoteLiteral', () => {

        it('should double single quotes', () => {

            expect(quoteLiteral("data/o'brien.csv")).toBe("'data/o''brien.csv'");

        });

    });

    describe('stripTrailingSemicolons', () => {

        it('should remove trailing semicolons and whitespace', () => {

            expect(stripTrailingSemicolons('SELECT 1;  \n')).toBe('SELECT 1');
            expect(stripTrailingSemicolons('SELECT 1;;')).toBe('SELECT 1');

        });

        it('should leave inner semicolons alone', () => {

            expect(stripTrailingSemicolons("SELECT ';' AS s")).toBe("SELECT ';' AS s");

        });

    });

});
