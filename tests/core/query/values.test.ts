/**
 * Value normalization tests.
 */
import { describe, it, expect } from 'vitest';

import { normalizeValue, normalizeRow } from '../../../src/core/query/index.js';

describe('query: normalizeValue', () => {

    it('should pass through primitives', () => {

        expect(normalizeValue('a')).toBe('a');
        expect(normalizeValue(1.5)).toBe(1.5);
        expect(normalizeValue(false)).toBe(false);

    });

    it('should map null and undefined to null', () => {

        expect(normalizeValue(null)).toBeNull();
        expect(normalizeValue(undefined)).toBeNull();

    });

    it('should convert safe bigints to numbers', () => {

        expect(normalizeValue(3n)).toBe(3);
        expect(normalizeValue(-9007199254740991n)).toBe(-9007199254740991);

    });

    it('should keep unsafe bigints as decimal text', () => {

        expect(normalizeValue(9007199254740993n)).toBe('9007199254740993');
        expect(normalizeValue(-9007199254740993n)).toBe('-9007199254740993');

    });

    it('should use toString for engine value objects', () => {

        const value = { toString: () => '2024-01-02' };

        expect(normalizeValue(value)).toBe('2024-01-02');

    });

    it('should normalize every cell of a row', () => {

        expect(normalizeRow([1n, null, 'x'])).toEqual([1, null, 'x']);

    });

});
