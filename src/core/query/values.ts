/**
 * Engine value normalization.
 *
 * DuckDB returns bigints for 64-bit and wider integers and value
 * classes (dates, decimals, lists, structs, ...) that render
 * themselves through `toString()`.
 */
import type { CellValue } from './types.js';

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Convert an engine value to a CellValue.
 *
 * @example
 * ```typescript
 * normalizeValue(3n)                    // 3
 * normalizeValue(9007199254740993n)     // '9007199254740993'
 * ```
 */
export function normalizeValue(value: unknown): CellValue {

    if (value === null || value === undefined) {

        return null;

    }

    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {

        return value;

    }

    if (typeof value === 'bigint') {

        return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value.toString();

    }

    return String(value);

}

/**
 * Normalize every cell of a row.
 */
export function normalizeRow(row: readonly unknown[]): CellValue[] {

    return row.map(normalizeValue);

}
