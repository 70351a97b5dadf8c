/**
 * Cell helpers shared by every table style.
 */
import type { CellValue } from '../query/types.js';
import type { Alignment } from './types.js';

const NUMERIC_TEXT = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Format a cell value for display.
 *
 * Newlines and tabs are escaped so every row stays on one line.
 */
export function formatCellValue(value: CellValue): string {

    if (value === null) return 'NULL';

    return String(value)
        .replace(/\r?\n/g, '\\n')
        .replace(/\t/g, '\\t');

}

/**
 * Check if a value reads as a number.
 */
export function isNumericValue(value: CellValue): boolean {

    if (typeof value === 'number') return true;
    if (typeof value === 'string') return NUMERIC_TEXT.test(value.trim());

    return false;

}

/**
 * Pick the alignment of each column.
 *
 * A column is right aligned when it has at least one non-null cell
 * and every non-null cell is numeric.
 */
export function columnAlignments(columnCount: number, rows: CellValue[][]): Alignment[] {

    const alignments: Alignment[] = [];

    for (let col = 0; col < columnCount; col++) {

        let seen = false;
        let numeric = true;

        for (const row of rows) {

            const value = row[col] ?? null;

            if (value === null) continue;

            seen = true;

            if (!isNumericValue(value)) {

                numeric = false;
                break;

            }

        }

        alignments.push(seen && numeric ? 'right' : 'left');

    }

    return alignments;

}

/**
 * Pad text to a width.
 */
export function pad(text: string, width: number, align: Alignment): string {

    return align === 'right' ? text.padStart(width) : text.padEnd(width);

}
