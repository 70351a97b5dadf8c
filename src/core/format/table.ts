/**
 * Table renderer.
 *
 * Renders a QueryResult as text in one of the OUTPUT_FORMATS.
 *
 * Every column is at least two characters wider than its header;
 * numeric columns (header included) are right aligned.
 *
 * @example
 * ```typescript
 * renderTable({ columns: ['id', 'name'], rows: [[1, 'Alice']], durationMs: 0 }, 'psql')
 * // +------+--------+
 * // |   id | name   |
 * // |------+--------|
 * // |    1 | Alice  |
 * // +------+--------+
 * ```
 */
import type { QueryResult } from '../query/types.js';
import { columnAlignments, formatCellValue, pad } from './cells.js';
import type { Alignment, OutputFormat } from './types.js';

const MIN_PADDING = 2;

/**
 * Cells, widths and alignments computed once per render.
 */
interface Layout {
    header: string[];
    body: string[][];
    widths: number[];
    alignments: Alignment[];
}

function escapePipes(text: string): string {

    return text.replace(/\|/g, '\\|');

}

function buildLayout(result: QueryResult, escape?: (text: string) => string): Layout {

    const transform = escape ?? ((text: string) => text);

    const header = result.columns.map(transform);
    const body = result.rows.map((row) =>
        result.columns.map((_, col) => transform(formatCellValue(row[col] ?? null))),
    );

    const widths = header.map((name, col) =>
        body.reduce(
            (max, cells) => Math.max(max, cells[col]?.length ?? 0),
            name.length + MIN_PADDING,
        ),
    );

    return {
        header,
        body,
        widths,
        alignments: columnAlignments(result.columns.length, result.rows),
    };

}

function alignCells(layout: Layout, cells: string[]): string[] {

    return cells.map((cell, col) =>
        pad(cell, layout.widths[col] ?? 0, layout.alignments[col] ?? 'left'),
    );

}

/**
 * A horizontal rule such as `+------+--------+`.
 */
function rule(layout: Layout, fill: string, edge: string, joint: string): string {

    return edge + layout.widths.map((w) => fill.repeat(w + 2)).join(joint) + edge;

}

/**
 * A boxed row such as `|   id | name   |`.
 */
function boxedRow(layout: Layout, cells: string[]): string {

    return `| ${alignCells(layout, cells).join(' | ')} |`;

}

/**
 * A borderless row, trailing whitespace removed.
 */
function bareRow(layout: Layout, cells: string[]): string {

    return alignCells(layout, cells).join('  ').trimEnd();

}

function renderPsql(layout: Layout): string[] {

    const border = rule(layout, '-', '+', '+');

    return [
        border,
        boxedRow(layout, layout.header),
        rule(layout, '-', '|', '+'),
        ...layout.body.map((cells) => boxedRow(layout, cells)),
        border,
    ];

}

function renderGrid(layout: Layout): string[] {

    const border = rule(layout, '-', '+', '+');
    const lines = [border, boxedRow(layout, layout.header), rule(layout, '=', '+', '+')];

    for (const cells of layout.body) {

        lines.push(boxedRow(layout, cells), border);

    }

    return lines;

}

function renderSimple(layout: Layout): string[] {

    return [
        bareRow(layout, layout.header),
        layout.widths.map((w) => '-'.repeat(w)).join('  '),
        ...layout.body.map((cells) => bareRow(layout, cells)),
    ];

}

function renderPlain(layout: Layout): string[] {

    return [
        bareRow(layout, layout.header),
        ...layout.body.map((cells) => bareRow(layout, cells)),
    ];

}

function renderMarkdown(layout: Layout): string[] {

    const separator = layout.widths.map((w, col) =>
        layout.alignments[col] === 'right'
            ? `${'-'.repeat(w + 1)}:`
            : `:${'-'.repeat(w + 1)}`,
    );

    return [
        boxedRow(layout, layout.header),
        `|${separator.join('|')}|`,
        ...layout.body.map((cells) => boxedRow(layout, cells)),
    ];

}

const RENDERERS: Record<OutputFormat, (layout: Layout) => string[]> = {
    psql: renderPsql,
    grid: renderGrid,
    simple: renderSimple,
    plain: renderPlain,
    markdown: renderMarkdown,
};

/**
 * Render a result as a text table (no trailing newline).
 */
export function renderTable(result: QueryResult, format: OutputFormat): string {

    const layout = buildLayout(result, format === 'markdown' ? escapePipes : undefined);

    return RENDERERS[format](layout).join('\n');

}

/**
 * Render a result the way the CLI prints it.
 *
 * Empty results print `No results.`; otherwise the table is followed
 * by a blank line and the row count.
 *
 * @example
 * ```typescript
 * renderResult(result, 'plain')
 * // '  id  name\n   1  Alice\n\n(1 rows)'
 * ```
 */
export function renderResult(result: QueryResult, format: OutputFormat): string {

    const count = result.rows.length;

    if (count === 0) {

        return 'No results.';

    }

    return `${renderTable(result, format)}\n\n(${count} rows)`;

}

/**
 * Convert rows to objects keyed by column name.
 *
 * A repeated column name keeps the value of its last occurrence.
 */
export function toRowObjects(result: QueryResult): Record<string, unknown>[] {

    return result.rows.map((row) =>
        Object.fromEntries(result.columns.map((name, col) => [name, row[col] ?? null])),
    );

}

/**
 * Render rows as a pretty-printed JSON array.
 */
export function renderJson(result: QueryResult): string {

    return JSON.stringify(toRowObjects(result), null, 2);

}
