/**
 * Query type definitions.
 */

/**
 * A single normalized cell.
 *
 * Engine values without a JSON-friendly form (dates, decimals, lists,
 * structs, blobs, oversized integers) arrive as their text rendering.
 */
export type CellValue = string | number | boolean | null;

/**
 * A value bound to a query parameter.
 */
export type ParamValue = string | number | boolean | bigint | null;

/**
 * Query parameters: positional (`?`, `$1`) or named (`$name`).
 *
 * @example
 * ```typescript
 * const positional: QueryParams = [18, 'active']
 * const named: QueryParams = { age: 18, status: 'active' }
 * ```
 */
export type QueryParams = ParamValue[] | Record<string, ParamValue>;

/**
 * Tabular result of a query.
 *
 * Rows are positional so duplicate column names survive.
 */
export interface QueryResult {

    /** Column names in result order */
    columns: string[];

    /** Row data, one array per row, aligned with `columns` */
    rows: CellValue[][];

    /** Execution duration in milliseconds */
    durationMs: number;

}

/**
 * SQL execution outcome.
 */
export type SqlExecutionResult =
    | ({ success: true } & QueryResult)
    | { success: false; errorMessage: string; durationMs: number };
