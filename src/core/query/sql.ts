/**
 * SQL text helpers.
 *
 * Identifiers and file paths are interpolated into the few statements
 * this package writes itself (DESCRIBE, COPY, read_csv_auto, ...).
 */

/**
 * Quote an identifier, part by part for dotted names.
 *
 * DuckDB matches quoted identifiers case-insensitively, so quoting
 * never changes which table is found.
 *
 * @example
 * ```typescript
 * quoteIdentifier('users')        // '"users"'
 * quoteIdentifier('main.users')   // '"main"."users"'
 * quoteIdentifier('odd"name')     // '"odd""name"'
 * ```
 */
export function quoteIdentifier(name: string): string {

    const trimmed = name.trim();

    if (!trimmed) {

        throw new Error('Table name is required');

    }

    return trimmed
        .split('.')
        .map((part) => `"${part.replace(/"/g, '""')}"`)
        .join('.');

}

/**
 * Quote a string literal.
 *
 * @example
 * ```typescript
 * quoteLiteral("data/o'brien.csv") // "'data/o''brien.csv'"
 * ```
 */
export function quoteLiteral(value: string): string {

    return `'${value.replace(/'/g, "''")}'`;

}

/**
 * Remove trailing semicolons and whitespace so a query can be
 * embedded in another statement.
 *
 * @example
 * ```typescript
 * stripTrailingSemicolons('SELECT 1;  \n') // 'SELECT 1'
 * ```
 */
export function stripTrailingSemicolons(sql: string): string {

    return sql.replace(/[\s;]+$/, '');

}
