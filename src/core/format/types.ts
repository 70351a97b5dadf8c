/**
 * Output format definitions.
 */

/**
 * Table styles understood by renderTable.
 *
 * - psql: PostgreSQL-style boxed table
 * - grid: boxed table with a rule between every row
 * - simple: dashed rule under the header, no borders
 * - plain: columns only
 * - markdown: GitHub pipe table with alignment colons
 */
export const OUTPUT_FORMATS = ['psql', 'grid', 'simple', 'plain', 'markdown'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const DEFAULT_OUTPUT_FORMAT: OutputFormat = 'psql';

/**
 * Column alignment.
 */
export type Alignment = 'left' | 'right';
