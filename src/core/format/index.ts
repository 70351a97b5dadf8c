/**
 * Format module - text rendering of query results.
 */
export {
    OUTPUT_FORMATS,
    DEFAULT_OUTPUT_FORMAT,
    type OutputFormat,
    type Alignment,
} from './types.js';

export { formatCellValue, isNumericValue, columnAlignments } from './cells.js';
export { renderTable, renderResult, renderJson, toRowObjects } from './table.js';
