/**
 * Query module - SQL execution and result normalization.
 */
export type {
    CellValue,
    ParamValue,
    QueryParams,
    QueryResult,
    SqlExecutionResult,
} from './types.js';

export { QueryError } from './errors.js';
export { executeSql, runQuery } from './executor.js';
export { normalizeValue, normalizeRow } from './values.js';
export { quoteIdentifier, quoteLiteral, stripTrailingSemicolons } from './sql.js';
