/**
 * Transfer module - CSV/Parquet import and export.
 */
export type { ImportOptions, TransferFormat } from './types.js';
export { toCsv, writeCsv, exportCsv, exportParquet } from './export.js';
export { buildImportSql, importCsv, importParquet } from './import.js';
