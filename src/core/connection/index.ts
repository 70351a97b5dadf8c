/**
 * Connection module - DuckDB handle lifecycle.
 */
export * from './types.js';
export { createConnection, resolveDatabasePath } from './factory.js';
