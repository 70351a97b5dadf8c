/**
 * Shared utilities used across core modules.
 */
export { MissingFileError, assertFileExists, readSqlFile } from './files.js';
export { toError } from './errors.js';
