/**
 * Transfer type definitions.
 */
export type { TransferFormat } from '../observer.js';

/**
 * Options for importing a file into a table.
 */
export interface ImportOptions {

    /** Replace the table if it already exists (CREATE OR REPLACE) */
    replace?: boolean;

}
