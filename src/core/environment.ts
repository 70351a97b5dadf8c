/**
 * Environment Detection
 *
 * Utilities for detecting how the process was started.
 * Used by the logger and the CLI to pick defaults.
 */

/**
 * Check if observer spy output is enabled.
 *
 * @returns true if DUCKDB_CLI_DEBUG is '1' or 'true'
 */
export function isDebug(): boolean {

    const debug = process.env['DUCKDB_CLI_DEBUG'];

    return debug === '1' || debug === 'true';

}

/**
 * Check if a stream is attached to a terminal.
 *
 * Colors are only written to terminals unless forced.
 *
 * @example
 * ```typescript
 * const color = isTerminal(process.stderr) && !process.env['NO_COLOR']
 * ```
 */
export function isTerminal(stream: { isTTY?: boolean }): boolean {

    return stream.isTTY === true;

}
