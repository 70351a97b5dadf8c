/**
 * CLI type definitions.
 *
 * Defines the commands, their positional arguments and the flags
 * meow parses.
 */
import type { Options } from '../core/config/index.js'


/**
 * All valid commands.
 */
export type Route =
    // Exploration
    | 'tables'
    | 'describe'
    | 'sample'
    // Execution
    | 'query'
    | 'file'
    // Transfer
    | 'export-csv'
    | 'export-parquet'
    | 'import-csv'
    | 'import-parquet'
    // Meta
    | 'help'


/**
 * Positional arguments, named per command.
 *
 * - `sql`: query text (query, export-*)
 * - `path`: SQL file path (file)
 * - `table`: table name (describe, sample, import-*)
 * - `output`: destination file (export-*)
 * - `file`: source file (import-*)
 * - `topic`: command name (help)
 */
export interface RouteParams {

    sql?: string
    path?: string
    table?: string
    output?: string
    file?: string
    topic?: string

    /** Positionals beyond what the command takes */
    rest?: string[]
}


/**
 * Flags as parsed by meow, before defaults and env are applied.
 */
export interface CliFlags {

    /** Database file path */
    db?: string

    /** Debug-level logging */
    verbose: boolean

    /** Table style */
    format?: string

    /** Print results as JSON */
    json: boolean

    /** Row limit for `sample` */
    limit?: number

    /** Write `query` results to a CSV file */
    outputCsv?: string

    /** Write `query` results to a Parquet file */
    outputParquet?: string

    /** Replace the target table on import */
    replace: boolean
}


/**
 * Options a command runs with: resolved options plus the
 * per-command output targets.
 */
export interface CliOptions extends Options {

    outputCsv?: string
    outputParquet?: string
}


/**
 * Parsed CLI input ready for routing.
 */
export interface ParsedCli {

    /** Command name as typed, null when none was given */
    route: string | null

    /** Positional arguments for the command */
    params: RouteParams

    flags: CliFlags
}
