/**
 * Configuration types.
 *
 * Options come from three places, merged in priority order:
 * defaults, `DUCKDB_CLI_*` environment variables, then CLI flags.
 */
import type { OutputFormat } from '../format/types.js'
import type { LogLevel } from '../logger/types.js'


/**
 * Fully resolved options.
 *
 * @example
 * ```typescript
 * const options: Options = {
 *     database: ':memory:',
 *     format: 'psql',
 *     limit: 10,
 *     logLevel: 'info',
 *     json: false,
 *     replace: false,
 * }
 * ```
 */
export interface Options {

    /** Database file path, or `:memory:` */
    database: string

    /** Table style for printed results */
    format: OutputFormat

    /** Row limit for `sample` */
    limit: number

    logLevel: LogLevel

    /** Print results as JSON instead of a table */
    json: boolean

    /** Replace the target table on import */
    replace: boolean
}


/**
 * Partial options, as given by flags.
 *
 * Values are unvalidated; resolveOptions checks them.
 */
export type OptionsInput = {
    [K in keyof Options]?: unknown
}


/**
 * Shape read from the environment.
 *
 * Underscores nest, so `DUCKDB_CLI_LOG_LEVEL` lands in `log.level`.
 */
export interface EnvConfig {

    database?: unknown
    format?: unknown
    limit?: unknown
    json?: unknown
    log?: {
        level?: unknown
    }
}
