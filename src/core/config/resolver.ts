/**
 * Options resolver - merges options from multiple sources.
 *
 * Priority order (highest to lowest):
 * 1. CLI flags
 * 2. Environment variables
 * 3. Defaults
 */
import { cloneDeep, merge } from 'lodash-es'

import type { Options, OptionsInput } from './types.js'
import { getEnvOptions } from './env.js'
import { parseOptions } from './schema.js'
import { IN_MEMORY } from '../connection/types.js'
import { DEFAULT_OUTPUT_FORMAT } from '../format/types.js'
import { DEFAULT_SAMPLE_LIMIT } from '../explore/operations.js'
import { DEFAULT_LOGGER_CONFIG } from '../logger/types.js'


/**
 * Default option values.
 */
export const DEFAULT_OPTIONS: Options = {

    database: IN_MEMORY,
    format: DEFAULT_OUTPUT_FORMAT,
    limit: DEFAULT_SAMPLE_LIMIT,
    logLevel: DEFAULT_LOGGER_CONFIG.level,
    json: false,
    replace: false,
}


/**
 * Drop keys whose value is undefined so they don't mask lower layers.
 */
function defined(input: OptionsInput): OptionsInput {

    return Object.fromEntries(
        Object.entries(input).filter(([, value]) => value !== undefined)
    )
}


/**
 * Resolve options from defaults, environment and flags.
 *
 * @throws OptionsValidationError when a merged value is invalid
 *
 * @example
 * ```typescript
 * // DUCKDB_CLI_FORMAT=grid
 * resolveOptions({ limit: 5 })
 * // { database: ':memory:', format: 'grid', limit: 5, logLevel: 'info', json: false, replace: false }
 * ```
 */
export function resolveOptions(flags: OptionsInput = {}): Options {

    const merged: unknown = merge(
        merge(cloneDeep(DEFAULT_OPTIONS), defined(getEnvOptions())),
        defined(flags)
    )

    return parseOptions(merged)
}
