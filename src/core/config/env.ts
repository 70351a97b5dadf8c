/**
 * Environment variable configuration.
 *
 * Options can be set via DUCKDB_CLI_* environment variables.
 * Flat names are nested on underscores after the prefix is stripped.
 *
 * @example
 * ```bash
 * DUCKDB_CLI_DATABASE=./analytics.duckdb
 * DUCKDB_CLI_FORMAT=markdown
 * DUCKDB_CLI_LIMIT=25
 * DUCKDB_CLI_LOG_LEVEL=warn
 * DUCKDB_CLI_JSON=true
 * ```
 */
import { set } from 'lodash-es'

import type { EnvConfig, OptionsInput } from './types.js'


const ENV_PREFIX = 'DUCKDB_CLI_'


/**
 * Meta env vars that control process behavior, not option values.
 */
const META_ENV_VARS = new Set([
    'DUCKDB_CLI_DEBUG',  // Observer spy output
])


/**
 * Convert an env string to a boolean or number where it reads as one.
 */
function convertValue(value: string): unknown {

    const trimmed = value.trim()

    if (trimmed === 'true') return true
    if (trimmed === 'false') return false

    if (trimmed !== '' && !Number.isNaN(Number(trimmed))) {

        return Number(trimmed)
    }

    return value
}


/**
 * Read raw config values from environment variables.
 *
 * Database paths are kept as written; everything else is converted
 * ("25" becomes 25, "true" becomes true).
 *
 * @example
 * ```typescript
 * // DUCKDB_CLI_FORMAT=grid DUCKDB_CLI_LOG_LEVEL=warn
 * getEnvConfig()
 * // { format: 'grid', log: { level: 'warn' } }
 * ```
 */
export function getEnvConfig(): EnvConfig {

    const config: EnvConfig = {}

    for (const [key, value] of Object.entries(process.env)) {

        if (value === undefined || !key.startsWith(ENV_PREFIX) || META_ENV_VARS.has(key)) {

            continue
        }

        const path = key.slice(ENV_PREFIX.length).toLowerCase().split('_')

        set(config, path, path.includes('database') ? value : convertValue(value))
    }

    return config
}


/**
 * Read environment overrides in options shape.
 *
 * Only variables that are set appear in the result.
 */
export function getEnvOptions(): OptionsInput {

    const env = getEnvConfig()
    const options: OptionsInput = {}

    if (env.database !== undefined) options.database = env.database
    if (env.format !== undefined) options.format = env.format
    if (env.limit !== undefined) options.limit = env.limit
    if (env.json !== undefined) options.json = env.json
    if (env.log?.level !== undefined) options.logLevel = env.log.level

    return options
}
