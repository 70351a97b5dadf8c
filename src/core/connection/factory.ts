/**
 * Connection factory.
 *
 * Opens a DuckDB instance for a database path and connects to it.
 * Engine errors (bad path, locked file) are reported and rethrown as is.
 */
import { DuckDBInstance, type DuckDBConnection } from '@duckdb/node-api'

import { toError } from '../shared/errors.js'

import { observer } from '../observer.js'
import { IN_MEMORY, type ConnectionConfig, type ConnectionResult } from './types.js'


/**
 * Resolve the database path, falling back to in-memory.
 *
 * @example
 * ```typescript
 * resolveDatabasePath('')             // ':memory:'
 * resolveDatabasePath('  data.duckdb') // 'data.duckdb'
 * ```
 */
export function resolveDatabasePath(database: string | undefined): string {

    const trimmed = database?.trim()

    return trimmed ? trimmed : IN_MEMORY
}


/**
 * Open a DuckDB database and connect to it.
 *
 * @example
 * ```typescript
 * const conn = await createConnection({ database: ':memory:' })
 *
 * await conn.connection.run('SELECT 1')
 * conn.destroy()
 * ```
 */
export async function createConnection(config: ConnectionConfig): Promise<ConnectionResult> {

    const database = resolveDatabasePath(config.database)
    const options: Record<string, string> = config.readOnly ? { access_mode: 'READ_ONLY' } : {}

    let instance: DuckDBInstance

    try {

        instance = await DuckDBInstance.create(database, options)
    }
    catch (err) {

        observer.emit('connection:error', { database, error: toError(err).message })
        throw err
    }

    let connection: DuckDBConnection

    try {

        connection = await instance.connect()
    }
    catch (err) {

        instance.closeSync()
        observer.emit('connection:error', { database, error: toError(err).message })
        throw err
    }

    let open = true

    observer.emit('connection:open', { database })

    return {
        connection,
        database,
        destroy: () => {

            if (!open) return

            open = false
            connection.closeSync()
            instance.closeSync()

            observer.emit('connection:close', { database })
        },
    }
}
