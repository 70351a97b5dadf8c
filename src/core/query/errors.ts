/**
 * Query-related errors.
 */


/**
 * Error when the engine rejects a statement.
 *
 * Carries the SQL that failed; the message is the engine's own.
 *
 * @example
 * ```typescript
 * await client.executeQuery('SELEC 1').catch((err: unknown) => {
 *     if (err instanceof QueryError) console.error(`${err.message}\n${err.sql}`)
 * })
 * ```
 */
export class QueryError extends Error {

    override readonly name = 'QueryError' as const

    constructor(
        public readonly sql: string,
        message: string,
    ) {

        super(message)
    }
}
