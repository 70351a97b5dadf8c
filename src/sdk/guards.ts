/**
 * SDK Guards.
 *
 * Checks run before a client method reaches the engine.
 */

// ─────────────────────────────────────────────────────────────
// Error Classes
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when a client method is called before connect() or after close().
 *
 * @example
 * ```typescript
 * const client = createClient()
 * await client.showTables()  // Throws NotConnectedError
 * ```
 */
export class NotConnectedError extends Error {

    override readonly name = 'NotConnectedError' as const;

    constructor(public readonly operation: string) {

        super(`Cannot ${operation}: not connected. Call connect() first.`);

    }

}

// ─────────────────────────────────────────────────────────────
// Guard Functions
// ─────────────────────────────────────────────────────────────

/**
 * Return the connection, or throw if there is none.
 *
 * @throws NotConnectedError if `connection` is null
 */
export function requireConnection<T>(connection: T | null, operation: string): T {

    if (connection === null) {

        throw new NotConnectedError(operation);

    }

    return connection;

}
