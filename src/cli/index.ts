#!/usr/bin/env node
/**
 * CLI entry point for duckdb-cli.
 *
 * @example
 * ```bash
 * duckdb-cli tables --db sales.duckdb
 * duckdb-cli query "SELECT * FROM orders LIMIT 5" --db sales.duckdb --format grid
 * duckdb-cli import-csv users.csv users --db app.duckdb
 * ```
 */
import { parseCli } from './args.js'
import { runCommand } from './commands/index.js'


/**
 * Main entry point.
 */
async function main(): Promise<void> {

    process.exitCode = await runCommand(parseCli())
}


main().catch((error) => {

    console.error('Fatal error:', error)
    process.exit(1)
})
