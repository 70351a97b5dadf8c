/**
 * Argument parsing.
 *
 * meow parses the flags; positional arguments are mapped to named
 * params according to the command.
 */
import meow from 'meow'

import type { CliFlags, ParsedCli, Route, RouteParams } from './types.js'


/**
 * Usage text printed by `--help`.
 */
export const HELP_TEXT = `
  Usage
    $ duckdb-cli [options] <command> [arguments]

  Commands
    tables                      List all tables
    query <sql>                 Run a query
    file <path>                 Run the SQL in a file
    describe <table>            Show a table's schema
    sample <table>              Show the first rows of a table
    export-csv <sql> <output>   Write a query result to CSV
    export-parquet <sql> <output>
                                Write a query result to Parquet
    import-csv <file> <table>   Create a table from a CSV file
    import-parquet <file> <table>
                                Create a table from a Parquet file
    help [command]              Show help for a command

  Options
    --db <path>                 Database file (default: in-memory)
    --format, -f <style>        psql, grid, simple, plain or markdown
    --json                      Print results as JSON
    --limit, -n <rows>          Rows shown by sample (default: 10)
    --output-csv <file>         query: write the result to CSV
    --output-parquet <file>     query: write the result to Parquet
    --replace                   import: replace an existing table
    --verbose, -v               Debug logging
    --help                      Show this help
    --version                   Show version

  Examples
    $ duckdb-cli --db sales.duckdb tables
    $ duckdb-cli query "SELECT 42 AS answer"
    $ duckdb-cli import-csv users.csv users --db app.duckdb
`


/**
 * Positional argument names, in order, per command.
 */
export const POSITIONALS: Record<Route, readonly (keyof Omit<RouteParams, 'rest'>)[]> = {

    'tables': [],
    'describe': ['table'],
    'sample': ['table'],
    'query': ['sql'],
    'file': ['path'],
    'export-csv': ['sql', 'output'],
    'export-parquet': ['sql', 'output'],
    'import-csv': ['file', 'table'],
    'import-parquet': ['file', 'table'],
    'help': ['topic'],
}


/**
 * Check if a string names a command.
 */
export function isRoute(value: string): value is Route {

    return Object.hasOwn(POSITIONALS, value)
}


/**
 * Map positional arguments to named params.
 *
 * @example
 * ```typescript
 * parseRouteFromInput(['import-csv', 'users.csv', 'users'])
 * // { route: 'import-csv', params: { file: 'users.csv', table: 'users' } }
 *
 * parseRouteFromInput([])
 * // { route: null, params: {} }
 * ```
 */
export function parseRouteFromInput(input: string[]): { route: string | null; params: RouteParams } {

    const [route, ...args] = input

    if (route === undefined) {

        return { route: null, params: {} }
    }

    if (!isRoute(route)) {

        return { route, params: {} }
    }

    const names = POSITIONALS[route]
    const params: RouteParams = {}

    names.forEach((name, index) => {

        const value = args[index]

        if (value !== undefined) {

            params[name] = value
        }
    })

    if (args.length > names.length) {

        params.rest = args.slice(names.length)
    }

    return { route, params }
}


/**
 * Parse CLI arguments with meow.
 *
 * @param argv - Arguments without the node binary and script path
 */
export function parseCli(argv: string[] = process.argv.slice(2)): ParsedCli {

    const cli = meow(HELP_TEXT, {
        importMeta: import.meta,
        argv,
        flags: {
            db: {
                type: 'string',
            },
            verbose: {
                type: 'boolean',
                shortFlag: 'v',
                default: false,
            },
            format: {
                type: 'string',
                shortFlag: 'f',
            },
            json: {
                type: 'boolean',
                default: false,
            },
            limit: {
                type: 'number',
                shortFlag: 'n',
            },
            outputCsv: {
                type: 'string',
            },
            outputParquet: {
                type: 'string',
            },
            replace: {
                type: 'boolean',
                default: false,
            },
        },
    })

    const flags: CliFlags = {
        db: cli.flags.db,
        verbose: cli.flags.verbose,
        format: cli.flags.format,
        json: cli.flags.json,
        limit: cli.flags.limit,
        outputCsv: cli.flags.outputCsv,
        outputParquet: cli.flags.outputParquet,
        replace: cli.flags.replace,
    }

    // Numeric-looking positionals arrive as numbers
    const { route, params } = parseRouteFromInput(cli.input.map(String))

    return { route, params, flags }
}
