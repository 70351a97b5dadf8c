import { withClient, missingArgument, printResult, type HeadlessCommand } from './_helpers.js';

export const help = `
# SAMPLE

Show the first rows of a table

## Usage

    duckdb-cli sample TABLE [--limit N]

## Arguments

    TABLE   Table name

## Options

    --limit, -n N   Number of rows (default: 10)

## Examples

    duckdb-cli --db app.duckdb sample users
    duckdb-cli --db app.duckdb sample users -n 3 --format simple
`;

export const run: HeadlessCommand = async (params, options, logger) => {

    const table = params.table;

    if (!table) return missingArgument(logger, 'TABLE');

    const [result, error] = await withClient({
        options,
        logger,
        failure: 'Failed to get sample data',
        fn: (client) => client.getTableSample(table, options.limit),
    });

    if (error) return 1;

    printResult(result, options);

    return 0;

};
