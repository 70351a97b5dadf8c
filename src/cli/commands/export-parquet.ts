import { withClient, missingArgument, printLine, type HeadlessCommand } from './_helpers.js';

export const help = `
# EXPORT PARQUET

Write a query result to a Parquet file

## Usage

    duckdb-cli export-parquet SQL OUTPUT

## Arguments

    SQL      Query to run (trailing semicolons are ignored)
    OUTPUT   Destination file, overwritten if it exists

## Examples

    duckdb-cli --db sales.duckdb export-parquet "SELECT * FROM orders" orders.parquet
`;

export const run: HeadlessCommand = async (params, options, logger) => {

    const { sql, output } = params;

    if (!sql) return missingArgument(logger, 'SQL');
    if (!output) return missingArgument(logger, 'OUTPUT');

    const [, error] = await withClient({
        options,
        logger,
        failure: 'Parquet export failed',
        fn: (client) => client.exportToParquet(sql, output),
    });

    if (error) return 1;

    printLine(`Successfully exported to: ${output}`);

    return 0;

};
