import { withClient, missingArgument, printLine, type HeadlessCommand } from './_helpers.js';

export const help = `
# EXPORT CSV

Write a query result to a CSV file

## Usage

    duckdb-cli export-csv SQL OUTPUT

## Arguments

    SQL      Query to run
    OUTPUT   Destination file, overwritten if it exists

## Description

Writes a header row followed by one line per result row. NULL values
are written as empty fields.

## Examples

    duckdb-cli --db sales.duckdb export-csv "SELECT * FROM orders" orders.csv
`;

export const run: HeadlessCommand = async (params, options, logger) => {

    const { sql, output } = params;

    if (!sql) return missingArgument(logger, 'SQL');
    if (!output) return missingArgument(logger, 'OUTPUT');

    const [, error] = await withClient({
        options,
        logger,
        failure: 'CSV export failed',
        fn: (client) => client.exportToCsv(sql, output),
    });

    if (error) return 1;

    printLine(`Successfully exported to: ${output}`);

    return 0;

};
