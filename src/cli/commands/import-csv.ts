import { withClient, missingArgument, printLine, type HeadlessCommand } from './_helpers.js';

export const help = `
# IMPORT CSV

Create a table from a CSV file

## Usage

    duckdb-cli import-csv FILE TABLE [--replace]

## Arguments

    FILE    CSV file to read
    TABLE   Name of the table to create

## Description

Column names and types are detected from the file. Without
\`--replace\` the import fails when TABLE already exists.

## Examples

    duckdb-cli --db app.duckdb import-csv users.csv users
    duckdb-cli --db app.duckdb import-csv users.csv users --replace
`;

export const run: HeadlessCommand = async (params, options, logger) => {

    const { file, table } = params;

    if (!file) return missingArgument(logger, 'FILE');
    if (!table) return missingArgument(logger, 'TABLE');

    const [, error] = await withClient({
        options,
        logger,
        failure: 'CSV import failed',
        fn: (client) => client.importCsv(file, table, { replace: options.replace }),
    });

    if (error) return 1;

    printLine(`Successfully imported ${file} to table '${table}'`);

    return 0;

};
