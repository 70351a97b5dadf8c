import { withClient, missingArgument, printLine, type HeadlessCommand } from './_helpers.js';

export const help = `
# IMPORT PARQUET

Create a table from a Parquet file

## Usage

    duckdb-cli import-parquet FILE TABLE [--replace]

## Arguments

    FILE    Parquet file to read
    TABLE   Name of the table to create

## Examples

    duckdb-cli --db app.duckdb import-parquet events.parquet events
`;

export const run: HeadlessCommand = async (params, options, logger) => {

    const { file, table } = params;

    if (!file) return missingArgument(logger, 'FILE');
    if (!table) return missingArgument(logger, 'TABLE');

    const [, error] = await withClient({
        options,
        logger,
        failure: 'Parquet import failed',
        fn: (client) => client.importParquet(file, table, { replace: options.replace }),
    });

    if (error) return 1;

    printLine(`Successfully imported ${file} to table '${table}'`);

    return 0;

};
