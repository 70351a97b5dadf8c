import { withClient, missingArgument, printResult, type HeadlessCommand } from './_helpers.js';

export const help = `
# FILE

Execute a SQL file

## Usage

    duckdb-cli file PATH

## Arguments

    PATH    Path to the SQL file to execute

## Description

Runs every statement in the file and prints the result of the last one.

## Examples

    duckdb-cli --db app.duckdb file schema.sql
    duckdb-cli --db app.duckdb file reports/monthly.sql --format grid
`;

export const run: HeadlessCommand = async (params, options, logger) => {

    const path = params.path;

    if (!path) return missingArgument(logger, 'PATH');

    const [result, error] = await withClient({
        options,
        logger,
        failure: 'File execution failed',
        fn: (client) => client.executeFile(path),
    });

    if (error) return 1;

    printResult(result, options);

    return 0;

};
