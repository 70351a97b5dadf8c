import { withClient, missingArgument, printResult, type HeadlessCommand } from './_helpers.js';

export const help = `
# DESCRIBE

Show a table's schema

## Usage

    duckdb-cli describe TABLE

## Arguments

    TABLE   Table name, optionally schema-qualified (\`main.users\`)

## Examples

    duckdb-cli --db app.duckdb describe users
    duckdb-cli --db app.duckdb describe users --json
`;

export const run: HeadlessCommand = async (params, options, logger) => {

    const table = params.table;

    if (!table) return missingArgument(logger, 'TABLE');

    const [result, error] = await withClient({
        options,
        logger,
        failure: 'Failed to describe table',
        fn: (client) => client.describeTable(table),
    });

    if (error) return 1;

    printResult(result, options);

    return 0;

};
