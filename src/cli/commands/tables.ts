import { withClient, printResult, type HeadlessCommand } from './_helpers.js';

export const help = `
# TABLES

List all tables

## Usage

    duckdb-cli tables [--db PATH] [--format STYLE]

## Description

Lists the tables of the database. An in-memory database has none
until something is imported or created.

## Examples

    duckdb-cli --db sales.duckdb tables
    duckdb-cli --db sales.duckdb tables --json

## JSON Output

\`\`\`json
[
    { "name": "customers" },
    { "name": "orders" }
]
\`\`\`
`;

export const run: HeadlessCommand = async (_params, options, logger) => {

    const [result, error] = await withClient({
        options,
        logger,
        failure: 'Failed to show tables',
        fn: (client) => client.showTables(),
    });

    if (error) return 1;

    printResult(result, options);

    return 0;

};
