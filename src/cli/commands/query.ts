import { withClient, missingArgument, printLine, printResult, type HeadlessCommand } from './_helpers.js';

export const help = `
# QUERY

Run a SQL query

## Usage

    duckdb-cli query SQL [--output-csv FILE] [--output-parquet FILE]

## Arguments

    SQL     Query text. Several statements may be given; the last one's
            result is shown.

## Options

    --output-csv FILE       Write the result to a CSV file instead
    --output-parquet FILE   Write the result to a Parquet file instead

When both are given, only the CSV file is written.

## Examples

    duckdb-cli query "SELECT 42 AS answer"
    duckdb-cli --db sales.duckdb query "SELECT * FROM orders" --format markdown
    duckdb-cli --db sales.duckdb query "SELECT * FROM orders" --output-csv orders.csv
`;

export const run: HeadlessCommand = async (params, options, logger) => {

    const sql = params.sql;

    if (!sql) return missingArgument(logger, 'SQL');

    const csvFile = options.outputCsv;

    if (csvFile) {

        const [rowCount, error] = await withClient({
            options,
            logger,
            failure: 'Query execution failed',
            fn: (client) => client.exportToCsv(sql, csvFile),
        });

        if (error) return 1;

        printLine(`Successfully exported ${rowCount} rows to: ${csvFile}`);

        return 0;

    }

    const parquetFile = options.outputParquet;

    if (parquetFile) {

        const [, error] = await withClient({
            options,
            logger,
            failure: 'Query execution failed',
            fn: (client) => client.exportToParquet(sql, parquetFile),
        });

        if (error) return 1;

        printLine(`Successfully exported to: ${parquetFile}`);

        return 0;

    }

    const [result, error] = await withClient({
        options,
        logger,
        failure: 'Query execution failed',
        fn: (client) => client.executeQuery(sql),
    });

    if (error) return 1;

    printResult(result, options);

    return 0;

};
