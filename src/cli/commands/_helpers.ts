import type { RouteParams, CliOptions } from '../types.js';
import type { Logger } from '../../core/logger/index.js';
import { renderJson, renderResult } from '../../core/format/index.js';
import type { QueryResult } from '../../core/query/index.js';
import { toError } from '../../core/shared/index.js';
import { createClient, type Client } from '../../sdk/index.js';

export interface HeadlessCommand {
    (
        params: RouteParams,
        options: CliOptions,
        logger: Logger
    ): Promise<number>;
}

export type RouteHandler = {
    run: HeadlessCommand;
    help: string;
    factory?: (handlers: Partial<Record<string, RouteHandler>>) => RouteHandler;
}

/**
 * Open a client on the configured database, run `fn`, always close.
 *
 * Failures are logged as `<failure>: <message>`. Connection
 * failures are reported by the `connection:error` event.
 */
export const withClient = async <T>(opts: {
    options: CliOptions;
    logger: Logger;
    failure: string;
    fn: (client: Client) => Promise<T>;
}): Promise<[T, null] | [null, Error]> => {

    const { options, logger, failure, fn } = opts;

    const client = createClient({ database: options.database });

    try {

        await client.connect();

    }
    catch (err) {

        return [null, toError(err)];

    }

    let outcome: [T, null] | [null, Error];

    try {

        outcome = [await fn(client), null];

    }
    catch (err) {

        outcome = [null, toError(err)];

    }

    // Always close
    try {

        client.close();

    }
    catch (err) {

        logger.warn(`Failed to close database: ${toError(err).message}`);

    }

    const [, opError] = outcome;

    if (opError) {

        logger.error(`${failure}: ${opError.message}`);

    }

    return outcome;

};

/**
 * Log a missing positional argument.
 *
 * @returns Exit code 1
 */
export const missingArgument = (logger: Logger, name: string): number => {

    logger.error(`Missing argument: ${name}`);

    return 1;

};

/**
 * Write a result to stdout as a table, or as JSON with `--json`.
 */
export const printResult = (result: QueryResult, options: CliOptions): void => {

    const output = options.json
        ? renderJson(result)
        : renderResult(result, options.format);

    process.stdout.write(`${output}\n`);

};

/**
 * Write a status line to stdout.
 */
export const printLine = (line: string): void => {

    process.stdout.write(`${line}\n`);

};
