/**
 * Command dispatch.
 *
 * Resolves options, starts a stderr logger, and runs the handler for
 * the requested command. Results go to stdout; logs go to stderr.
 *
 * @example
 * ```bash
 * duckdb-cli --db sales.duckdb query "SELECT count(*) FROM orders"
 *
 * # JSON output for scripting
 * duckdb-cli --json --db sales.duckdb tables | jq '.[].name'
 * ```
 */
import { Logger } from '../../core/logger/index.js';
import { DEFAULT_OPTIONS, resolveOptions, type Options, type OptionsInput } from '../../core/config/index.js';
import { isTerminal } from '../../core/environment.js';
import { toError } from '../../core/shared/index.js';
import { CLI_NAME } from '../../core/help-formatter.js';

import type { CliFlags, CliOptions, ParsedCli, Route, RouteParams } from '../types.js';
import { isRoute } from '../args.js';

import { type RouteHandler } from './_helpers.js';

import * as CmdTables from './tables.js';
import * as CmdDescribe from './describe.js';
import * as CmdSample from './sample.js';
import * as CmdQuery from './query.js';
import * as CmdFile from './file.js';
import * as CmdExportCsv from './export-csv.js';
import * as CmdExportParquet from './export-parquet.js';
import * as CmdImportCsv from './import-csv.js';
import * as CmdImportParquet from './import-parquet.js';

import * as CmdHelp from './help.js';

/**
 * Registry of command handlers.
 */
const HANDLERS: Partial<Record<Route, RouteHandler>> = {

    'tables': CmdTables,
    'describe': CmdDescribe,
    'sample': CmdSample,

    'query': CmdQuery,
    'file': CmdFile,

    'export-csv': CmdExportCsv,
    'export-parquet': CmdExportParquet,
    'import-csv': CmdImportCsv,
    'import-parquet': CmdImportParquet,
};

HANDLERS['help'] = CmdHelp.factory(HANDLERS);

/**
 * Map parsed flags to option overrides.
 *
 * Boolean flags only override when set, so env values still apply.
 */
export function toOptionsInput(flags: CliFlags): OptionsInput {

    return {
        database: flags.db,
        format: flags.format,
        limit: flags.limit,
        logLevel: flags.verbose ? 'verbose' : undefined,
        json: flags.json ? true : undefined,
        replace: flags.replace ? true : undefined,
    };

}

/**
 * Create the CLI logger.
 *
 * Writes to stderr. Colored when stderr is a terminal, JSON lines with `--json`.
 */
export function createCliLogger(options: Options): Logger {

    return new Logger({
        config: {
            enabled: true,
            level: options.logLevel,
        },
        console: process.stderr,
        json: options.json,
        color: !options.json && isTerminal(process.stderr),
    });

}

async function dispatch(
    route: string,
    params: RouteParams,
    options: CliOptions,
    logger: Logger,
): Promise<number> {

    const handler = isRoute(route) ? HANDLERS[route] : undefined;

    if (!handler) {

        logger.error(`Unknown command: ${route}. Run \`${CLI_NAME} help\` for a list of commands.`);

        return 1;

    }

    const unexpected = params.rest?.[0];

    if (unexpected !== undefined) {

        logger.error(`Unexpected argument: ${unexpected}`);

        return 1;

    }

    try {

        return await handler.run(params, options, logger);

    }
    catch (err) {

        logger.error(toError(err).message);

        return 1;

    }

}

/**
 * Run a parsed command line.
 *
 * No command shows the help overview.
 *
 * @returns Exit code (0 for success, 1 for errors)
 */
export async function runCommand(parsed: ParsedCli): Promise<number> {

    const { route, params, flags } = parsed;

    let resolved: Options;

    try {

        resolved = resolveOptions(toOptionsInput(flags));

    }
    catch (err) {

        const logger = createCliLogger(DEFAULT_OPTIONS);

        await logger.start();
        logger.error(`Invalid options: ${toError(err).message}`);
        await logger.stop();

        return 1;

    }

    const options: CliOptions = {
        ...resolved,
        outputCsv: flags.outputCsv,
        outputParquet: flags.outputParquet,
    };

    const logger = createCliLogger(options);
    await logger.start();

    const exitCode = await dispatch(route ?? 'help', params, options, logger);

    await logger.stop();

    return exitCode;

}
