import { type HeadlessCommand, type RouteHandler } from './_helpers.js';
import { formatHelp } from '../../core/help-formatter.js';
import { isRoute } from '../args.js';

let handlers: Partial<Record<string, RouteHandler>> | undefined;

export const help = `
# DUCKDB-CLI

Query and move data in DuckDB databases from the command line

## Usage

    duckdb-cli [--db PATH] [--format STYLE] [--json] [-v] COMMAND [ARGS]
    duckdb-cli help [command]

## Global Options

    --db PATH         Database file (default: in-memory)
    --format STYLE    psql, grid, simple, plain or markdown (default: psql)
    --json            Print results as a JSON array
    -v, --verbose     Debug logging on stderr

Options can also be set with \`DUCKDB_CLI_DATABASE\`, \`DUCKDB_CLI_FORMAT\`,
\`DUCKDB_CLI_LIMIT\` and \`DUCKDB_CLI_LOG_LEVEL\`.

## Examples

    duckdb-cli query "SELECT 42 AS answer"
    duckdb-cli --db sales.duckdb tables
    duckdb-cli help import-csv
`;

/**
 * First line of a help text that is neither blank nor a heading.
 */
function summarize(text: string): string {

    const line = text
        .split('\n')
        .map((l) => l.trim())
        .find((l) => l !== '' && !l.startsWith('#'));

    return line ?? '';

}

/**
 * Generate a list of available commands from registered handlers.
 */
function generateTopicsList(registered: Partial<Record<string, RouteHandler>>): string {

    const lines: string[] = ['## Commands', ''];

    for (const [route, handler] of Object.entries(registered)) {

        if (route === 'help' || !handler) continue;

        lines.push(`    ${route.padEnd(16)} ${summarize(handler.help)}`);

    }

    lines.push('');
    lines.push('Run `duckdb-cli help <command>` for detailed help on any command.');

    return lines.join('\n');

}

export const run: HeadlessCommand = async (params, options, logger) => {

    if (!handlers) {

        throw new Error('Handlers not initialized');

    }

    // No topic specified - show overview with available commands
    if (!params.topic) {

        const fullHelp = `${help}\n${generateTopicsList(handlers)}`;
        const output = options.json ? fullHelp : formatHelp(fullHelp);

        process.stdout.write(`${output}\n`);

        return 0;

    }

    const handler = isRoute(params.topic) ? handlers[params.topic] : undefined;

    if (!handler) {

        logger.error(`Unknown command: ${params.topic}`);

        return 1;

    }

    // Apply colors unless --json mode
    const output = options.json ? handler.help : formatHelp(handler.help);

    process.stdout.write(`${output}\n`);

    return 0;

};

export const factory = (
    registeredHandlers: Partial<Record<string, RouteHandler>>,
): RouteHandler => {

    handlers = registeredHandlers;

    return {
        run,
        help,
    };

};
