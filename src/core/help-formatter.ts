/**
 * Help Text Formatter
 *
 * Renders the markdown help text of CLI commands with terminal colors.
 *
 * Supported syntax:
 * - `# Heading`, `## Heading`, `### Heading`
 * - `> blockquote`
 * - fenced code blocks
 * - `inline code`, **bold**, *italic*
 * - `[optional]`, `<required>` and ALL CAPS argument placeholders
 * - lines indented by four spaces (or a tab) as examples; lines that
 *   start with the binary name or `$` get command highlighting
 */
import ansis from 'ansis';

import { palette } from './theme.js';

/**
 * Name of the executable, highlighted in command examples.
 */
export const CLI_NAME = 'duckdb-cli';

// ─────────────────────────────────────────────────────────────
// Color Functions
// ─────────────────────────────────────────────────────────────

const colors = {
    h1: (s: string) => ansis.bold(ansis.hex(palette.primary)(s)),
    h2: (s: string) => ansis.bold(ansis.hex(palette.text)(s)),
    h3: (s: string) => ansis.bold(ansis.hex(palette.textDim)(s)),

    code: (s: string) => ansis.hex(palette.info)(s),
    codeDelimiter: (s: string) => ansis.hex(palette.muted)(s),

    text: (s: string) => ansis.hex(palette.text)(s),
    muted: (s: string) => ansis.hex(palette.muted)(s),
    bold: (s: string) => ansis.bold(ansis.hex(palette.text)(s)),
    italic: (s: string) => ansis.italic(ansis.hex(palette.textDim)(s)),
    blockquote: (s: string) => ansis.dim(ansis.italic(ansis.hex(palette.textDim)(s))),

    command: (s: string) => ansis.hex(palette.primary)(s),
    subcommand: (s: string) => ansis.hex(palette.info)(s),
    flag: (s: string) => ansis.hex(palette.warning)(s),
    required: (s: string) => ansis.hex(palette.warning)(s),
    argument: (s: string) => ansis.italic(ansis.hex(palette.textDim)(s)),
    example: (s: string) => ansis.hex(palette.textDim)(s),
};

const optional = (inner: string) => colors.muted(`[${inner}]`);
const required = (inner: string) => colors.muted('<') + colors.required(inner) + colors.muted('>');

// ─────────────────────────────────────────────────────────────
// Inline Formatting
// ─────────────────────────────────────────────────────────────

/**
 * Apply inline formatting to a line of text.
 */
function formatInline(line: string): string {

    return line
        // Code first so nothing else applies inside it
        .replace(/`([^`]+)`/g, (_: string, code: string) => colors.code(code))
        .replace(/\*\*([^*]+)\*\*/g, (_: string, text: string) => colors.bold(text))
        .replace(/(?<!\*)\*([^*]+)\*(?!\*)/g, (_: string, text: string) => colors.italic(text))
        .replace(/\[([^\]]+)\]/g, (_: string, inner: string) => optional(inner))
        .replace(/<([^>]+)>/g, (_: string, inner: string) => required(inner))
        .replace(/\b([A-Z]{2,})\b/g, (_: string, word: string) => colors.argument(word));

}

/**
 * Check if an indented line is a command example.
 */
function isCommandLine(line: string): boolean {

    const trimmed = line.trim();

    return trimmed.startsWith(CLI_NAME) || trimmed.startsWith('$');

}

/**
 * Highlight a command example token by token.
 */
function formatCommand(line: string): string {

    const indent = line.match(/^(\s*)/)?.[1] ?? '';
    let content = line.trim();
    let prefix = '';

    if (content.startsWith('$')) {

        prefix = colors.muted('$ ');
        content = content.slice(1).trim();

    }

    let seenCommand = false;
    let seenSubcommand = false;

    const formatted = content.split(/\s+/).map((token) => {

        if (token === CLI_NAME) {

            seenCommand = true;

            return colors.command(token);

        }

        if (token.startsWith('-')) return colors.flag(token);

        if (token.startsWith('[') && token.endsWith(']')) return optional(token.slice(1, -1));

        if (token.startsWith('<') && token.endsWith('>')) return required(token.slice(1, -1));

        if (/^[A-Z]{2,}$/.test(token)) return colors.argument(token);

        if (seenCommand && !seenSubcommand) {

            seenSubcommand = true;

            return colors.subcommand(token);

        }

        return colors.text(token);

    });

    return indent + prefix + formatted.join(' ');

}

// ─────────────────────────────────────────────────────────────
// Block Formatting
// ─────────────────────────────────────────────────────────────

const HEADING_COLORS = [colors.h1, colors.h2, colors.h3];

/**
 * Format a complete help text with colors.
 */
export function formatHelp(text: string): string {

    const output: string[] = [];
    let inCodeBlock = false;

    for (const line of text.split('\n')) {

        if (line.trim().startsWith('```')) {

            inCodeBlock = !inCodeBlock;
            output.push(colors.codeDelimiter(line));
            continue;

        }

        if (inCodeBlock) {

            output.push(colors.code(line));
            continue;

        }

        const heading = line.match(/^(#{1,3})\s+(.+)$/);

        if (heading?.[1] && heading[2]) {

            const colorFn = HEADING_COLORS[heading[1].length - 1] ?? colors.h3;
            output.push(colorFn(heading[2]));
            continue;

        }

        const quote = line.match(/^>\s*(.*)$/);

        if (quote) {

            output.push(colors.blockquote('  ' + formatInline(quote[1] ?? '')));
            continue;

        }

        if (/^(\s{4,}|\t)/.test(line)) {

            output.push(isCommandLine(line) ? formatCommand(line) : colors.example(formatInline(line)));
            continue;

        }

        output.push(line.trim() === '' ? '' : colors.text(formatInline(line)));

    }

    return output.join('\n');

}

/**
 * Strip ANSI codes from text (for testing or plain output).
 */
export function stripColors(text: string): string {

    // eslint-disable-next-line no-control-regex
    return text.replace(/\x1b\[[0-9;]*m/g, '');

}
