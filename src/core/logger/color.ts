/**
 * Color Formatter
 *
 * Formats log lines with ANSI colors for terminal output.
 * Flattens data one level deep - nested objects are stringified.
 */
import type { EntryLevel } from './types.js';
import { theme, logLevelColors, logLevelIcons } from '../theme.js';

/**
 * Level icons and colors from theme.
 */
const LEVEL_STYLE: Record<EntryLevel, { icon: string; color: (s: string) => string }> = {
    error: { icon: logLevelIcons.error, color: logLevelColors.error },
    warn: { icon: logLevelIcons.warn, color: logLevelColors.warn },
    info: { icon: logLevelIcons.info, color: logLevelColors.info },
    debug: { icon: logLevelIcons.debug, color: logLevelColors.debug },
};

/**
 * Format a value for single-line display.
 */
function formatValue(value: unknown): string {

    if (value === null || value === undefined) {

        return theme.muted(String(value));

    }

    if (typeof value === 'string') {

        return value.length > 50
            ? theme.text(`"${value.slice(0, 47)}..."`)
            : theme.text(value);

    }

    if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {

        return theme.warning(String(value));

    }

    if (value instanceof Error) {

        return theme.error(value.message);

    }

    if (typeof value === 'object') {

        let str: string;

        try {

            str = JSON.stringify(value);

        }
        catch {

            return theme.muted('[object]');

        }

        return theme.text(str.length > 60 ? str.slice(0, 57) + '...' : str);

    }

    return theme.text(String(value));

}

/**
 * Flatten data to key=value pairs, one level deep.
 */
function flattenData(data: Record<string, unknown>): string {

    return Object.entries(data)
        .map(([key, value]) => `${theme.muted(key)}=${formatValue(value)}`)
        .join(' ');

}

/**
 * Format a log entry as a colored line.
 *
 * Format: `[icon] message  key=value key=value ...`
 *
 * @returns Colored line string (no newline)
 */
export function formatColorLine(
    level: EntryLevel,
    message: string,
    data?: Record<string, unknown>,
): string {

    const style = LEVEL_STYLE[level];

    let line = `${style.color(style.icon)} ${level === 'error' ? style.color(message) : theme.text(message)}`;

    if (data && Object.keys(data).length > 0) {

        line += `  ${flattenData(data)}`;

    }

    return line;

}
