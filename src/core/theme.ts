/**
 * Modern Slate Color Theme
 *
 * Centralized color scheme for log lines and help output.
 * Uses ansis for truecolor (hex) support.
 *
 * @example
 * ```typescript
 * import { theme, icons } from '../core/theme.js'
 *
 * console.error(`${theme.error(icons.error)} Connection failed`)
 * ```
 */
import ansis from 'ansis';

// ─────────────────────────────────────────────────────────────
// Color Palette
// ─────────────────────────────────────────────────────────────

/**
 * Modern Slate color palette.
 * Hex values used directly with ansis truecolor support.
 */
export const palette = {

    // Brand
    primary: '#3B82F6',      // Bright Blue

    // Status
    success: '#10B981',      // Emerald Green
    warning: '#F59E0B',      // Amber
    error: '#EF4444',        // Red
    info: '#8B5CF6',         // Purple
    debug: '#8B5CF6',        // Purple (same as info)

    // Neutrals
    muted: '#9CA3AF',        // Gray-400
    text: '#F3F4F6',         // Gray-100 (light text on dark bg)
    textDim: '#D1D5DB',      // Gray-300

} as const;

// ─────────────────────────────────────────────────────────────
// Color Functions (Truecolor)
// ─────────────────────────────────────────────────────────────

/**
 * Theme color functions for direct use.
 */
export const theme = {

    primary: (text: string) => ansis.hex(palette.primary)(text),

    success: (text: string) => ansis.hex(palette.success)(text),
    warning: (text: string) => ansis.hex(palette.warning)(text),
    error: (text: string) => ansis.hex(palette.error)(text),
    info: (text: string) => ansis.hex(palette.info)(text),
    debug: (text: string) => ansis.hex(palette.debug)(text),

    muted: (text: string) => ansis.hex(palette.muted)(text),
    text: (text: string) => ansis.hex(palette.text)(text),
    textDim: (text: string) => ansis.hex(palette.textDim)(text),

} as const;

/**
 * Icons for status and log lines.
 */
export const icons = {
    success: '✓',
    error: '✗',
    warning: '⚠',
    info: '•',
    debug: '○',
} as const;

// ─────────────────────────────────────────────────────────────
// Log Levels
// ─────────────────────────────────────────────────────────────

export const logLevelColors = {
    error: theme.error,
    warn: theme.warning,
    info: theme.info,
    debug: theme.muted,
} as const;

export const logLevelIcons = {
    error: icons.error,
    warn: icons.warning,
    info: icons.info,
    debug: icons.debug,
} as const;
