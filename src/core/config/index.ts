/**
 * Config module - option resolution for the CLI.
 *
 * Merges defaults, environment variables and flags, then validates.
 */

// Types
export * from './types.js';

// Schema & Validation
export {
    OptionsSchema,
    OutputFormatSchema,
    LogLevelSchema,
    OptionsValidationError,
    parseOptions,
    type OptionsSchemaType,
} from './schema.js';

// Resolver
export { resolveOptions, DEFAULT_OPTIONS } from './resolver.js';

// Environment variables
export { getEnvConfig, getEnvOptions } from './env.js';
