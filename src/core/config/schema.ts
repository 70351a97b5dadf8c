/**
 * Options Zod schemas and validation.
 *
 * Uses Zod for declarative validation with better error messages
 * and type inference.
 */
import { z } from 'zod';

import { OUTPUT_FORMATS } from '../format/types.js';

/**
 * Valid table styles.
 */
export const OutputFormatSchema = z.enum(OUTPUT_FORMATS, {
    errorMap: () => ({ message: `Format must be one of: ${OUTPUT_FORMATS.join(', ')}` }),
});

/**
 * Valid log levels.
 */
export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'verbose']);

/**
 * Sample row limit. Numeric strings are accepted.
 */
const LimitSchema = z.coerce
    .number({ invalid_type_error: 'Limit must be a number' })
    .int('Limit must be an integer')
    .positive('Limit must be a positive integer');

/**
 * Database path. Blank means in-memory.
 */
const DatabaseSchema = z
    .string()
    .transform((value) => value.trim() || ':memory:');

/**
 * Full options schema.
 */
export const OptionsSchema = z.object({
    database: DatabaseSchema,
    format: OutputFormatSchema,
    limit: LimitSchema,
    logLevel: LogLevelSchema,
    json: z.boolean(),
    replace: z.boolean(),
});

export type OptionsSchemaType = z.infer<typeof OptionsSchema>;

// ─────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when options validation fails.
 *
 * Includes the specific field that failed and all validation issues.
 */
export class OptionsValidationError extends Error {

    override readonly name = 'OptionsValidationError' as const;

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);

    }

}

/**
 * Parse and validate options.
 *
 * @throws OptionsValidationError if validation fails
 *
 * @example
 * ```typescript
 * try {
 *     const options = parseOptions(merged)
 * }
 * catch (err) {
 *     if (err instanceof OptionsValidationError) logger.error(`Invalid options: ${err.message}`)
 * }
 * ```
 */
export function parseOptions(input: unknown): OptionsSchemaType {

    const result = OptionsSchema.safeParse(input);

    if (!result.success) {

        const firstIssue = result.error.issues[0];

        throw new OptionsValidationError(
            firstIssue?.message ?? 'Validation failed',
            firstIssue?.path.join('.') || 'unknown',
            result.error.issues,
        );

    }

    return result.data;

}
