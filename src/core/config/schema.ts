/**
 * Configuration Zod schemas and validation.
 *
 * Uses Zod for declarative validation with better error messages
 * and type inference.
 */
import { z } from 'zod';

/**
 * Valid log levels.
 */
export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'verbose']);

/**
 * Directive markers. Both must be non-empty and differ from each other.
 */
const MarkersSchema = z
    .object({
        open: z.string().min(1, 'Open marker is required'),
        close: z.string().min(1, 'Close marker is required'),
    })
    .refine((markers) => markers.open !== markers.close, {
        message: 'Open and close markers must differ',
        path: ['close'],
    });

/**
 * Logging configuration.
 */
const LogSchema = z.object({
    level: LogLevelSchema,
    json: z.boolean(),
    color: z.boolean(),
});

/**
 * Full config schema.
 */
export const ConfigSchema = z.object({
    log: LogSchema,
    markers: MarkersSchema,
});

/**
 * Partial config schema for overrides (env vars, callers).
 */
export const ConfigInputSchema = z.object({
    log: LogSchema.partial().optional(),
    markers: z
        .object({
            open: z.string().optional(),
            close: z.string().optional(),
        })
        .optional(),
});

// ─────────────────────────────────────────────────────────────
// Type Exports
// ─────────────────────────────────────────────────────────────

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.infer<typeof ConfigInputSchema>;

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when config validation fails.
 *
 * Includes the specific field that failed and all validation issues.
 */
export class ConfigValidationError extends Error {

    override readonly name = 'ConfigValidationError' as const;

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);

    }

}

/**
 * Validate and return a complete config object.
 *
 * @throws ConfigValidationError if validation fails
 *
 * @example
 * ```typescript
 * const [config, err] = attemptSync(() => parseConfig(input))
 * if (err) {
 *     console.error(`Invalid config: ${err.message}`)
 * }
 * ```
 */
export function parseConfig(config: unknown): Config {

    const result = ConfigSchema.safeParse(config);

    if (!result.success) {

        const firstIssue = result.error.issues[0];
        const field = firstIssue?.path.join('.') ?? 'unknown';
        const message = firstIssue ? `${field}: ${firstIssue.message}` : 'Invalid config';

        throw new ConfigValidationError(message, field, result.error.issues);

    }

    return result.data;

}
