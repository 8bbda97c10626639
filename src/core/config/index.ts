/**
 * Config module - runtime configuration for weft.
 *
 * Handles defaults, WEFT_* environment variables and validation.
 */

// Schema & Validation
export {
    ConfigSchema,
    ConfigInputSchema,
    LogLevelSchema,
    ConfigValidationError,
    parseConfig,
    type Config,
    type ConfigInput,
} from './schema.js';

// Resolver
export { resolveConfig, getDefaults } from './resolver.js';

// Environment variables
export { getEnvConfig } from './env.js';
