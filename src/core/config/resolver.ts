/**
 * Config resolver - merges configuration from multiple sources.
 *
 * Priority order (highest to lowest):
 * 1. Caller overrides
 * 2. Environment variables
 * 3. Defaults
 */
import { DEFAULT_MARKERS } from '../template/types.js'
import { isCi, isDev } from '../environment.js'
import type { Config, ConfigInput } from './schema.js'
import { parseConfig } from './schema.js'
import { getEnvConfig } from './env.js'


/**
 * Default config values.
 *
 * Development runs log everything; color is off when output is not a terminal.
 */
export function getDefaults(env: NodeJS.ProcessEnv = process.env): Config {

    return {
        log: {
            level: isDev(env) ? 'verbose' : 'info',
            json: false,
            color: !isCi(env),
        },
        markers: { ...DEFAULT_MARKERS },
    }
}


/**
 * Resolve the effective config.
 *
 * @param overrides - Caller overrides, applied last
 * @param env - Environment to read WEFT_* variables from
 * @throws ConfigValidationError if the merged config is invalid
 *
 * @example
 * ```typescript
 * const config = resolveConfig()
 * config.log.level   // 'info' unless WEFT_LOG_LEVEL is set
 * config.markers.open  // '/**' unless WEFT_OPEN_MARKER is set
 * ```
 */
export function resolveConfig(
    overrides: ConfigInput = {},
    env: NodeJS.ProcessEnv = process.env,
): Config {

    const defaults = getDefaults(env)
    const fromEnv = getEnvConfig(env)

    return parseConfig({
        log: {
            ...defaults.log,
            ...fromEnv.log,
            ...overrides.log,
        },
        markers: {
            ...defaults.markers,
            ...fromEnv.markers,
            ...overrides.markers,
        },
    })
}
