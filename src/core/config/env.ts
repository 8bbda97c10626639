/**
 * Environment variable configuration.
 *
 * Config properties can be overridden via WEFT_* environment variables.
 *
 * @example
 * ```bash
 * WEFT_LOG_LEVEL=verbose
 * WEFT_JSON=true
 * WEFT_COLOR=false
 * WEFT_OPEN_MARKER='{{#'
 * WEFT_CLOSE_MARKER='#}}'
 * ```
 */
import type { ConfigInput } from './schema.js'
import { LogLevelSchema } from './schema.js'


/**
 * Parse a boolean env value. Anything but true/false/1/0 is ignored.
 */
function parseBool(value: string | undefined): boolean | undefined {

    if (value === undefined) {

        return undefined
    }

    const normalized = value.trim().toLowerCase()

    if (normalized === 'true' || normalized === '1') return true
    if (normalized === 'false' || normalized === '0') return false

    return undefined
}


/**
 * Read config values from environment variables.
 *
 * Unset variables are left out so they do not override defaults.
 *
 * @throws Error if WEFT_LOG_LEVEL is not a valid level
 *
 * @example
 * ```typescript
 * getEnvConfig({ WEFT_LOG_LEVEL: 'warn', WEFT_JSON: 'true' })
 * // { log: { level: 'warn', json: true } }
 * ```
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigInput {

    const config: ConfigInput = {}
    const log: NonNullable<ConfigInput['log']> = {}
    const markers: NonNullable<ConfigInput['markers']> = {}

    const level = env['WEFT_LOG_LEVEL']

    if (level !== undefined) {

        const result = LogLevelSchema.safeParse(level.toLowerCase())

        if (!result.success) {

            throw new Error(
                `Invalid WEFT_LOG_LEVEL: must be one of ${LogLevelSchema.options.join(', ')}`
            )
        }

        log.level = result.data
    }

    const json = parseBool(env['WEFT_JSON'])
    const color = parseBool(env['WEFT_COLOR'])

    if (json !== undefined) log.json = json
    if (color !== undefined) log.color = color

    if (env['WEFT_OPEN_MARKER'] !== undefined) markers.open = env['WEFT_OPEN_MARKER']
    if (env['WEFT_CLOSE_MARKER'] !== undefined) markers.close = env['WEFT_CLOSE_MARKER']

    if (Object.keys(log).length > 0) config.log = log
    if (Object.keys(markers).length > 0) config.markers = markers

    return config
}
