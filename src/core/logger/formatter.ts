/**
 * Log Formatter
 *
 * Converts observer events into human-readable messages, text lines and
 * JSON entries.
 */
import ansis from 'ansis'

import type { EntryLevel, LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


/**
 * Human-readable message templates for known events.
 * Keys are event names, values are functions that generate messages from event data.
 */
const MESSAGE_TEMPLATES: Record<string, (data: Record<string, unknown>) => string> = {

    // Inputs
    'template:loaded': (d) => `Loaded template ${d['filepath']} (${d['directives']} directives)`,
    'template:include': (d) => `Included ${d['filepath']} (${d['bytes']} bytes)`,
    'context:loaded': (d) => `Loaded context ${d['filepath']} (${d['keys']} keys)`,

    // Render pass
    'render:start': (d) => `Rendering ${d['template']} -> ${d['output']}`,
    'render:complete': (d) => `Rendered ${d['template']} (${d['directives']} directives, ${d['iterations']} iterations, ${Math.round(Number(d['durationMs']))}ms)`,
    'render:failed': (d) => `Failed ${d['template']} [${d['kind']}]: ${d['error']}`,

    // Loops
    'loop:start': (d) => `Loop over ${d['name']} (${d['length']} items)`,
    'loop:complete': (d) => `Loop over ${d['name']} done after ${d['iterations']} iterations`,

    // Logger lifecycle
    'logger:started': (d) => `Logger started at ${d['level']} level`,

    // Generic error
    'error': (d) => `Error in ${d['source']}: ${summarizeValue(d['error'])}`,
}


/**
 * Level label colors for text output.
 */
const LEVEL_COLORS: Record<EntryLevel, (s: string) => string> = {
    error: (s) => ansis.red(s),
    warn: (s) => ansis.yellow(s),
    info: (s) => ansis.cyan(s),
    debug: (s) => ansis.gray(s),
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to generic format.
 *
 * @param event - Observer event name
 * @param data - Event payload
 * @returns Human-readable message
 *
 * @example
 * ```typescript
 * generateMessage('loop:start', { name: 'items', length: 3 })
 * // 'Loop over items (3 items)'
 *
 * generateMessage('custom:thing', { id: 7 })
 * // 'custom thing: id=7'
 * ```
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        return template(data)
    }

    // Generic format: "Event occurred" or "Event: key=value, ..."
    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and formats objects.
 */
function summarizeValue(value: unknown): string {

    if (value === null || value === undefined) {

        return String(value)
    }

    if (typeof value === 'string') {

        if (value.length > 50) {

            return `"${value.slice(0, 47)}..."`
        }

        return `"${value}"`
    }

    if (typeof value === 'number' || typeof value === 'boolean') {

        return String(value)
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (value instanceof Error) {

        return value.message
    }

    if (typeof value === 'object') {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Format an event into a LogEntry.
 *
 * @param event - Observer event name
 * @param data - Event payload
 * @param context - Additional context set on the logger
 * @param includeData - Whether to include full payload (verbose mode)
 * @returns Formatted log entry
 *
 * @example
 * ```typescript
 * const entry = formatEntry('context:loaded', { filepath: 'data.json', keys: 2 }, {}, false)
 * // {
 * //     timestamp: '2024-01-15T10:30:00.000Z',
 * //     level: 'info',
 * //     event: 'context:loaded',
 * //     message: 'Loaded context data.json (2 keys)'
 * // }
 * ```
 */
export function formatEntry(
    event: string,
    data: Record<string, unknown>,
    context: Record<string, unknown>,
    includeData: boolean,
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: classifyEvent(event),
        event,
        message: generateMessage(event, data),
    }

    if (includeData && Object.keys(data).length > 0) {

        entry.data = data
    }

    if (Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Serialize a log entry as one JSON line.
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry, (_key, value: unknown) => {

        if (value instanceof Error) {

            return { name: value.name, message: value.message }
        }

        return value
    }) + '\n'
}


/**
 * Format a compact text line.
 *
 * @example
 * ```typescript
 * formatLine('info', 'Rendered page.html', '2024-01-15T10:30:00.000Z', false)
 * // '[2024-01-15T10:30:00.000Z] [INFO ] Rendered page.html\n'
 * ```
 */
export function formatLine(
    level: EntryLevel,
    message: string,
    timestamp: string,
    color: boolean,
): string {

    const label = `[${level.toUpperCase().padEnd(5)}]`
    const styled = color ? LEVEL_COLORS[level](label) : label

    return `[${timestamp}] ${styled} ${message}\n`
}
