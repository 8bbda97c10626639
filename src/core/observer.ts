/**
 * Central event system for weft.
 *
 * Core modules emit events, the logger and CLI subscribe. Rendering code
 * never writes to the console itself.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('template:include', { filepath, bytes })
 *
 * // In CLI - subscribe to events
 * const cleanup = observer.on('render:complete', (data) => report(data))
 *
 * // Pattern matching for multiple events
 * observer.on(/^loop:/, ({ event, data }) => logLoopEvent(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import { isDebug } from './environment.js'


/**
 * All events emitted by weft.
 *
 * Events are namespaced by module:
 * - `template:*` - Template loading and includes
 * - `context:*` - Context loading
 * - `render:*` - Render pass lifecycle
 * - `loop:*` - Loop iteration
 * - `logger:*` - Logger lifecycle
 * - `error` - Catch-all errors
 */
export interface WeftEvents {

    // Inputs
    'template:loaded': { filepath: string; directives: number }
    'template:include': { filepath: string; bytes: number }
    'context:loaded': { filepath: string; keys: number }

    // Render pass
    'render:start': { template: string; output: string }
    'render:complete': { template: string; output: string; durationMs: number; directives: number; iterations: number }
    'render:failed': { template: string; kind: string; error: string }

    // Loops
    'loop:start': { name: string; length: number }
    'loop:complete': { name: string; iterations: number }

    // Logger
    'logger:started': { level: string }

    // Errors
    'error': { source: string; error: Error }
}

export type WeftEventNames = Events<WeftEvents>;

/**
 * Global observer instance for weft.
 *
 * Enable debug mode with `WEFT_DEBUG=true` to see all events as they occur.
 */
export const observer = new ObserverEngine<WeftEvents>({
    name: 'weft',
    spy: isDebug()
        ? (action) => console.error(`[weft:${action.fn}] ${String(action.event)}`)
        : undefined
});
