/**
 * Context store.
 *
 * Loads the key → value data consulted by `variable` and `loopover`.
 * Values are scalar strings or lists of strings; numbers and booleans are
 * accepted and stringified.
 *
 * @example
 * ```typescript
 * const context = await loadContext('/project/data.json')
 *
 * context.get('name')   // → 'Michael'
 * context.get('items')  // → ['a', 'b', 'c']
 * context.get('nope')   // → undefined
 * ```
 */
import { readFile } from 'node:fs/promises'

import { attempt, attemptSync } from '@logosdx/utils'
import JSON5 from 'json5'
import { z } from 'zod'

import { observer } from '../observer.js'
import type { ContextStore, ContextValue } from './types.js'
import { ContextError, IOError } from './errors.js'


const ScalarSchema = z
    .union([z.string(), z.number(), z.boolean()])
    .transform((value) => String(value))


/**
 * Schema for a context document: a flat object of scalars and scalar lists.
 */
export const ContextSchema = z.record(
    z.string(),
    z.union([ScalarSchema, z.array(ScalarSchema)]),
)


export type ContextInput = z.input<typeof ContextSchema>


/**
 * Create a read-only context store from plain data.
 *
 * @param data - Name → value record
 * @returns The context store
 */
export function createContextStore(
    data: Record<string, ContextValue> = {},
): ContextStore {

    const entries = new Map<string, ContextValue>()

    for (const [key, value] of Object.entries(data)) {

        entries.set(key, typeof value === 'string' ? value : Object.freeze([...value]))
    }

    return {
        get: (name) => entries.get(name),
        has: (name) => entries.has(name),
        keys: () => [...entries.keys()],
        size: entries.size,
    }
}


/**
 * Validate already-parsed data and build a context store.
 *
 * @param data - Parsed context document
 * @param source - Where the data came from, for error messages
 * @throws ContextError if the data is not a flat object of strings / string lists
 */
export function parseContext(data: unknown, source = '<inline>'): ContextStore {

    const result = ContextSchema.safeParse(data)

    if (!result.success) {

        const issue = result.error.issues[0]
        const where = issue && issue.path.length > 0 ? `'${issue.path.join('.')}': ` : ''
        const detail = issue ? `${where}${issue.message}` : 'invalid data'

        throw new ContextError(source, detail)
    }

    return createContextStore(result.data)
}


/**
 * Load a context file (JSON or JSON5).
 *
 * @param filepath - Path to the context file
 * @returns The context store
 * @throws IOError if the file cannot be read
 * @throws ContextError if the file does not parse or has the wrong shape
 */
export async function loadContext(filepath: string): Promise<ContextStore> {

    const [content, readError] = await attempt(() => readFile(filepath, 'utf-8'))

    if (readError) {

        throw new IOError(filepath, readError)
    }

    const text: string = content
    const [data, parseError] = attemptSync((): unknown => JSON5.parse(text))

    if (parseError) {

        throw new ContextError(filepath, parseError.message)
    }

    const context = parseContext(data, filepath)

    observer.emit('context:loaded', {
        filepath,
        keys: context.size,
    })

    return context
}
