/**
 * Render errors.
 *
 * Every failure that aborts a render is a `RenderError`. Output written
 * before the failure is left in place.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => renderTemplate(template, context, sink))
 * if (err instanceof LoopStateError) {
 *     console.log(`Loop misuse at offset ${err.offset}`)
 * }
 * ```
 */


export type RenderErrorKind =
    | 'io'
    | 'parse'
    | 'type-mismatch'
    | 'loop-state'
    | 'context'


/**
 * Base class for all fatal render errors.
 */
export class RenderError extends Error {

    override readonly name: string = 'RenderError'

    constructor(
        public readonly kind: RenderErrorKind,
        message: string,
        options?: { cause?: unknown },
    ) {

        super(message, options)
    }
}


/**
 * A template, context, include or output file could not be read or written.
 */
export class IOError extends RenderError {

    override readonly name = 'IOError' as const

    constructor(
        public readonly filepath: string,
        cause: unknown,
    ) {

        const reason = cause instanceof Error ? cause.message : String(cause)

        super('io', `Cannot access ${filepath}: ${reason}`, { cause })
    }
}


/**
 * Unknown directive keyword or malformed directive syntax.
 */
export class ParseError extends RenderError {

    override readonly name = 'ParseError' as const

    constructor(
        public readonly offset: number,
        detail: string,
    ) {

        super('parse', `${detail} at offset ${offset}`)
    }
}


/**
 * A context entry has the wrong shape for the directive using it.
 */
export class TypeMismatchError extends RenderError {

    override readonly name = 'TypeMismatchError' as const

    constructor(
        public readonly key: string,
        public readonly expected: 'scalar' | 'list',
    ) {

        const actual = expected === 'list' ? 'scalar' : 'list'

        super('type-mismatch', `Context key '${key}' is a ${actual}, expected a ${expected}`)
    }
}


/**
 * `loopvar` or `endloop` without an active loop, or a loop that cannot start.
 */
export class LoopStateError extends RenderError {

    override readonly name = 'LoopStateError' as const

    constructor(
        public readonly offset: number,
        detail: string,
    ) {

        super('loop-state', `${detail} at offset ${offset}`)
    }
}


/**
 * The context file parsed but does not hold a name → string | string[] object.
 */
export class ContextError extends RenderError {

    override readonly name = 'ContextError' as const

    constructor(
        public readonly filepath: string,
        detail: string,
    ) {

        super('context', `Invalid context in ${filepath}: ${detail}`)
    }
}
