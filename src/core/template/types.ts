/**
 * Template engine types.
 *
 * Directives, context values, loop frames and the output sink used by the
 * render loop.
 */


/**
 * Recognized directive keywords.
 */
export const DIRECTIVE_KINDS = [
    'include',
    'variable',
    'loopover',
    'loopvar',
    'endloop',
] as const


export type DirectiveKind = typeof DIRECTIVE_KINDS[number]


/**
 * Directives that must carry an argument.
 */
export const ARGUMENT_REQUIRED: ReadonlySet<DirectiveKind> = new Set([
    'include',
    'variable',
    'loopover',
])


/**
 * Half-open character range `[start, end)` in the template text.
 */
export interface Span {

    readonly start: number
    readonly end: number
}


/**
 * A directive found in the template text.
 */
export interface Directive {

    readonly kind: DirectiveKind
    readonly argument: string
    readonly span: Span
}


/**
 * Open and close markers surrounding a directive.
 */
export interface Markers {

    readonly open: string
    readonly close: string
}


export const DEFAULT_MARKERS: Markers = {
    open: '/**',
    close: '**/',
}


/**
 * A context value is either a scalar string or an ordered list of strings.
 */
export type ContextValue = string | readonly string[]


/**
 * Read-only name → value mapping consulted by `variable` and `loopover`.
 */
export interface ContextStore {

    get(name: string): ContextValue | undefined
    has(name: string): boolean
    keys(): string[]
    readonly size: number
}


/**
 * Resolves an include argument to file content.
 */
export interface FileResolver {

    read(name: string): Promise<string>
}


/**
 * Append-only destination for rendered text.
 */
export interface OutputSink {

    /**
     * Append a chunk. A returned promise settles once the sink can take
     * more output.
     */
    write(chunk: string): void | Promise<void>
}


/**
 * The single active iteration context.
 */
export interface LoopFrame {

    /** Context key being iterated */
    name: string

    list: readonly string[]

    index: number

    /** Text offset right after the `loopover` directive */
    bodyStart: number

    /** Index of the first directive after `loopover` */
    bodyToken: number
}


/**
 * Mutable state of one render pass.
 */
export interface RenderState {

    /** Text offset of the next literal to emit */
    cursor: number

    /** Index of the next directive to dispatch */
    token: number

    frame: LoopFrame | null

    /** Counters reported in the result */
    stats: RenderResult
}


/**
 * Options for rendering a template.
 */
export interface RenderOptions {

    /**
     * Resolver for `include` directives.
     * Defaults to reading files relative to the template's source directory.
     */
    resolver?: FileResolver

    /**
     * Directive markers used when the template is loaded or built here.
     * Defaults to `/**` and its mirror.
     */
    markers?: Markers
}


/**
 * Counters gathered during one render pass.
 */
export interface RenderResult {

    /** Directives dispatched, counting replays inside loops */
    directives: number

    /** Loop body iterations completed */
    iterations: number

    /** Include files read */
    includes: number
}


/**
 * Result of rendering a template file to an output file.
 */
export interface ProcessResult extends RenderResult {

    template: string

    output: string

    durationMs: number
}
