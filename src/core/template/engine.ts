/**
 * Render loop and directive dispatch.
 *
 * The template's directives are tokenized once. Rendering walks that
 * sequence with a cursor into the text and an index into the directives:
 * literal text between directives is copied to the sink, each directive is
 * dispatched to its handler, and `endloop` rewinds both cursor and index to
 * the start of the loop body until the list is exhausted.
 *
 * @example
 * ```typescript
 * import { processFile, renderString } from './engine'
 *
 * // Render files
 * const result = await processFile('site/index.html', 'out/index.html', 'site/data.json')
 *
 * // Or render a string directly
 * const html = await renderString(
 *     '<ul>/** loopover items **\/<li>/** loopvar **\/</li>/** endloop **\/</ul>',
 *     { items: ['a', 'b'] },
 * )
 * // → '<ul><li>a</li><li>b</li></ul>'
 * ```
 */
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import type {
    ContextStore,
    ContextValue,
    Directive,
    DirectiveKind,
    FileResolver,
    OutputSink,
    ProcessResult,
    RenderOptions,
    RenderResult,
    RenderState,
} from './types.js'
import { DEFAULT_MARKERS } from './types.js'
import { LoopStateError, RenderError, TypeMismatchError } from './errors.js'
import { Template, loadTemplate } from './template.js'
import { createContextStore, loadContext } from './context.js'
import { createFileResolver } from './resolver.js'
import { createStringSink, openFileSink } from './sink.js'


/**
 * Everything a directive handler may consult during one render pass.
 */
interface Dispatch {

    template: Template
    context: ContextStore
    resolver: FileResolver
    sink: OutputSink
    state: RenderState
}


type Handler = (directive: Directive, run: Dispatch) => void | Promise<void>


/**
 * Move past a directive to the next one in sequence.
 */
function advance(directive: Directive, state: RenderState): void {

    state.cursor = directive.span.end
    state.token += 1
}


/**
 * Find the `endloop` closing the loop opened at `state.token`.
 *
 * @throws LoopStateError on a nested `loopover` or a missing `endloop`
 */
function findEndLoop(directives: readonly Directive[], from: number, opener: Directive): number {

    for (let i = from + 1; i < directives.length; i++) {

        const directive = directives[i]

        if (directive?.kind === 'endloop') {

            return i
        }

        if (directive?.kind === 'loopover') {

            throw new LoopStateError(
                directive.span.start,
                `Nested 'loopover ${directive.argument}' inside 'loopover ${opener.argument}' is not supported`,
            )
        }
    }

    throw new LoopStateError(
        opener.span.start,
        `'loopover ${opener.argument}' has no matching 'endloop'`,
    )
}


const handlers: Record<DirectiveKind, Handler> = {

    async include(directive, { resolver, sink, state }) {

        await sink.write(await resolver.read(directive.argument))

        state.stats.includes += 1
        advance(directive, state)
    },

    async variable(directive, { context, sink, state }) {

        const value = context.get(directive.argument)

        // Missing keys and lists render as nothing
        if (typeof value === 'string') {

            await sink.write(value)
        }

        advance(directive, state)
    },

    loopover(directive, { template, context, state }) {

        const name = directive.argument
        const value: ContextValue = context.get(name) ?? []

        if (typeof value === 'string') {

            throw new TypeMismatchError(name, 'list')
        }

        const endToken = findEndLoop(template.directives, state.token, directive)

        observer.emit('loop:start', { name, length: value.length })

        if (value.length === 0) {

            const end = template.directives[endToken]

            state.cursor = end ? end.span.end : template.text.length
            state.token = endToken + 1

            observer.emit('loop:complete', { name, iterations: 0 })

            return
        }

        state.frame = {
            name,
            list: value,
            index: 0,
            bodyStart: directive.span.end,
            bodyToken: state.token + 1,
        }

        advance(directive, state)
    },

    async loopvar(directive, { sink, state }) {

        const { frame } = state

        if (!frame) {

            throw new LoopStateError(directive.span.start, `'loopvar' outside of a loop`)
        }

        await sink.write(frame.list[frame.index] ?? '')

        advance(directive, state)
    },

    endloop(directive, { state }) {

        const { frame } = state

        if (!frame) {

            throw new LoopStateError(directive.span.start, `'endloop' without a matching 'loopover'`)
        }

        frame.index += 1
        state.stats.iterations += 1

        if (frame.index < frame.list.length) {

            state.cursor = frame.bodyStart
            state.token = frame.bodyToken

            return
        }

        state.frame = null
        advance(directive, state)

        observer.emit('loop:complete', { name: frame.name, iterations: frame.index })
    },
}


/**
 * Render a template into a sink.
 *
 * Stops at the first failing directive; text written before it stays in
 * the sink.
 *
 * @param template - Tokenized template
 * @param context - Values for `variable` and `loopover`
 * @param sink - Output destination
 * @param options - Render options
 * @returns Counters for the pass
 * @throws RenderError subclasses on any fatal directive failure
 */
export async function renderTemplate(
    template: Template,
    context: ContextStore,
    sink: OutputSink,
    options: RenderOptions = {},
): Promise<RenderResult> {

    const state: RenderState = {
        cursor: 0,
        token: 0,
        frame: null,
        stats: { directives: 0, iterations: 0, includes: 0 },
    }

    const run: Dispatch = {
        template,
        context,
        resolver: options.resolver ?? createFileResolver(template.sourceDir),
        sink,
        state,
    }

    const { text, directives } = template

    for (
        let directive = directives[state.token];
        directive;
        directive = directives[state.token]
    ) {

        if (directive.span.start > state.cursor) {

            await sink.write(text.slice(state.cursor, directive.span.start))
        }

        await handlers[directive.kind](directive, run)

        state.stats.directives += 1
    }

    if (state.cursor < text.length) {

        await sink.write(text.slice(state.cursor))
    }

    return state.stats
}


/**
 * Render a template string to a string.
 *
 * Includes resolve against `process.cwd()` unless a resolver is given.
 *
 * @param text - Template text
 * @param data - Context values, or a prepared context store
 * @param options - Render options
 * @returns Rendered text
 */
export async function renderString(
    text: string,
    data: ContextStore | Record<string, ContextValue> = {},
    options: RenderOptions = {},
): Promise<string> {

    const template = new Template(text, process.cwd(), options.markers ?? DEFAULT_MARKERS)
    const context = isContextStore(data) ? data : createContextStore(data)
    const sink = createStringSink()

    await renderTemplate(template, context, sink, options)

    return sink.toString()
}


/**
 * Render a template file into an output file.
 *
 * The template and context are loaded in full before the output file is
 * opened. The output file is closed even when rendering fails, keeping
 * whatever was written up to the failure.
 *
 * @param templatePath - Template file
 * @param outputPath - Output file, created or truncated
 * @param contextPath - JSON/JSON5 context file
 * @param options - Render options
 * @returns Counters and timing for the pass
 *
 * @example
 * ```typescript
 * const result = await processFile('site/index.html', 'out/index.html', 'site/data.json')
 *
 * console.log(result.iterations)  // Loop bodies rendered
 * console.log(result.durationMs)  // 3
 * ```
 */
export async function processFile(
    templatePath: string,
    outputPath: string,
    contextPath: string,
    options: RenderOptions = {},
): Promise<ProcessResult> {

    const start = performance.now()

    observer.emit('render:start', {
        template: templatePath,
        output: outputPath,
    })

    const [stats, error] = await attempt(async () => {

        const template = await loadTemplate(templatePath, options.markers)
        const context = await loadContext(contextPath)
        const sink = await openFileSink(outputPath)

        const [result, renderError] = await attempt(() => renderTemplate(template, context, sink, options))

        await sink.close()

        if (renderError) {

            throw renderError
        }

        return result
    })

    if (error) {

        observer.emit('render:failed', {
            template: templatePath,
            kind: error instanceof RenderError ? error.kind : 'internal',
            error: error.message,
        })

        throw error
    }

    const durationMs = performance.now() - start

    observer.emit('render:complete', {
        template: templatePath,
        output: outputPath,
        durationMs,
        directives: stats.directives,
        iterations: stats.iterations,
    })

    return {
        ...stats,
        template: templatePath,
        output: outputPath,
        durationMs,
    }
}


function isContextStore(data: ContextStore | Record<string, ContextValue>): data is ContextStore {

    return typeof data['get'] === 'function' && typeof data['has'] === 'function'
}
