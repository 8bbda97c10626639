/**
 * Template engine module.
 *
 * Renders text templates containing directives:
 * - `include FILE` inserts a file relative to the template
 * - `variable NAME` inserts a scalar context value
 * - `loopover NAME` ... `endloop` repeats its body once per list item
 * - `loopvar` inserts the current list item
 *
 * @example
 * ```typescript
 * import { processFile } from './core/template'
 *
 * const result = await processFile('site/index.html', 'out/index.html', 'site/data.json')
 * console.log(result.directives)
 * ```
 *
 * @module
 */

// Engine - main entry points
export { renderTemplate, renderString, processFile } from './engine.js';

// Template source
export { Template, loadTemplate } from './template.js';

// Scanner
export { scanDirective, tokenize, isDirectiveKind } from './scanner.js';

// Context
export { createContextStore, parseContext, loadContext, ContextSchema, type ContextInput } from './context.js';

// Includes
export { createFileResolver } from './resolver.js';

// Sinks
export { createStringSink, openFileSink, type StringSink, type FileSink } from './sink.js';

// Errors
export {
    RenderError,
    IOError,
    ParseError,
    TypeMismatchError,
    LoopStateError,
    ContextError,
    type RenderErrorKind,
} from './errors.js';

// Types
export type {
    Directive,
    DirectiveKind,
    Span,
    Markers,
    ContextValue,
    ContextStore,
    FileResolver,
    OutputSink,
    LoopFrame,
    RenderState,
    RenderOptions,
    RenderResult,
    ProcessResult,
} from './types.js';

export { DIRECTIVE_KINDS, ARGUMENT_REQUIRED, DEFAULT_MARKERS } from './types.js';
