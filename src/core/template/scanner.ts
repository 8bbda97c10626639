/**
 * Directive scanner.
 *
 * A directive is an open marker, a keyword, an optional whitespace-free
 * argument and a close marker:
 *
 * ```
 * /** variable name **\/
 * /** loopover items **\/ ... /** endloop **\/
 * ```
 *
 * The argument ends at the first close marker, so it can never contain one.
 * A close marker only closes the directive when no other open marker comes
 * before it.
 * An open marker that is not followed by something shaped like a directive
 * (a doc comment, prose) is left as literal text.
 *
 * @example
 * ```typescript
 * const directives = tokenize('Hello /** variable name **\/!')
 * // [{ kind: 'variable', argument: 'name', span: { start: 6, end: 27 } }]
 * ```
 */
import type { Directive, DirectiveKind, Markers } from './types.js'
import { ARGUMENT_REQUIRED, DEFAULT_MARKERS, DIRECTIVE_KINDS } from './types.js'
import { ParseError } from './errors.js'


const KEYWORD_PATTERN = /^[A-Za-z_][\w-]*$/


/**
 * Check whether a word is a recognized directive keyword.
 */
export function isDirectiveKind(word: string): word is DirectiveKind {

    return DIRECTIVE_KINDS.some((kind) => kind === word)
}


/**
 * Find the earliest directive starting at or after `offset`.
 *
 * @param text - Template text
 * @param offset - Offset to start searching from
 * @param markers - Directive markers
 * @returns The directive, or null when none remains
 * @throws ParseError on an unknown keyword or a malformed directive
 */
export function scanDirective(
    text: string,
    offset: number,
    markers: Markers = DEFAULT_MARKERS,
): Directive | null {

    if (!markers.open || !markers.close) {

        throw new ParseError(offset, 'Directive markers must be non-empty')
    }

    let from = offset

    while (from <= text.length) {

        const start = text.indexOf(markers.open, from)

        if (start === -1) {

            return null
        }

        const directive = parseAt(text, start, markers)

        if (directive) {

            return directive
        }

        from = start + 1
    }

    return null
}


/**
 * Tokenize a whole template into its ordered directive sequence.
 *
 * @param text - Template text
 * @param markers - Directive markers
 * @returns Frozen array of directives in text order
 * @throws ParseError on the first unknown keyword or malformed directive
 */
export function tokenize(
    text: string,
    markers: Markers = DEFAULT_MARKERS,
): readonly Directive[] {

    const directives: Directive[] = []
    let offset = 0

    for (;;) {

        const directive = scanDirective(text, offset, markers)

        if (!directive) {

            break
        }

        directives.push(directive)
        offset = directive.span.end
    }

    return Object.freeze(directives)
}


/**
 * Try to read a directive whose open marker sits at `start`.
 *
 * Returns null when the marker does not introduce a directive.
 */
function parseAt(text: string, start: number, markers: Markers): Directive | null {

    const innerStart = start + markers.open.length
    const closeAt = text.indexOf(markers.close, innerStart)
    const nextOpen = text.indexOf(markers.open, innerStart)

    // A close marker past the next open marker belongs to a later directive
    const closed = closeAt !== -1 && (nextOpen === -1 || nextOpen >= closeAt)
    const innerEnd = closed
        ? closeAt
        : nextOpen === -1 ? text.length : nextOpen

    const words = text.slice(innerStart, innerEnd).trim().split(/\s+/).filter(Boolean)
    const [keyword, argument = '', ...extra] = words

    if (keyword === undefined) {

        return null
    }

    if (!isDirectiveKind(keyword)) {

        // Only a lone identifier (with at most one argument) reads as a directive
        if (closed && extra.length === 0 && KEYWORD_PATTERN.test(keyword)) {

            throw new ParseError(start, `Unknown directive '${keyword}'`)
        }

        return null
    }

    if (!closed) {

        // Prose that happens to start with a keyword
        if (extra.length > 0) {

            return null
        }

        throw new ParseError(start, `Unterminated '${keyword}' directive`)
    }

    if (extra.length > 0) {

        throw new ParseError(start, `Directive '${keyword}' takes a single argument`)
    }

    if (!argument && ARGUMENT_REQUIRED.has(keyword)) {

        throw new ParseError(start, `Directive '${keyword}' requires an argument`)
    }

    return {
        kind: keyword,
        argument,
        span: {
            start,
            end: closeAt + markers.close.length,
        },
    }
}
