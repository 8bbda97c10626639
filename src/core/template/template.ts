/**
 * Template source.
 *
 * A template is immutable text plus the directory includes resolve against.
 * Its directives are tokenized once, on construction.
 */
import { readFile } from 'node:fs/promises'
import path from 'node:path'

import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import type { Directive, Markers } from './types.js'
import { DEFAULT_MARKERS } from './types.js'
import { IOError } from './errors.js'
import { tokenize } from './scanner.js'


export class Template {

    readonly directives: readonly Directive[]

    /**
     * @param text - Template source text
     * @param sourceDir - Directory that include paths are relative to
     * @param markers - Directive markers
     * @param filepath - File the text was read from, if any
     * @throws ParseError if the text holds an unknown or malformed directive
     */
    constructor(
        public readonly text: string,
        public readonly sourceDir: string,
        public readonly markers: Markers = DEFAULT_MARKERS,
        public readonly filepath: string | null = null,
    ) {

        this.directives = tokenize(text, markers)
    }
}


/**
 * Read and tokenize a template file.
 *
 * @param filepath - Path to the template
 * @param markers - Directive markers
 * @throws IOError if the file cannot be read
 * @throws ParseError if the template holds an unknown or malformed directive
 *
 * @example
 * ```typescript
 * const template = await loadTemplate('/site/index.html')
 * template.sourceDir          // → '/site'
 * template.directives.length  // → 4
 * ```
 */
export async function loadTemplate(
    filepath: string,
    markers: Markers = DEFAULT_MARKERS,
): Promise<Template> {

    const [text, error] = await attempt(() => readFile(filepath, 'utf-8'))

    if (error) {

        throw new IOError(filepath, error)
    }

    const template = new Template(text, path.dirname(filepath), markers, filepath)

    observer.emit('template:loaded', {
        filepath,
        directives: template.directives.length,
    })

    return template
}
