/**
 * Include file resolution.
 *
 * Include arguments are joined onto the template's source directory and read
 * in full every time they are requested. Nothing is cached, so an include
 * inside a loop body is read once per iteration.
 */
import { readFile } from 'node:fs/promises'
import path from 'node:path'

import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import type { FileResolver } from './types.js'
import { IOError } from './errors.js'


/**
 * Create a resolver that reads include files relative to `baseDir`.
 *
 * @param baseDir - Directory containing the template
 * @returns File resolver
 *
 * @example
 * ```typescript
 * const resolver = createFileResolver('/site/templates')
 * const header = await resolver.read('partials/header.html')
 * ```
 */
export function createFileResolver(baseDir: string): FileResolver {

    return {

        async read(name: string): Promise<string> {

            const filepath = path.join(baseDir, name)
            const [content, error] = await attempt(() => readFile(filepath, 'utf-8'))

            if (error) {

                throw new IOError(filepath, error)
            }

            observer.emit('template:include', {
                filepath,
                bytes: Buffer.byteLength(content),
            })

            return content
        },
    }
}
