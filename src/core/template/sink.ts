/**
 * Output sinks.
 *
 * Rendered text is appended as it is produced. A failed render leaves
 * whatever was written before the failure in place.
 */
import { createWriteStream, type WriteStream } from 'node:fs'
import { once } from 'node:events'

import { attempt } from '@logosdx/utils'

import type { OutputSink } from './types.js'
import { IOError } from './errors.js'


/**
 * In-memory sink.
 */
export interface StringSink extends OutputSink {

    write(chunk: string): void
    toString(): string
}


/**
 * Sink backed by an output file.
 */
export interface FileSink extends OutputSink {

    readonly filepath: string

    /**
     * Flush and close the file.
     *
     * @throws IOError if any write failed
     */
    close(): Promise<void>
}


/**
 * Create a sink that collects output in memory.
 *
 * @example
 * ```typescript
 * const sink = createStringSink()
 * sink.write('a')
 * sink.write('b')
 * sink.toString()  // → 'ab'
 * ```
 */
export function createStringSink(): StringSink {

    const chunks: string[] = []

    return {
        write: (chunk) => {

            chunks.push(chunk)
        },
        toString: () => chunks.join(''),
    }
}


/**
 * Open an output file for writing, truncating it.
 *
 * @param filepath - Output file path
 * @returns File sink, already open
 * @throws IOError if the file cannot be opened
 */
export async function openFileSink(filepath: string): Promise<FileSink> {

    const stream: WriteStream = createWriteStream(filepath, { encoding: 'utf-8' })
    const [, openError] = await attempt(() => once(stream, 'open'))

    if (openError) {

        throw new IOError(filepath, openError)
    }

    let writeError: Error | null = null

    stream.on('error', (error) => {

        writeError = error
    })

    return {
        filepath,

        async write(chunk): Promise<void> {

            if (stream.write(chunk)) {

                return
            }

            const [, drainError] = await attempt(() => once(stream, 'drain'))

            if (drainError) {

                throw new IOError(filepath, drainError)
            }
        },

        async close(): Promise<void> {

            await new Promise<void>((resolve) => {

                stream.end(() => resolve())
            })

            if (writeError) {

                throw new IOError(filepath, writeError)
            }
        },
    }
}
