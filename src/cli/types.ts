/**
 * CLI type definitions.
 */
import type { Writable } from 'node:stream'

import type { Config } from '../core/config/index.js'
import type { Logger } from '../core/logger/index.js'


/**
 * Positional inputs of a render invocation.
 */
export interface RenderParams {

    /** Template file to render */
    template: string

    /** File to write the rendered output to */
    output: string

    /** JSON/JSON5 file with the context values */
    context: string
}


/**
 * Headless command handler.
 *
 * @returns Process exit code
 */
export interface HeadlessCommand<P> {
    (
        params: P,
        config: Config,
        logger: Logger,
    ): Promise<number>
}


/**
 * Process-level inputs, injectable for tests.
 */
export interface CliIo {

    /** Environment to read WEFT_* variables from */
    env?: NodeJS.ProcessEnv

    /** Stream for log output (defaults to stderr) */
    console?: Writable
}


/**
 * Exit codes.
 */
export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2
