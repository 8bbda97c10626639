/**
 * Headless execution of a render.
 *
 * Resolves config, starts the logger, runs the command and maps the
 * outcome to an exit code.
 *
 * @example
 * ```bash
 * weft site/index.html out/index.html site/data.json
 *
 * # JSON log lines for scripting
 * WEFT_JSON=true weft page.html out.html data.json 2> log.jsonl
 * ```
 */
import { attempt, attemptSync } from '@logosdx/utils';

import { resolveConfig } from '../../core/config/index.js';
import { Logger } from '../../core/logger/index.js';

import type { CliIo, RenderParams } from '../types.js';
import { EXIT_FAILURE, EXIT_USAGE } from '../types.js';

import * as CmdRender from './render.js';

/**
 * Parse positional inputs.
 *
 * @returns Render params, or null when the count is wrong
 */
export function parseParams(input: readonly string[]): RenderParams | null {

    const [template, output, context] = input;

    if (input.length !== 3 || !template || !output || !context) {

        return null;

    }

    return { template, output, context };

}

/**
 * Run weft in headless mode.
 *
 * @param input - Positional arguments
 * @param io - Environment and log stream
 * @returns Exit code (0 for success, non-zero for errors)
 */
export async function runHeadless(
    input: readonly string[],
    io: CliIo = {},
): Promise<number> {

    const out = io.console ?? process.stderr;
    const [config, configErr] = attemptSync(() => resolveConfig({}, io.env ?? process.env));

    if (configErr) {

        out.write(`Invalid configuration: ${configErr.message}\n`);

        return EXIT_FAILURE;

    }

    const logger = new Logger({ config: config.log, console: out });

    logger.start();

    const params = parseParams(input);

    if (!params) {

        logger.error(`Expected 3 arguments (template, output, context), got ${input.length}`);
        out.write(CmdRender.help);
        logger.stop();

        return EXIT_USAGE;

    }

    const [exitCode, err] = await attempt(() => CmdRender.run(params, config, logger));

    logger.stop();

    if (err) {

        out.write(`${err.message}\n`);

        return EXIT_FAILURE;

    }

    return exitCode;

}
