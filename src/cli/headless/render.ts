import { attempt } from '@logosdx/utils'

import { processFile } from '../../core/template/index.js'
import type { HeadlessCommand, RenderParams } from '../types.js'
import { EXIT_FAILURE, EXIT_OK } from '../types.js'

export const help = `
    Usage
      $ weft <template> <output> <context>

    Arguments
      template   Template file containing directives
      output     File to write the rendered result to
      context    JSON (or JSON5) file with the values to render

    Directives
      /** include FILE **/      Insert FILE, relative to the template
      /** variable NAME **/     Insert the string value of NAME
      /** loopover NAME **/     Repeat up to endloop once per item of NAME
      /** loopvar **/           Insert the current item
      /** endloop **/           End of the loop body

    Environment
      WEFT_LOG_LEVEL      silent, error, warn, info (default) or verbose
      WEFT_JSON           true to log JSON lines
      WEFT_COLOR          false to disable colored log labels
      WEFT_OPEN_MARKER    Directive open marker (default /**)
      WEFT_CLOSE_MARKER   Directive close marker (default **/)

    Examples
      $ weft site/index.html out/index.html site/data.json
`

export const run: HeadlessCommand<RenderParams> = async (params, config, logger) => {

    const [result, error] = await attempt(() => processFile(
        params.template,
        params.output,
        params.context,
        { markers: config.markers },
    ))

    // render:failed has already been logged from the observer
    if (error) return EXIT_FAILURE

    logger.debug(`${result.output} (${result.includes} includes)`)

    return EXIT_OK

}
