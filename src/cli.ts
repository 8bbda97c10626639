#!/usr/bin/env node
import meow from 'meow';

import { runHeadless } from './cli/headless/index.js';
import { help } from './cli/headless/render.js';

const cli = meow(help, {
    importMeta: import.meta,
    flags: {
        help: {
            type: 'boolean',
            shortFlag: 'h',
        },
        version: {
            type: 'boolean',
            shortFlag: 'v',
        },
    },
});

process.exitCode = await runHeadless(cli.input);
