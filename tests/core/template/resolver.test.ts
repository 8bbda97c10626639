/**
 * Include resolver tests.
 */
import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { createFileResolver } from '../../../src/core/template/resolver.js';
import { IOError } from '../../../src/core/template/errors.js';

const FIXTURES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures/engine');

describe('template: resolver', () => {

    it('should read files relative to the base directory', async () => {

        const resolver = createFileResolver(FIXTURES_DIR);

        expect(await resolver.read('header.html')).toBe('<header>Site</header>');
        expect(await resolver.read('partials/item.txt')).toBe('[item]');

    });

    it('should fail with IOError carrying the joined path', async () => {

        const resolver = createFileResolver(FIXTURES_DIR);
        const promise = resolver.read('partials/none.txt');

        await expect(promise).rejects.toBeInstanceOf(IOError);
        await expect(promise).rejects.toMatchObject({
            filepath: path.join(FIXTURES_DIR, 'partials', 'none.txt'),
        });

    });

});
