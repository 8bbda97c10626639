/**
 * Template source tests.
 */
import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { Template, loadTemplate } from '../../../src/core/template/template.js';
import { IOError, ParseError } from '../../../src/core/template/errors.js';
import { DEFAULT_MARKERS } from '../../../src/core/template/types.js';

const FIXTURES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures/engine');

describe('template: source', () => {

    it('should tokenize on construction', () => {

        const template = new Template('a/** variable b **/c', '/tmp');

        expect(template.directives).toHaveLength(1);
        expect(template.sourceDir).toBe('/tmp');
        expect(template.markers).toEqual(DEFAULT_MARKERS);
        expect(template.filepath).toBeNull();

    });

    it('should throw ParseError for a bad directive', () => {

        expect(() => new Template('/** bogus **/', '/tmp')).toThrow(ParseError);

    });

    it('should load a template file with its directory', async () => {

        const filepath = path.join(FIXTURES_DIR, 'list.html');
        const template = await loadTemplate(filepath);

        expect(template.filepath).toBe(filepath);
        expect(template.sourceDir).toBe(FIXTURES_DIR);
        expect(template.directives.map((d) => d.kind)).toEqual(['loopover', 'loopvar', 'endloop']);

    });

    it('should fail with IOError for a missing template', async () => {

        await expect(loadTemplate(path.join(FIXTURES_DIR, 'absent.html')))
            .rejects.toBeInstanceOf(IOError);

    });

});
