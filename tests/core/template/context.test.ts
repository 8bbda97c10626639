/**
 * Context store tests.
 */
import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import {
    createContextStore,
    loadContext,
    parseContext,
} from '../../../src/core/template/context.js';
import { ContextError, IOError } from '../../../src/core/template/errors.js';
import { observer } from '../../../src/core/observer.js';

const FIXTURES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures/context');

describe('template: context', () => {

    describe('createContextStore', () => {

        it('should expose scalars and lists', () => {

            const context = createContextStore({ name: 'Ada', items: ['a', 'b'] });

            expect(context.get('name')).toBe('Ada');
            expect(context.get('items')).toEqual(['a', 'b']);
            expect(context.get('missing')).toBeUndefined();
            expect(context.has('name')).toBe(true);
            expect(context.has('missing')).toBe(false);
            expect(context.keys()).toEqual(['name', 'items']);
            expect(context.size).toBe(2);

        });

        it('should not be affected by later changes to the source data', () => {

            const items = ['a'];
            const context = createContextStore({ items });

            items.push('b');

            expect(context.get('items')).toEqual(['a']);

        });

        it('should default to an empty store', () => {

            expect(createContextStore().size).toBe(0);

        });

    });

    describe('parseContext', () => {

        it('should stringify numbers and booleans', () => {

            const context = parseContext({ count: 3, on: true, mixed: [1, 'two', false] });

            expect(context.get('count')).toBe('3');
            expect(context.get('on')).toBe('true');
            expect(context.get('mixed')).toEqual(['1', 'two', 'false']);

        });

        it('should reject nested objects with the offending key', () => {

            expect(() => parseContext({ owner: { name: 'x' } }, 'data.json'))
                .toThrow(ContextError);
            expect(() => parseContext({ owner: { name: 'x' } }, 'data.json'))
                .toThrow(/^Invalid context in data\.json: 'owner': /);

        });

        it('should reject null values', () => {

            expect(() => parseContext({ value: null })).toThrow(ContextError);

        });

        it('should reject a top level that is not an object', () => {

            expect(() => parseContext(['a'])).toThrow(ContextError);
            expect(() => parseContext('text')).toThrow(ContextError);
            expect(() => parseContext(null)).toThrow(ContextError);

        });

    });

    describe('loadContext', () => {

        it('should load a JSON5 file', async () => {

            const context = await loadContext(path.join(FIXTURES_DIR, 'valid.json5'));

            expect(context.get('title')).toBe('Notes');
            expect(context.get('count')).toBe('3');
            expect(context.get('tags')).toEqual(['x', 'y']);

        });

        it('should emit context:loaded', async () => {

            const seen: Array<{ filepath: string; keys: number }> = [];
            const cleanup = observer.on('context:loaded', (data) => {

                seen.push(data);

            });

            const filepath = path.join(FIXTURES_DIR, 'valid.json5');

            await loadContext(filepath);
            await new Promise((r) => setTimeout(r, 10));
            cleanup();

            expect(seen).toEqual([{ filepath, keys: 3 }]);

        });

        it('should fail with IOError for a missing file', async () => {

            const filepath = path.join(FIXTURES_DIR, 'missing.json');

            await expect(loadContext(filepath)).rejects.toMatchObject({
                name: 'IOError',
                filepath,
            });
            await expect(loadContext(filepath)).rejects.toBeInstanceOf(IOError);

        });

        it('should fail with ContextError for invalid JSON', async () => {

            await expect(loadContext(path.join(FIXTURES_DIR, 'broken.json')))
                .rejects.toBeInstanceOf(ContextError);

        });

        it('should fail with ContextError for nested values', async () => {

            await expect(loadContext(path.join(FIXTURES_DIR, 'nested.json')))
                .rejects.toBeInstanceOf(ContextError);

        });

        it('should fail with ContextError for a top-level array', async () => {

            await expect(loadContext(path.join(FIXTURES_DIR, 'array.json')))
                .rejects.toBeInstanceOf(ContextError);

        });

    });

});
