/**
 * Directive scanner tests.
 */
import { describe, it, expect } from 'vitest';

import { scanDirective, tokenize, isDirectiveKind } from '../../../src/core/template/scanner.js';
import { ParseError } from '../../../src/core/template/errors.js';

describe('template: scanner', () => {

    describe('isDirectiveKind', () => {

        it('should accept the five keywords', () => {

            for (const word of ['include', 'variable', 'loopover', 'loopvar', 'endloop']) {

                expect(isDirectiveKind(word)).toBe(true);

            }

        });

        it('should reject anything else', () => {

            expect(isDirectiveKind('if')).toBe(false);
            expect(isDirectiveKind('Variable')).toBe(false);
            expect(isDirectiveKind('')).toBe(false);

        });

    });

    describe('scanDirective', () => {

        it('should return null when no directive remains', () => {

            expect(scanDirective('plain text', 0)).toBeNull();
            expect(scanDirective('', 0)).toBeNull();

        });

        it('should find a directive with its span', () => {

            const directive = scanDirective('x /** variable n **/ y', 0);

            expect(directive).toEqual({
                kind: 'variable',
                argument: 'n',
                span: { start: 2, end: 20 },
            });

        });

        it('should pick the leftmost directive at or after the offset', () => {

            const text = '/** variable a **//** variable b **/';

            expect(scanDirective(text, 0)?.argument).toBe('a');
            expect(scanDirective(text, 1)).toEqual({
                kind: 'variable',
                argument: 'b',
                span: { start: 18, end: 36 },
            });

        });

        it('should stop the argument at the first close marker', () => {

            const directive = scanDirective('/** variable a**/b **/', 0);

            expect(directive?.argument).toBe('a');
            expect(directive?.span).toEqual({ start: 0, end: 17 });

        });

        it('should not require whitespace around the keyword', () => {

            const directive = scanDirective('/**variable name**/', 0);

            expect(directive?.kind).toBe('variable');
            expect(directive?.argument).toBe('name');

        });

        it('should keep an argument given to loopvar and endloop', () => {

            expect(scanDirective('/** loopvar ignored **/', 0)?.argument).toBe('ignored');
            expect(scanDirective('/** endloop **/', 0)?.argument).toBe('');

        });

        it('should skip open markers that are not directives', () => {

            const text = '/** just a comment with words **/ then /** variable v **/';

            const directive = scanDirective(text, 0);

            expect(directive?.argument).toBe('v');
            expect(directive?.span.start).toBe(39);

        });

        it('should skip an unterminated comment that does not start with a keyword', () => {

            expect(scanDirective('/**\n * Docs\n */', 0)).toBeNull();

        });

        it('should skip a comment that starts with a keyword', () => {

            const text = '<script>/** include polyfills for old browsers */</script><p>/** variable x **/</p>';

            expect(scanDirective(text, 0)).toEqual({
                kind: 'variable',
                argument: 'x',
                span: { start: 61, end: 79 },
            });

        });

        it('should skip an unclosed comment that starts with a keyword', () => {

            expect(scanDirective('/** loopover each row of the table */', 0)).toBeNull();

        });

        it('should honor custom markers', () => {

            const directive = scanDirective('Hi {{ variable name }}!', 0, { open: '{{', close: '}}' });

            expect(directive).toEqual({
                kind: 'variable',
                argument: 'name',
                span: { start: 3, end: 22 },
            });

        });

    });

    describe('parse errors', () => {

        it('should reject an unknown keyword with its offset', () => {

            const fn = () => scanDirective('ab/** foo **/', 0);

            expect(fn).toThrow(ParseError);
            expect(fn).toThrow("Unknown directive 'foo' at offset 2");

        });

        it('should reject a missing required argument', () => {

            expect(() => scanDirective('/** variable **/', 0))
                .toThrow("Directive 'variable' requires an argument at offset 0");
            expect(() => scanDirective('/** include **/', 0)).toThrow(ParseError);
            expect(() => scanDirective('/** loopover **/', 0)).toThrow(ParseError);

        });

        it('should reject more than one argument', () => {

            expect(() => scanDirective('/** include a b **/', 0))
                .toThrow("Directive 'include' takes a single argument at offset 0");

        });

        it('should reject an unterminated directive', () => {

            expect(() => scanDirective('text /** variable x', 0))
                .toThrow("Unterminated 'variable' directive at offset 5");

        });

        it('should not let a later directive close an unterminated one', () => {

            expect(() => scanDirective('/** include header.html /** variable x **/', 0))
                .toThrow("Unterminated 'include' directive at offset 0");

        });

        it('should reject empty markers', () => {

            const fn = () => scanDirective('text', 0, { open: '', close: '**/' });

            expect(fn).toThrow(ParseError);
            expect(fn).toThrow('Directive markers must be non-empty at offset 0');

        });

    });

    describe('tokenize', () => {

        it('should return directives in text order', () => {

            const directives = tokenize('/** loopover items **/B/** loopvar **/T/** endloop **/');

            expect(directives.map((d) => d.kind)).toEqual(['loopover', 'loopvar', 'endloop']);
            expect(directives.map((d) => d.span.start)).toEqual([0, 23, 39]);

        });

        it('should return an empty, frozen sequence for plain text', () => {

            const directives = tokenize('nothing here');

            expect(directives).toEqual([]);
            expect(Object.isFrozen(directives)).toBe(true);

        });

        it('should keep keyword-led comments as literal text', () => {

            const directives = tokenize('/** include the shared styles */ a /** variable b **/');

            expect(directives.map((d) => d.kind)).toEqual(['variable']);

        });

        it('should fail on the first bad directive', () => {

            expect(() => tokenize('/** variable a **/ /** nope **/')).toThrow(ParseError);

        });

    });

});
