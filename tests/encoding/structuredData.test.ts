// tests/encoding/structuredData.test.ts
import { describe, it, expect } from 'vitest';
import { encodeStructuredData, escapeParamValue } from '../../src';
import type { SDParams } from '../../src';

describe('encodeStructuredData', () => {
    it('encodes an empty mapping as NILVALUE', () => {
        expect(encodeStructuredData({})).toBe('-');
        expect(encodeStructuredData(new Map())).toBe('-');
    });

    it('encodes a single element', () => {
        expect(encodeStructuredData({ 'exampleSDID@0': { iut: '3' } })).toBe('[exampleSDID@0 iut="3"]');
    });

    it('concatenates elements without a separator', () => {
        const encoded = encodeStructuredData({
            'exampleSDID@32473': { iut: '3', eventSource: 'Application', eventID: '1011' },
            'examplePriority@32473': { class: 'high' },
        });

        expect(encoded).toBe(
            '[exampleSDID@32473 iut="3" eventSource="Application" eventID="1011"][examplePriority@32473 class="high"]'
        );
    });

    it('writes an element with no params as just its id', () => {
        expect(encodeStructuredData({ 'origin': {} })).toBe('[origin]');
    });

    it('accepts Map input at both levels', () => {
        const data = new Map<string, SDParams>([
            ['a@1', new Map([['x', '1'], ['y', '2']])],
            ['b@2', { z: '3' }],
        ]);

        expect(encodeStructuredData(data)).toBe('[a@1 x="1" y="2"][b@2 z="3"]');
    });

    it('emits every element and param exactly once regardless of order', () => {
        const encoded = encodeStructuredData({ 'one@1': { a: '1', b: '2' }, 'two@2': { c: '3' } });
        const elements = encoded.match(/\[[^\]]*]/g) ?? [];

        expect(elements.sort()).toEqual(['[one@1 a="1" b="2"]', '[two@2 c="3"]']);
    });

    it('writes values verbatim by default', () => {
        expect(encodeStructuredData({ 'x@1': { path: 'a"b\\c]d' } })).toBe('[x@1 path="a"b\\c]d"]');
    });

    it('escapes quote, backslash and bracket when asked', () => {
        expect(encodeStructuredData({ 'x@1': { path: 'a"b\\c]d' } }, { escape: true }))
            .toBe('[x@1 path="a\\"b\\\\c\\]d"]');
    });
});

describe('escapeParamValue', () => {
    it('leaves plain values alone', () => {
        expect(escapeParamValue('192.168.1.1')).toBe('192.168.1.1');
    });

    it('escapes backslashes before quotes', () => {
        expect(escapeParamValue('\\"')).toBe('\\\\\\"');
    });
});
