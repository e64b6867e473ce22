import { describe, expect, it } from 'vitest';
import { buildCanonicalHash, sha256, stableStringify } from '../../lib/identity';

describe('stableStringify', () => {
    it('sorts keys and drops undefined properties', () => {
        expect(stableStringify({ b: 1, a: { d: undefined, c: [2, undefined] } })).toBe('{"a":{"c":[2,null]},"b":1}');
    });

    it('indents when asked', () => {
        expect(stableStringify({ b: 1, a: 2 }, 2)).toBe('{\n  "a": 2,\n  "b": 1\n}');
    });
});

describe('buildCanonicalHash', () => {
    it('ignores property order', () => {
        expect(buildCanonicalHash({ a: 1, b: [1, 2] })).toBe(buildCanonicalHash({ b: [1, 2], a: 1 }));
    });

    it('changes with array order', () => {
        expect(buildCanonicalHash({ a: [1, 2] })).not.toBe(buildCanonicalHash({ a: [2, 1] }));
    });

    it('is sha256 of the stable form', () => {
        expect(sha256('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
        expect(buildCanonicalHash({ b: 1, a: 2 })).toBe(sha256('{"a":2,"b":1}'));
    });
});
