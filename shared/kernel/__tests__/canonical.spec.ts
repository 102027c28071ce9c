import { describe, expect, it } from 'vitest';

import { CanonicalJsonError, canonicalize } from '../canonical';
import { hashCanonical, sha256Hex } from '../hashing';

describe('canonicalize', () => {
  it('sorts keys at every depth and drops whitespace', () => {
    const value = { b: [3, { z: true, a: null }], a: 'x' };
    expect(canonicalize(value)).toBe('{"a":"x","b":[3,{"a":null,"z":true}]}');
  });

  it('keeps array order', () => {
    expect(canonicalize([3, 1, 2])).toBe('[3,1,2]');
  });

  it('escapes strings like JSON', () => {
    expect(canonicalize({ name: 'Quote "here"\n' })).toBe('{"name":"Quote \\"here\\"\\n"}');
  });

  it('rejects NaN and Infinity', () => {
    expect(() => canonicalize({ value: Number.NaN })).toThrow(CanonicalJsonError);
    expect(() => canonicalize([Number.POSITIVE_INFINITY])).toThrow(CanonicalJsonError);
  });

  it('is independent of insertion order', () => {
    expect(canonicalize({ x: 1, y: 2 })).toBe(canonicalize({ y: 2, x: 1 }));
  });
});

describe('hashing', () => {
  it('hashes the utf-8 bytes as lowercase hex', () => {
    expect(sha256Hex('{"a":1}')).toBe('015abd7f5cc57a2dd94b7590f04ad8084273905ee33ec5cebeae62276a97f862');
  });

  it('returns the canonical form alongside the hash', () => {
    const result = hashCanonical({ format: 'stroke_play' });
    expect(result.canonicalJson).toBe('{"format":"stroke_play"}');
    expect(result.hash).toBe('57790ab7e320bd40a0bc4c13263ce24a7327463a31f639bec578c0c27792dc4e');
  });
});
