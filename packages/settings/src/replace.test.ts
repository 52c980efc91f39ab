import { describe, expect, it } from 'vitest';

import { ValidationError } from './errors';
import { ReplacementMap } from './replace';

describe('ReplacementMap', () => {
  it('applies rules in insertion order', () => {
    const map = new ReplacementMap([
      [' ', '_'],
      ['_', '-']
    ]);

    expect(map.apply('a b')).toBe('a-b');
  });

  it('does not apply a rule to text produced only by a later rule', () => {
    const map = new ReplacementMap([
      ['_', '-'],
      [' ', '_']
    ]);

    expect(map.apply('a b_c')).toBe('a_b-c');
  });

  it('replaces every occurrence of a key', () => {
    const map = new ReplacementMap([['..', '.']]);
    expect(map.apply('a....b..c')).toBe('a..b.c');
  });

  it('keeps the original position when a key is overwritten', () => {
    const map = new ReplacementMap([
      ['a', '1'],
      ['b', '2']
    ]).with('a', '3');

    expect(map.entries()).toEqual([
      ['a', '3'],
      ['b', '2']
    ]);
  });

  it('returns copies instead of mutating', () => {
    const original = new ReplacementMap([['a', 'b']]);
    const edited = original.with('c', 'd');
    const copied = original.copy();

    expect(original.size).toBe(1);
    expect(edited.size).toBe(2);
    expect(copied).not.toBe(original);
    expect(copied.entries()).toEqual(original.entries());
  });

  it('builds from plain objects and maps', () => {
    expect(ReplacementMap.fromUntyped({ ' ': '_' }).entries()).toEqual([[' ', '_']]);
    expect(
      ReplacementMap.fromUntyped(
        new Map([
          ['2', 'two'],
          ['1', 'one']
        ])
      ).entries()
    ).toEqual([
      ['2', 'two'],
      ['1', 'one']
    ]);
  });

  it('rejects non-string pairs and empty keys', () => {
    expect(() => ReplacementMap.fromUntyped({ a: 1 })).toThrow("bad mapping: 'a': 1");
    expect(() => ReplacementMap.fromUntyped(new Map([[1, 'one']]))).toThrow("bad mapping: 1: 'one'");
    expect(() => ReplacementMap.fromUntyped({ '': 'x' })).toThrow(ValidationError);
    expect(() => ReplacementMap.fromUntyped(['a'])).toThrow(ValidationError);
  });

  it('serializes to a plain object', () => {
    expect(new ReplacementMap([['a', 'b']]).toJSON()).toEqual({ a: 'b' });
  });
});
