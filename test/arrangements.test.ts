// test/arrangements.test.ts
import { describe, it, expect } from 'vitest';
import { IdentifierAllocator } from '../src/ir/identifier.ts';
import { anchor, order } from '../src/ir/constraint.ts';
import { arrangements, countArrangements } from '../src/compiler/arrangements.ts';

const ids = new IdentifierAllocator();
const [a, b, c] = [ids.next(), ids.next(), ids.next()];
const tokens = [a, b, c];

describe('arrangements', () => {
  it('enumerates all permutations without constraints', () => {
    expect(countArrangements(tokens, [])).toBe(6);
  });

  it('follows the input order', () => {
    const [first, second] = [...arrangements([a, b], [])];
    expect(first).toEqual([a, b]);
    expect(second).toEqual([b, a]);
  });

  it('counts linear extensions of the order constraints', () => {
    expect(countArrangements(tokens, [order(a, b)])).toBe(3);
    expect(countArrangements(tokens, [order(a, b), order(a, c)])).toBe(2);
    expect(countArrangements(tokens, [order(a, b), order(b, c)])).toBe(1);
  });

  it('yields nothing for cyclic constraints', () => {
    expect(countArrangements(tokens, [order(a, b), order(b, a)])).toBe(0);
  });

  it('treats anchors as order constraints', () => {
    expect(countArrangements(tokens, [anchor(a, { first: true })])).toBe(2);
    expect([...arrangements(tokens, [anchor(a, { first: true }), anchor(b, { last: true })])]).toEqual([[a, c, b]]);
  });

  it('ignores constraints on other identifiers', () => {
    const outside = ids.next();
    expect(countArrangements([a, b], [order(outside, a), order(c, b)])).toBe(2);
  });

  it('can be iterated more than once', () => {
    const result = arrangements([a, b], [order(a, b)]);
    expect([...result]).toEqual([[a, b]]);
    expect([...result]).toEqual([[a, b]]);
  });
});
