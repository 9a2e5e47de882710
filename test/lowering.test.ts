// test/lowering.test.ts
import { describe, it, expect } from 'vitest';
import { IdentifierAllocator } from '../src/ir/identifier.ts';
import { attribute, comparison, literal } from '../src/ir/predicate.ts';
import { anchor, distance, order } from '../src/ir/constraint.ts';
import { createQuery, dependency, token } from '../src/ir/query.ts';
import { compileQuery, globalPredicates, lowerQuery, respectsDistances, spacingBetween } from '../src/compiler/lowering.ts';
import { formatLinearQuery } from '../src/compiler/formatter.ts';
import { NotSupportedError } from '../src/errors/errors.ts';

const word = (value: string) => comparison(attribute(null, 'word'), '=', literal(`"${value}"`));

describe('spacingBetween', () => {
  const ids = new IdentifierAllocator();
  const a = ids.next();
  const b = ids.next();

  it('is arbitrary without distance constraints', () => {
    expect(spacingBetween([order(a, b)], a, b)).toEqual({ min: 0, max: null });
  });

  it('converts strict bounds to inclusive ones', () => {
    expect(spacingBetween([distance(a, b).lt(3)], a, b)).toEqual({ min: 0, max: 2 });
    expect(spacingBetween([distance(a, b).gt(1)], a, b)).toEqual({ min: 2, max: null });
  });

  it('applies constraints in either direction', () => {
    expect(spacingBetween([distance(b, a).eq(1)], a, b)).toEqual({ min: 1, max: 1 });
  });

  it('intersects multiple constraints', () => {
    expect(spacingBetween([distance(a, b).ge(1), distance(a, b).le(4)], a, b)).toEqual({ min: 1, max: 4 });
  });

  it('rejects inequality and contradictions', () => {
    expect(() => spacingBetween([distance(a, b).ne(1)], a, b)).toThrow(NotSupportedError);
    expect(() => spacingBetween([distance(a, b).eq(1), distance(a, b).eq(2)], a, b)).toThrow(NotSupportedError);
  });
});

describe('globalPredicates', () => {
  it('raises token attributes and removes duplicates', () => {
    const ids = new IdentifierAllocator();
    const a = ids.next();
    const query = createQuery(ids, {
      tokens: [token(a, word('x'))],
      predicates: [comparison(attribute(a, 'word'), '=', literal('"x"'))],
    });
    expect(globalPredicates(query)).toEqual([comparison(attribute(a, 'word'), '=', literal('"x"'))]);
  });
});

describe('compileQuery', () => {
  it('lists both arrangements of a dependency', () => {
    const ids = new IdentifierAllocator();
    const a = ids.next();
    const b = ids.next();
    const query = createQuery(ids, { tokens: [token(a), token(b)], dependencies: [dependency(a, b)] });
    expect(formatLinearQuery(compileQuery(query))).toBe(
      'a:[] []* b:[dephead = a.ref] | b:[] []* a:[b.dephead = ref]',
    );
  });

  it('places fixed gaps between ordered tokens', () => {
    const ids = new IdentifierAllocator();
    const a = ids.next();
    const b = ids.next();
    const query = createQuery(ids, {
      tokens: [token(a, word('x')), token(b, word('y'))],
      constraints: [order(a, b), distance(a, b).eq(1)],
    });
    expect(formatLinearQuery(compileQuery(query))).toBe('[word = "x"] [] [word = "y"]');
  });

  it('renders anchors as span boundaries when asked to', () => {
    const ids = new IdentifierAllocator();
    const a = ids.next();
    const b = ids.next();
    const query = createQuery(ids, {
      tokens: [token(a, word('x')), token(b)],
      constraints: [anchor(a, { first: true }), anchor(b, { last: true })],
    });
    expect(formatLinearQuery(compileQuery(query), { span: 's' })).toBe('<s> [word = "x"] []* [] </s>');
    expect(formatLinearQuery(compileQuery(query))).toBe('[word = "x"] []* []');
  });

  it('attaches a predicate to the token completing its references', () => {
    const ids = new IdentifierAllocator();
    const a = ids.next();
    const b = ids.next();
    const query = createQuery(ids, {
      tokens: [token(a), token(b)],
      constraints: [order(a, b)],
      predicates: [comparison(attribute(a, 'lemma'), '=', attribute(b, 'lemma'))],
    });
    expect(formatLinearQuery(compileQuery(query))).toBe('a:[] []* [a.lemma = lemma]');
  });

  it('fails when the order constraints are cyclic', () => {
    const ids = new IdentifierAllocator();
    const a = ids.next();
    const b = ids.next();
    const query = createQuery(ids, { tokens: [token(a), token(b)], constraints: [order(a, b), order(b, a)] });
    expect(() => compileQuery(query)).toThrow(NotSupportedError);
  });

  it('reports every arrangement before lowering it', () => {
    const ids = new IdentifierAllocator();
    const query = createQuery(ids, { tokens: [token(ids.next()), token(ids.next()), token(ids.next())] });
    const seen: number[] = [];
    compileQuery(query, { onArrangement: (index) => seen.push(index) });
    expect(seen).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('stops when the arrangement hook throws', () => {
    const ids = new IdentifierAllocator();
    const query = createQuery(ids, { tokens: [token(ids.next()), token(ids.next())] });
    const stop = (index: number): void => {
      if (index === 1) throw new Error('stop');
    };
    expect(() => compileQuery(query, { onArrangement: stop })).toThrow('stop');
  });

  it('calls the arrangement hook before lowering the arrangement', () => {
    const ids = new IdentifierAllocator();
    const a = ids.next();
    const b = ids.next();
    const query = createQuery(ids, {
      tokens: [token(a), token(b)],
      constraints: [distance(a, b).eq(1), distance(a, b).eq(2)],
    });
    const stop = (): void => {
      throw new Error('stop');
    };
    expect(() => compileQuery(query)).toThrow(NotSupportedError);
    expect(() => compileQuery(query, { onArrangement: stop })).toThrow('stop');
  });

  it('skips arrangements that put too many tokens inside a distance', () => {
    const ids = new IdentifierAllocator();
    const a = ids.next();
    const b = ids.next();
    const c = ids.next();
    const query = createQuery(ids, {
      tokens: [token(a, word('x')), token(b, word('y')), token(c, word('z'))],
      constraints: [order(a, b), distance(a, b).eq(0)],
    });
    expect(formatLinearQuery(compileQuery(query))).toBe(
      '[word = "x"] [word = "y"] []* [word = "z"] | [word = "z"] []* [word = "x"] [word = "y"]',
    );
  });

  it('fails when no arrangement fits the distance constraints', () => {
    const ids = new IdentifierAllocator();
    const a = ids.next();
    const b = ids.next();
    const c = ids.next();
    const query = createQuery(ids, {
      tokens: [token(a), token(b), token(c)],
      constraints: [order(a, c), order(c, b), distance(a, b).lt(1)],
    });
    expect(() => compileQuery(query)).toThrow(NotSupportedError);
  });
});

describe('respectsDistances', () => {
  const ids = new IdentifierAllocator();
  const a = ids.next();
  const b = ids.next();
  const c = ids.next();

  it('counts the tokens between the endpoints', () => {
    expect(respectsDistances([a, c, b], [distance(a, b).le(1)])).toBe(true);
    expect(respectsDistances([a, c, b], [distance(a, b).eq(0)])).toBe(false);
  });

  it('ignores lower bounds', () => {
    expect(respectsDistances([a, b, c], [distance(a, b).gt(3)])).toBe(true);
  });
});

describe('lowerQuery', () => {
  it('is lazy', () => {
    const ids = new IdentifierAllocator();
    const query = createQuery(ids, { tokens: [token(ids.next()), token(ids.next())] });
    const lowered = lowerQuery(query);
    expect(lowered.next().done).toBe(false);
    expect(lowered.next().done).toBe(false);
    expect(lowered.next().done).toBe(true);
  });
});
