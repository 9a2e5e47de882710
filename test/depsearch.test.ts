// test/depsearch.test.ts
import { describe, it, expect } from 'vitest';
import { IdentifierAllocator } from '../src/ir/identifier.ts';
import { translate } from '../src/compiler/translate.ts';
import { translateDepsearch } from '../src/frontends/depsearch/index.ts';
import { NotSupportedError, ParseError } from '../src/errors/errors.ts';
import type { Query } from '../src/ir/types.ts';

function queryOf(input: string): Query {
  const [query] = translateDepsearch(input, new IdentifierAllocator()).queries;
  return query;
}

function cqp(input: string): string {
  const ids = new IdentifierAllocator();
  return translate(translateDepsearch(input, ids), ids).query;
}

const SUPPORTED = [
  '_',
  'L=cat',
  '(L=cat | L=dog) & !Case=Gen',
  'cat >amod _',
  'cat >amod (_ >amod _)',
  '_ >!amod _',
  'cat >amod !pretty',
  'first . second',
  'cat <lin_2:3@R NOUN',
  '"Person"',
  'L=tehdä&PartForm=Pres',
  'can&!AUX',
  '_ <nsubj _ >!amod _',
  'VerbForm=Part <acl _ >nsubj _',
];

const UNSUPPORTED = [
  '_ -> NOUN',
  '(dog <nsubj _) + cat',
  '_ !>amod _',
  'cat >amod|>nmod _',
  '_ <nsubj|<nsubj:cop _',
  'NOUN >amod (_ >amod|>acl _)',
  '_ <nsubj _ !(>amod|>acl) _',
];

describe('translateDepsearch', () => {
  it.each(SUPPORTED)('translates %s', (input) => {
    expect(() => queryOf(input)).not.toThrow();
  });

  it.each(UNSUPPORTED)('rejects %s', (input) => {
    expect(() => queryOf(input)).toThrow(NotSupportedError);
  });

  it('reads the wildcard as a token without attributes', () => {
    const query = queryOf('_');
    expect(query.tokens).toHaveLength(1);
    expect(query.tokens[0]?.attributes).toBeNull();
    expect(query.predicates).toHaveLength(0);
  });

  it('points < relations from the target to the head', () => {
    const query = queryOf('_ < _');
    const [head, target] = query.tokens.map((t) => t.identifier);
    expect(query.dependencies).toEqual([{ src: target, dst: head }]);
  });

  it('orders by the direction suffix', () => {
    const query = queryOf('_ <@L _');
    const [head, target] = query.tokens.map((t) => t.identifier);
    expect(query.constraints.filter((c) => c.type === 'Order')).toEqual([{ type: 'Order', fst: target, snd: head }]);
  });

  it('converts linear distances to gaps', () => {
    const query = queryOf('_ <lin_0:1000 _');
    expect(query.constraints.map((c) => (c.type === 'Distance' ? [c.comparison, c.distance] : c.type))).toEqual([
      ['>', -1],
      ['<', 1000],
    ]);
  });

  it.each(['_ <lin_-1:0 _', '_ <lin_-2:-1 _', '_ <lin_4:0 _'])('rejects the linear distance in %s', (input) => {
    expect(() => queryOf(input)).toThrow(ParseError);
  });

  it('renders a labelled dependency with a fixed direction', () => {
    expect(cqp('VERB >nsubj@R _')).toBe('a:[pos = "VERB"] []* [deprel = "nsubj" & dephead = a.ref]');
  });

  it('renders adjacent tokens', () => {
    expect(cqp('first . second')).toBe('[word = "first"] [word = "second"]');
  });

  it('renders token specifications', () => {
    expect(cqp('(L=cat | L=dog) & !Case=Gen')).toBe('[(lemma = "cat" | lemma = "dog") & !(ufeats contains "Case=Gen")]');
    expect(cqp('"Person"')).toBe('[word = "Person"]');
    expect(cqp('"a\\"b"')).toBe('[word = "a\\"b"]');
  });

  it('rejects characters outside the language', () => {
    expect(() => queryOf('cat % dog')).toThrow(ParseError);
  });
});
