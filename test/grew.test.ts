// test/grew.test.ts
import { describe, it, expect } from 'vitest';
import { IdentifierAllocator } from '../src/ir/identifier.ts';
import { translate } from '../src/compiler/translate.ts';
import { parseGrew, translateGrew } from '../src/frontends/grew/index.ts';
import { NotSupportedError, ParseError } from '../src/errors/errors.ts';

function cqp(input: string): string {
  const ids = new IdentifierAllocator();
  return translate(translateGrew(input, ids), ids).query;
}

function parseFailure(input: string): ParseError {
  try {
    parseGrew(input);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error(`expected '${input}' to fail`);
}

describe('parseGrew', () => {
  it('accepts requests with items and comments', () => {
    expect(() =>
      parseGrew('pattern { V [upos=VERB]; N [] } % nouns\nwith { V -> N } without { N -[^amod|nmod]-> M }'),
    ).not.toThrow();
  });

  it('reports unexpected characters', () => {
    expect(parseFailure('pattern { X @ }').code).toBe('E_PARSE_UNEXPECTED_TOKEN');
  });

  it('reports incomplete requests', () => {
    const err = parseFailure('pattern {');
    expect(err.code).toBe('E_PARSE_GENERIC');
    expect(err.errors).toHaveLength(1);
  });
});

describe('translateGrew', () => {
  it('matches an arbitrary token for an empty pattern', () => {
    expect(cqp('pattern { }')).toBe('[]');
  });

  it('translates features of a single node', () => {
    expect(cqp('pattern { X [upos=NOUN, !Number] }')).toBe('[upos = "NOUN" & !Number]');
    expect(cqp('pattern { X [upos=NOUN|PROPN] }')).toBe('[(upos = "NOUN" | upos = "PROPN")]');
    expect(cqp('pattern { X [upos<>NOUN] }')).toBe('[upos != "NOUN"]');
  });

  it('translates a labelled edge in both arrangements', () => {
    expect(cqp('pattern { V [upos=VERB]; N [upos=NOUN]; V -[nsubj]-> N }')).toBe(
      'a:[upos = "VERB"] []* b:[upos = "NOUN" & deprel = "nsubj" & dephead = a.ref] | ' +
        'b:[upos = "NOUN" & deprel = "nsubj"] []* a:[upos = "VERB" & b.dephead = ref]',
    );
  });

  it('translates order relations', () => {
    expect(cqp('pattern { X [lemma=a]; Y [lemma=b]; X < Y }')).toBe('[lemma = "a"] [lemma = "b"]');
    expect(cqp('pattern { X []; Y []; Z []; X < Y }')).toBe('[] [] []* [] | [] []* [] []');
    expect(cqp('pattern { X [lemma=a]; Y [lemma=b]; X << Y }')).toBe('[lemma = "a"] []* [lemma = "b"]');
  });

  it('compares attributes of two nodes', () => {
    expect(cqp('pattern { X []; Y []; X << Y; X.lemma = Y.lemma }')).toBe('a:[] []* [a.lemma = lemma]');
  });

  it('escapes strings but keeps regular expressions', () => {
    expect(cqp('pattern { X [lemma="a.b"] }')).toBe('[lemma = "a\\.b"]');
    expect(cqp('pattern { X [lemma="a\\"b"] }')).toBe('[lemma = "a\\"b"]');
    expect(cqp('pattern { X [lemma=re"ab.*"] }')).toBe('[lemma = "ab.*"]');
  });

  it('rejects PCRE literals', () => {
    expect(() => translateGrew('pattern { X [lemma=/ab+/] }', new IdentifierAllocator())).toThrow(NotSupportedError);
  });

  it('adds a query part per request item', () => {
    const recipe = translateGrew('pattern { X [] } with { X -> Y } without { Y -> Z }', new IdentifierAllocator());
    const [query] = recipe.queries;
    expect(query.parts.map((p) => p.kind)).toEqual(['additional', 'negative']);
  });
});
