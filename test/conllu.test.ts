// test/conllu.test.ts
import { describe, it, expect } from 'vitest';
import { IdentifierAllocator } from '../src/ir/identifier.ts';
import { translate } from '../src/compiler/translate.ts';
import { readSentences } from '../src/frontends/conllu/reader.ts';
import { parseConllu, translateConllu } from '../src/frontends/conllu/index.ts';
import { NotSupportedError, ParseError } from '../src/errors/errors.ts';

const row = (...columns: string[]): string => columns.join('\t');

function cqp(input: string): string {
  const ids = new IdentifierAllocator();
  return translate(translateConllu(input, ids), ids).query;
}

function parseErrors(input: string): string[] {
  try {
    readSentences(input);
  } catch (err) {
    if (err instanceof ParseError) return err.errors.map((e) => `${e.position ?? '-'} ${e.message}`);
    throw err;
  }
  return [];
}

describe('readSentences', () => {
  it('splits sentences on blank lines and skips comments', () => {
    const input = [
      '# sent_id = 1',
      row('1', 'Hi', '_', 'INTJ', '_', '_', '0', 'root', '_', '_'),
      '',
      row('1', 'Bye', '_', 'INTJ', '_', '_', '0', 'root', '_', '_'),
      '',
    ].join('\n');
    expect(readSentences(input).map((s) => s.map((t) => t.columns.form))).toEqual([['Hi'], ['Bye']]);
  });

  it('accepts two or more spaces between columns', () => {
    const [sentence] = readSentences('1  dogs  dog  NOUN  _  Number=Plur  0  root  _  _');
    expect(sentence?.[0]?.feats.get('Number')).toBe('Plur');
  });

  it('reads multiword and empty token ids', () => {
    const input = [
      row('1-2', 'vámonos', '_', '_', '_', '_', '_', '_', '_', '_'),
      row('1', 'vamos', 'ir', 'VERB', '_', '_', '0', 'root', '_', '_'),
      row('2', 'nos', 'nosotros', 'PRON', '_', '_', '1', 'obj', '_', '_'),
      row('2.1', 'x', '_', '_', '_', '_', '_', '_', '_', '_'),
    ].join('\n');
    const [sentence] = readSentences(input);
    expect(sentence?.map((t) => t.id.kind)).toEqual(['multiword', 'word', 'word', 'empty']);
  });

  it('lists every malformed line', () => {
    const input = [
      row('1', 'a', '_', '_', '_'),
      row('x', 'b', '_', '_', '_', '_', '0', '_', '_', '_'),
      row('3', 'c', '_', '_', '_', '=Plur', '0', '_', '_', '_'),
    ].join('\n');
    expect(parseErrors(input)).toEqual([
      '1:1 Expected 10 columns, found 5.',
      "2:1 Invalid token id 'x'.",
      "3:1 Invalid features '=Plur'.",
    ]);
  });
});

describe('parseConllu', () => {
  it('rejects documents without tokens', () => {
    expect(() => parseConllu('# only a comment\n')).toThrow(ParseError);
    expect(() => parseConllu(row('1-2', 'au', '_', '_', '_', '_', '_', '_', '_', '_'))).toThrow(ParseError);
  });
});

describe('translateConllu', () => {
  it('translates annotations, heads and adjacency', () => {
    const input = [
      row('1', 'big', '_', 'ADJ', '_', '_', '2', 'amod', '_', '_'),
      row('2', 'dogs', '_', '_', '_', '_', '0', '_', '_', 'subsequent=Yes'),
    ].join('\n');
    expect(cqp(input)).toBe('a:[word = "big" & pos = "ADJ" & deprel = "amod"] [word = "dogs" & a.dephead = ref]');
  });

  it('creates one token per word and one dependency per non-root word', () => {
    const input = [
      row('1', 'The', 'the', 'DET', '_', '_', '3', 'det', '_', '_'),
      row('2', 'old', '_', 'ADJ', '_', '_', '3', 'amod', '_', '_'),
      row('3', 'man', 'man', 'NOUN', '_', '_', '4', 'nsubj', '_', '_'),
      row('4', 'sleeps', '_', 'VERB', '_', '_', '0', 'root', '_', '_'),
    ].join('\n');
    const ids = new IdentifierAllocator();
    const recipe = translateConllu(input, ids);
    const [query] = recipe.queries;
    expect(query.tokens).toHaveLength(4);
    expect(query.dependencies).toHaveLength(3);
    expect(translate(recipe, ids).query).not.toContain('"_"');
  });

  it('matches features and miscellaneous annotations', () => {
    const input = row('1', '_', 'dog', '_', '_', 'Number=Plur', '_', '_', '_', 'SpaceAfter=No|highlight=Yes');
    expect(cqp(input)).toBe('[lemma = "dog" & ufeats contains "Number=Plur" & SpaceAfter = "No"]');
  });

  it('escapes double quotes in values', () => {
    const input = row('1', '"', '"', 'PUNCT', '_', '_', '_', 'punct', '_', '_');
    expect(cqp(input)).toBe('[word = "\\"" & lemma = "\\"" & pos = "PUNCT" & deprel = "punct"]');
  });

  it('skips unspecified values', () => {
    expect(cqp(row('1', '*', '*', 'NOUN', '*', '_', '_', '*', '_', '_'))).toBe('[pos = "NOUN"]');
  });

  it('keeps words marked as ordered in order', () => {
    const input = [
      row('1', 'a', '_', '_', '_', '_', '_', '_', '_', 'ordered=Yes'),
      row('2', 'b', '_', '_', '_', '_', '_', '_', '_', 'ordered=Yes'),
    ].join('\n');
    expect(cqp(input)).toBe('[word = "a"] []* [word = "b"]');
  });

  it('anchors the first and last word', () => {
    const input = [
      row('1', 'a', '_', '_', '_', '_', '_', '_', '_', 'anchored=Yes'),
      row('2', 'b', '_', '_', '_', '_', '_', '_', '_', '_'),
      row('3', 'c', '_', '_', '_', '_', '_', '_', '_', 'anchored=Yes'),
    ].join('\n');
    const ids = new IdentifierAllocator();
    expect(translate(translateConllu(input, ids), ids, { span: 's' }).query).toBe(
      '<s> [word = "a"] []* [word = "b"] []* [word = "c"] </s>',
    );
  });

  it('translates only the first sentence', () => {
    const input = [row('1', 'a', '_', '_', '_', '_', '_', '_', '_', '_'), '', row('1', 'b', '_', '_', '_', '_', '_', '_', '_', '_')].join('\n');
    expect(cqp(input)).toBe('[word = "a"]');
  });

  it('rejects what cannot be expressed', () => {
    const ids = new IdentifierAllocator();
    expect(() => translateConllu(row('_', 'a', '_', '_', '_', '_', '_', '_', '_', '_'), ids)).toThrow(NotSupportedError);
    expect(() => translateConllu(row('1', 'a', '_', '_', '_', '_', '*', '_', '_', '_'), ids)).toThrow(NotSupportedError);
    expect(() => translateConllu(row('1', 'a', '_', '_', '_', '_', '5', '_', '_', '_'), ids)).toThrow(NotSupportedError);
  });

  it('rejects duplicate ids', () => {
    const input = [row('1', 'a', '_', '_', '_', '_', '_', '_', '_', '_'), row('1', 'b', '_', '_', '_', '_', '_', '_', '_', '_')].join('\n');
    expect(() => translateConllu(input, new IdentifierAllocator())).toThrow(ParseError);
  });
});
