// src/frontends/conllu/builder.ts
// CoNLL-U sentence -> query graph.
//
// Every word line becomes a token. Annotation columns map to corpus attributes,
// `feats` entries are matched inside `ufeats`, and `misc` entries become
// attributes of their own unless they are reserved for the translation.

import type { Identifier, IdentifierAllocator } from '../../ir/identifier.ts';
import type { ComparisonOperator, Constraint, Dependency, Predicate, Recipe } from '../../ir/types.ts';
import { attribute, comparison, quoted } from '../../ir/predicate.ts';
import { anchor, distance, order } from '../../ir/constraint.ts';
import { createQuery, dependency, token } from '../../ir/query.ts';
import { recipeOfQuery } from '../../ir/recipe.ts';
import { failParse, failUnsupported } from '../frontendErrors.ts';
import type { Column, ConlluToken, Sentence } from './reader.ts';
import { NO_VALUE, UNSPECIFIED_VALUE } from './reader.ts';

/** Columns matched directly against a corpus attribute. */
export const ANNOTATION_COLUMNS: ReadonlyMap<Column, string> = new Map<Column, string>([
  ['form', 'word'],
  ['lemma', 'lemma'],
  ['upos', 'pos'],
  ['xpos', 'msd'],
  ['deprel', 'deprel'],
]);

/** Attribute holding the `feats` column as a `Key=Value` set. */
export const FEATURES_ATTRIBUTE = 'ufeats';

/** `misc` keys that steer the translation instead of matching tokens. */
export const RESERVED_ANNOTATIONS: ReadonlySet<string> = new Set(['ordered', 'subsequent', 'anchored', 'highlight']);

function hasAnnotation(conllu: ConlluToken, name: string): boolean {
  return conllu.misc.get(name) === 'Yes';
}

function matches(on: Identifier, name: string, value: string, operator: ComparisonOperator = '='): Predicate {
  return comparison(attribute(on, name), operator, quoted(value));
}

export class ConlluQueryBuilder {
  readonly predicates: Predicate[] = [];
  readonly dependencies: Dependency[] = [];
  readonly constraints: Constraint[] = [];
  private readonly identifiers: ReadonlyMap<number, Identifier>;
  private readonly words: readonly ConlluToken[];

  constructor(sentence: Sentence, allocator: IdentifierAllocator) {
    if (sentence.some((t) => t.id.kind === 'omitted')) failUnsupported('Token ids cannot be omitted');
    // multiword ranges and empty nodes carry no token of their own
    this.words = sentence.filter((t) => t.id.kind === 'word');
    const identifiers = new Map<number, Identifier>();
    for (const word of this.words) {
      if (word.id.kind !== 'word') continue;
      if (identifiers.has(word.id.index)) failParse(`Duplicate token id ${word.id.index}.`, word.line, 1);
      identifiers.set(word.id.index, allocator.next());
    }
    this.identifiers = identifiers;
  }

  get tokenIdentifiers(): Identifier[] {
    return [...this.identifiers.values()];
  }

  private identifierOf(word: ConlluToken): Identifier {
    const identifier = word.id.kind === 'word' ? this.identifiers.get(word.id.index) : undefined;
    if (!identifier) return failParse('Token without a numeric id.', word.line, 1);
    return identifier;
  }

  resolveHead(reference: string, word: ConlluToken): Identifier | null {
    if (reference === NO_VALUE || reference === '0') return null;
    if (reference === UNSPECIFIED_VALUE) failUnsupported('Having an underspecified dependency head is not supported');
    const head = /^\d+$/.test(reference) ? this.identifiers.get(Number(reference)) : undefined;
    if (!head) return failUnsupported(`Dependency head "${reference}" of line ${word.line} is not part of the sentence`);
    return head;
  }

  build(): this {
    for (const word of this.words) {
      const id = this.identifierOf(word);
      this.annotations(word, id);
      this.features(word, id);
      this.miscellaneous(word, id);
      this.head(word, id);
    }
    this.anchors();
    this.ordering();
    this.subsequent();
    return this;
  }

  annotations(word: ConlluToken, id: Identifier): void {
    for (const [column, name] of ANNOTATION_COLUMNS) {
      const value = word.columns[column];
      if (value === NO_VALUE || value === UNSPECIFIED_VALUE) continue;
      this.predicates.push(matches(id, name, value));
    }
  }

  features(word: ConlluToken, id: Identifier): void {
    for (const [key, value] of word.feats) {
      this.predicates.push(matches(id, FEATURES_ATTRIBUTE, `${key}=${value}`, 'contains'));
    }
  }

  miscellaneous(word: ConlluToken, id: Identifier): void {
    for (const [key, value] of word.misc) {
      if (!RESERVED_ANNOTATIONS.has(key)) this.predicates.push(matches(id, key, value));
    }
  }

  head(word: ConlluToken, id: Identifier): void {
    const head = this.resolveHead(word.columns.head, word);
    if (head) this.dependencies.push(dependency(head, id));
  }

  /** `anchored=Yes` on the first or last word pins it to the sentence boundary. */
  anchors(): void {
    const first = this.words[0];
    const last = this.words[this.words.length - 1];
    if (first && hasAnnotation(first, 'anchored')) {
      this.constraints.push(anchor(this.identifierOf(first), { first: true }));
    }
    if (last && hasAnnotation(last, 'anchored')) {
      this.constraints.push(anchor(this.identifierOf(last), { last: true }));
    }
  }

  /** Words marked `ordered=Yes` keep their relative order. */
  ordering(): void {
    const ordered = this.words.filter((w) => hasAnnotation(w, 'ordered')).map((w) => this.identifierOf(w));
    for (let i = 1; i < ordered.length; i++) {
      const a = ordered[i - 1];
      const b = ordered[i];
      if (a && b) this.constraints.push(order(a, b));
    }
  }

  /** A word marked `subsequent=Yes` directly follows the previous word. */
  subsequent(): void {
    for (let i = 1; i < this.words.length; i++) {
      const previous = this.words[i - 1];
      const current = this.words[i];
      if (!previous || !current || !hasAnnotation(current, 'subsequent')) continue;
      const a = this.identifierOf(previous);
      const b = this.identifierOf(current);
      this.constraints.push(distance(a, b).eq(0), order(a, b));
    }
  }
}

export function buildSentence(sentence: Sentence, allocator: IdentifierAllocator): Recipe {
  const builder = new ConlluQueryBuilder(sentence, allocator).build();
  return recipeOfQuery(
    createQuery(allocator, {
      tokens: builder.tokenIdentifiers.map((id) => token(id)),
      dependencies: builder.dependencies,
      constraints: builder.constraints,
      predicates: builder.predicates,
    }),
  );
}
