// src/ir/query.ts
// Query construction and validation.
// Every token identifier is defined exactly once; front ends unify repeated
// references to the same variable before building the query.

import type { Identifier, IdentifierAllocator } from './identifier.ts';
import type { Constraint, Dependency, Predicate, Query, QueryContents, QueryPart, QueryPartKind, Token } from './types.ts';
import { constraintIdentifiers } from './constraint.ts';
import { referencedIdentifiers } from './predicate.ts';
import { failInvariant } from './invariantErrors.ts';

export interface QueryInit {
  tokens: readonly Token[];
  dependencies?: readonly Dependency[];
  constraints?: readonly Constraint[];
  predicates?: readonly Predicate[];
}

export function token(identifier: Identifier, attributes: Predicate | null = null): Token {
  return { identifier, attributes };
}

export function dependency(src: Identifier, dst: Identifier): Dependency {
  return { src, dst };
}

function contentsOf(init: QueryInit): QueryContents {
  return {
    tokens: [...init.tokens],
    dependencies: [...(init.dependencies ?? [])],
    constraints: [...(init.constraints ?? [])],
    predicates: [...(init.predicates ?? [])],
  };
}

/** Identifiers referenced anywhere in the contents, in order of first appearance. */
export function contentIdentifiers(contents: QueryContents): Set<Identifier> {
  const result = new Set<Identifier>();
  for (const c of contents.constraints) for (const id of constraintIdentifiers(c)) result.add(id);
  for (const d of contents.dependencies) {
    result.add(d.src);
    result.add(d.dst);
  }
  for (const p of contents.predicates) for (const id of referencedIdentifiers(p)) result.add(id);
  for (const t of contents.tokens) {
    if (t.attributes) for (const id of referencedIdentifiers(t.attributes)) result.add(id);
  }
  return result;
}

/**
 * Checks the graph invariants of a query or query part.
 * `inherited` holds identifiers bound by an enclosing scope; they may be
 * referenced but not redefined.
 */
export function validateContents(contents: QueryContents, inherited: ReadonlySet<Identifier> = new Set()): void {
  const defined = new Set<Identifier>();
  for (const t of contents.tokens) {
    if (defined.has(t.identifier)) failInvariant('Multiple tokens share the same identifier.', 'unique-tokens');
    if (inherited.has(t.identifier)) failInvariant('Query part redefines an inherited token.', 'unique-tokens');
    defined.add(t.identifier);
  }

  for (const id of contentIdentifiers(contents)) {
    if (!defined.has(id) && !inherited.has(id)) {
      failInvariant('Query uses identifiers not defined by tokens.', 'defined-references');
    }
  }

  for (const d of contents.dependencies) {
    if (d.src === d.dst) failInvariant('Token cannot depend on itself.', 'acyclic-dependency');
  }

  const first: Identifier[] = [];
  const last: Identifier[] = [];
  for (const c of contents.constraints) {
    if (c.type !== 'Anchor') continue;
    (c.position === 'first' ? first : last).push(c.identifier);
  }
  if (first.length > 1) failInvariant('Multiple anchors to beginning of span defined.', 'single-anchor');
  if (last.length > 1) failInvariant('Multiple anchors to end of span defined.', 'single-anchor');
  const tokenCount = contents.tokens.length + inherited.size;
  if (tokenCount > 1 && first.some((id) => last.includes(id))) {
    failInvariant('Token is anchor for both begin and end of span.', 'distinct-anchors');
  }
}

export function createQuery(allocator: IdentifierAllocator, init: QueryInit): Query {
  const contents = contentsOf(init);
  if (contents.tokens.length === 0) failInvariant('Query must contain at least one token.', 'non-empty-query');
  validateContents(contents);
  const query: Query = { type: 'Query', identifier: allocator.next(), ...contents, parts: [] };
  return Object.freeze(query);
}

/** Identifiers visible to the next part of `query`: its tokens and those of all parts so far. */
export function inheritedIdentifiers(query: Query): Set<Identifier> {
  const result = new Set<Identifier>(query.tokens.map((t) => t.identifier));
  for (const part of query.parts) for (const t of part.tokens) result.add(t.identifier);
  return result;
}

/**
 * Returns a copy of `query` with one more part. The part may reference every
 * identifier already bound by the query or one of its earlier parts.
 */
export function addQueryPart(query: Query, kind: QueryPartKind, init: Partial<QueryInit> = {}): Query {
  const contents = contentsOf({ tokens: [], ...init });
  validateContents(contents, inheritedIdentifiers(query));
  const part: QueryPart = { kind, ...contents };
  const extended: Query = { ...query, parts: [...query.parts, part] };
  return Object.freeze(extended);
}

/** Drops all parts, keeping the identifier. */
export function withoutParts(query: Query): Query {
  if (query.parts.length === 0) return query;
  const main: Query = { ...query, parts: [] };
  return Object.freeze(main);
}
