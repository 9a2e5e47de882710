// src/ir/types.ts
// Query graph IR. All nodes are tagged by `type` and treated as immutable values.

import type { Identifier } from './identifier.ts';

export type { Identifier } from './identifier.ts';

// ----- Operands -----

export type Operand = Literal | Attribute;

/** A fixed value. `value` is emitted verbatim, so it is already escaped where needed. */
export interface Literal {
  readonly type: 'Literal';
  readonly value: string;
}

/** A field of a token. A null reference means the token the predicate is attached to. */
export interface Attribute {
  readonly type: 'Attribute';
  readonly reference: Identifier | null;
  readonly attribute: string;
}

// ----- Predicates -----

export type Predicate = Comparison | Exists | Negation | Conjunction | Disjunction;

export type ComparisonOperator = '=' | '!=' | 'contains' | 'not contains';

export interface Comparison {
  readonly type: 'Comparison';
  readonly lhs: Operand;
  readonly operator: ComparisonOperator;
  readonly rhs: Operand;
}

export interface Exists {
  readonly type: 'Exists';
  readonly attribute: Attribute;
}

export interface Negation {
  readonly type: 'Negation';
  readonly predicate: Predicate;
}

export type NonEmpty<T> = readonly [T, ...T[]];

export interface Conjunction {
  readonly type: 'Conjunction';
  readonly predicates: NonEmpty<Predicate>;
}

export interface Disjunction {
  readonly type: 'Disjunction';
  readonly predicates: NonEmpty<Predicate>;
}

export type Junction = Conjunction | Disjunction;

// ----- Graph -----

export interface Token {
  readonly identifier: Identifier;
  /** Local predicate using unqualified attributes. */
  readonly attributes: Predicate | null;
}

/** `dst` is a syntactic dependent of `src`. */
export interface Dependency {
  readonly src: Identifier;
  readonly dst: Identifier;
}

export type Constraint = Order | Distance | Anchor;

export interface Order {
  readonly type: 'Order';
  readonly fst: Identifier;
  readonly snd: Identifier;
}

/** `#` means "not equal". */
export type DistanceComparison = '<' | '>' | '=' | '#';

/** Number of tokens strictly between `a` and `b`. */
export interface Distance {
  readonly type: 'Distance';
  readonly a: Identifier;
  readonly b: Identifier;
  readonly comparison: DistanceComparison;
  readonly distance: number;
}

export type AnchorPosition = 'first' | 'last';

export interface Anchor {
  readonly type: 'Anchor';
  readonly identifier: Identifier;
  readonly position: AnchorPosition;
}

/** The graph content shared by queries and query parts. */
export interface QueryContents {
  readonly tokens: readonly Token[];
  readonly dependencies: readonly Dependency[];
  readonly constraints: readonly Constraint[];
  /** Global predicates; every attribute is qualified. */
  readonly predicates: readonly Predicate[];
}

export type QueryPartKind = 'additional' | 'negative';

/**
 * Extra matches combined with the parent query: `additional` parts must match too,
 * `negative` parts must not.
 */
export interface QueryPart extends QueryContents {
  readonly kind: QueryPartKind;
}

export interface Query extends QueryContents {
  readonly type: 'Query';
  readonly identifier: Identifier;
  readonly parts: readonly QueryPart[];
}

// ----- Recipe -----

export type SetOperator = 'conjunction' | 'disjunction' | 'subtraction';

export const setOperatorSymbols: Record<SetOperator, string> = {
  conjunction: '&',
  disjunction: '|',
  subtraction: '-',
};

/** Set operation over the results of two earlier steps. */
export interface Operation {
  readonly type: 'Operation';
  readonly identifier: Identifier;
  readonly lhs: Identifier;
  readonly operator: SetOperator;
  readonly rhs: Identifier;
}

export type Step = Query | Operation;

export interface Recipe {
  readonly queries: NonEmpty<Query>;
  readonly operations: readonly Operation[];
  readonly goal: Identifier;
}

// ----- Type guards -----

export function isJunction(node: Predicate): node is Junction {
  return node.type === 'Conjunction' || node.type === 'Disjunction';
}
