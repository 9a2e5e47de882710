// src/compiler/types.ts
// Linear query tree produced by lowering one arrangement.

import type { AnchorPosition, Dependency, Identifier, Predicate } from '../ir/types.ts';

export type LinearQuery = LinearToken | LinearSequence | LinearOperator;

export interface LinearToken {
  readonly type: 'Token';
  readonly identifier: Identifier;
  /** Lowered onto this token: unqualified attributes refer to it. */
  readonly predicates: readonly Predicate[];
  /** Dependencies whose endpoints are this token and an earlier one. */
  readonly dependencies: readonly Dependency[];
  readonly anchor: AnchorPosition | null;
}

/** Number of tokens allowed between two tokens; `max` null means unbounded. */
export interface Spacing {
  readonly min: number;
  readonly max: number | null;
}

export const ARBITRARY_SPACING: Spacing = Object.freeze({ min: 0, max: null });

export interface LinearSequence {
  readonly type: 'Sequence';
  readonly lhs: LinearQuery;
  readonly rhs: LinearQuery;
  readonly spacing: Spacing;
}

export interface LinearOperator {
  readonly type: 'Operator';
  readonly operator: '|' | '&';
  readonly queries: readonly LinearQuery[];
}
