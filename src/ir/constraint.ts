// src/ir/constraint.ts

import type { Identifier } from './identifier.ts';
import type { Anchor, Constraint, Distance, DistanceComparison, Order } from './types.ts';
import { failInvariant } from './invariantErrors.ts';

/** `a` comes before `b` in every arrangement. */
export function order(a: Identifier, b: Identifier): Order {
  return { type: 'Order', fst: a, snd: b };
}

function makeDistance(a: Identifier, b: Identifier, comparison: DistanceComparison, value: number): Distance {
  if (!Number.isInteger(value)) failInvariant(`Distance must be an integer (got ${value}).`, 'integer-distance');
  return { type: 'Distance', a, b, comparison, distance: value };
}

/**
 * Distance constraints between `a` and `b`, counted as the number of tokens in between.
 *
 * ```ts
 * distance(a, b).lt(3)  // fewer than 3 tokens between a and b
 * distance(a, b).eq(0)  // adjacent
 * ```
 * `le` and `ge` are the strict forms shifted by one.
 */
export function distance(a: Identifier, b: Identifier) {
  return {
    lt: (n: number): Distance => makeDistance(a, b, '<', n),
    gt: (n: number): Distance => makeDistance(a, b, '>', n),
    eq: (n: number): Distance => makeDistance(a, b, '=', n),
    ne: (n: number): Distance => makeDistance(a, b, '#', n),
    le: (n: number): Distance => makeDistance(a, b, '<', n + 1),
    ge: (n: number): Distance => makeDistance(a, b, '>', n - 1),
  };
}

export interface AnchorOptions {
  first?: boolean;
  last?: boolean;
}

/**
 * Pins a token to the first or last position of the matched region.
 * Exactly one of `first` and `last` must be set.
 */
export function anchor(identifier: Identifier, options: AnchorOptions): Anchor {
  const first = options.first === true;
  const last = options.last === true;
  if (first === last) {
    failInvariant('Anchor must be fixed as either first or last token.', 'anchor-position');
  }
  return { type: 'Anchor', identifier, position: first ? 'first' : 'last' };
}

/** Identifiers a constraint refers to. */
export function constraintIdentifiers(constraint: Constraint): Identifier[] {
  switch (constraint.type) {
    case 'Order':
      return [constraint.fst, constraint.snd];
    case 'Distance':
      return [constraint.a, constraint.b];
    case 'Anchor':
      return [constraint.identifier];
  }
}
