// src/compiler/arrangements.ts
// Enumerates the linearizations of a token set.
// The count grows factorially with the number of unordered tokens; hosts cap
// the token count before compiling.

import type { Constraint, Identifier } from '../ir/types.ts';

/**
 * For every identifier, the identifiers that have to be placed before it.
 * Anchors imply order: the first token precedes all others, the last follows them.
 */
function predecessorMap(
  identifiers: readonly Identifier[],
  constraints: readonly Constraint[],
): Map<Identifier, Set<Identifier>> {
  const known = new Set(identifiers);
  const before = new Map<Identifier, Set<Identifier>>(identifiers.map((id) => [id, new Set<Identifier>()]));
  const require = (fst: Identifier, snd: Identifier): void => {
    if (fst === snd || !known.has(fst)) return;
    before.get(snd)?.add(fst);
  };

  for (const c of constraints) {
    if (c.type === 'Order') require(c.fst, c.snd);
    else if (c.type === 'Anchor' && known.has(c.identifier)) {
      for (const other of identifiers) {
        if (c.position === 'first') require(c.identifier, other);
        else require(other, c.identifier);
      }
    }
  }
  return before;
}

function* arrange(
  placed: Identifier[],
  remaining: readonly Identifier[],
  before: ReadonlyMap<Identifier, ReadonlySet<Identifier>>,
): Generator<Identifier[]> {
  if (remaining.length === 0) {
    yield [...placed];
    return;
  }
  for (const candidate of remaining) {
    const predecessors = before.get(candidate);
    if (predecessors && [...predecessors].some((p) => !placed.includes(p))) continue;
    placed.push(candidate);
    yield* arrange(placed, remaining.filter((id) => id !== candidate), before);
    placed.pop();
  }
}

/**
 * All orderings of `identifiers` that respect the order constraints.
 * Constraints on identifiers outside the set are ignored; contradictory
 * constraints yield no arrangement. The result can be iterated repeatedly.
 */
export function arrangements(
  identifiers: readonly Identifier[],
  constraints: readonly Constraint[],
): Iterable<Identifier[]> {
  const ids = [...new Set(identifiers)];
  const before = predecessorMap(ids, constraints);
  return {
    [Symbol.iterator]: () => arrange([], ids, before),
  };
}

/** Number of arrangements, computed by enumeration. */
export function countArrangements(identifiers: readonly Identifier[], constraints: readonly Constraint[]): number {
  let count = 0;
  for (const _ of arrangements(identifiers, constraints)) count++;
  return count;
}
