// src/compiler/lowering.ts
// Lowers a query graph into linear token sequences, one per arrangement.
//
// Walking an arrangement left to right, every dependency and predicate is
// attached to the first token at which all identifiers it references have
// been placed (the current token included). Attached items are never
// revisited, so each item appears exactly once per arrangement.
// Arrangements that put more tokens between two tokens than a distance
// constraint allows are skipped.

import type { AnchorPosition, Constraint, Dependency, Distance, Identifier, Predicate, QueryContents } from '../ir/types.ts';
import { dedupePredicates, lowerOnto, normalize, raiseFrom, referencedIdentifiers } from '../ir/predicate.ts';
import { arrangements } from './arrangements.ts';
import type { LinearOperator, LinearQuery, LinearToken, Spacing } from './types.ts';
import { ARBITRARY_SPACING } from './types.ts';
import { failUnsupported } from './compilerErrors.ts';

/** What lowering needs besides the arrangement itself. */
export interface LoweringInput {
  readonly dependencies: readonly Dependency[];
  readonly predicates: readonly Predicate[];
  readonly constraints: readonly Constraint[];
}

/**
 * Token-local predicates raised onto their tokens followed by the global
 * predicates, normalized and without structural duplicates.
 */
export function globalPredicates(contents: QueryContents): Predicate[] {
  const raised = contents.tokens.flatMap((t) => (t.attributes ? [raiseFrom(t.attributes, t.identifier)] : []));
  return dedupePredicates([...raised, ...contents.predicates].map(normalize));
}

/**
 * Allowed number of tokens between two adjacent tokens of an arrangement,
 * intersecting every distance constraint between them in either direction.
 */
export function spacingBetween(constraints: readonly Constraint[], a: Identifier, b: Identifier): Spacing {
  let min = ARBITRARY_SPACING.min;
  let max = ARBITRARY_SPACING.max;
  let constrained = false;

  for (const c of constraints) {
    if (c.type !== 'Distance') continue;
    if (!((c.a === a && c.b === b) || (c.a === b && c.b === a))) continue;
    constrained = true;
    switch (c.comparison) {
      case '=':
        min = Math.max(min, c.distance);
        max = max === null ? c.distance : Math.min(max, c.distance);
        break;
      case '<':
        max = max === null ? c.distance - 1 : Math.min(max, c.distance - 1);
        break;
      case '>':
        min = Math.max(min, c.distance + 1);
        break;
      case '#':
        failUnsupported('distance inequality between tokens');
    }
  }

  if (!constrained) return ARBITRARY_SPACING;
  if (max !== null && max < min) failUnsupported('contradictory distance constraints');
  return { min, max };
}

function anchorsOf(constraints: readonly Constraint[]): Map<Identifier, AnchorPosition> {
  const anchors = new Map<Identifier, AnchorPosition>();
  for (const c of constraints) if (c.type === 'Anchor') anchors.set(c.identifier, c.position);
  return anchors;
}

function isSubset(ids: Iterable<Identifier>, of: ReadonlySet<Identifier>): boolean {
  for (const id of ids) if (!of.has(id)) return false;
  return true;
}

/** Builds the token sequence of one arrangement. */
export function lowerArrangement(arrangement: readonly Identifier[], input: LoweringInput): LinearQuery {
  const anchors = anchorsOf(input.constraints);
  const visited = new Set<Identifier>();
  let remainingDependencies = [...input.dependencies];
  let remainingPredicates = [...input.predicates];

  const tokens: LinearToken[] = arrangement.map((identifier) => {
    visited.add(identifier);

    const dependencies = remainingDependencies.filter((d) => visited.has(d.src) && visited.has(d.dst));
    remainingDependencies = remainingDependencies.filter((d) => !dependencies.includes(d));

    const committed = remainingPredicates.filter((p) => isSubset(referencedIdentifiers(p), visited));
    remainingPredicates = remainingPredicates.filter((p) => !committed.includes(p));

    return {
      type: 'Token',
      identifier,
      predicates: committed.map((p) => lowerOnto(p, identifier)),
      dependencies,
      anchor: anchors.get(identifier) ?? null,
    };
  });

  const [head, ...tail] = tokens;
  if (head === undefined) return failUnsupported('query without tokens');

  let result: LinearQuery = head;
  let previous = head;
  for (const next of tail) {
    result = { type: 'Sequence', lhs: result, rhs: next, spacing: spacingBetween(input.constraints, previous.identifier, next.identifier) };
    previous = next;
  }
  return result;
}

function loweringInput(contents: QueryContents): LoweringInput {
  return {
    dependencies: contents.dependencies,
    predicates: globalPredicates(contents),
    constraints: contents.constraints,
  };
}

/** Largest number of tokens a distance constraint allows between its endpoints. */
function upperBound(constraint: Distance): number | null {
  switch (constraint.comparison) {
    case '=':
      return constraint.distance;
    case '<':
      return constraint.distance - 1;
    default:
      return null;
  }
}

/**
 * Whether no distance constraint has more tokens of the arrangement between
 * its endpoints than it allows.
 */
export function respectsDistances(arrangement: readonly Identifier[], constraints: readonly Constraint[]): boolean {
  for (const c of constraints) {
    if (c.type !== 'Distance') continue;
    const bound = upperBound(c);
    if (bound === null) continue;
    const i = arrangement.indexOf(c.a);
    const j = arrangement.indexOf(c.b);
    if (i < 0 || j < 0) continue;
    if (Math.abs(i - j) - 1 > bound) return false;
  }
  return true;
}

function* admissibleArrangements(contents: QueryContents): Generator<Identifier[], void, undefined> {
  const identifiers = contents.tokens.map((t) => t.identifier);
  for (const arrangement of arrangements(identifiers, contents.constraints)) {
    if (respectsDistances(arrangement, contents.constraints)) yield arrangement;
  }
}

/** Lazily lowers every arrangement of the query. */
export function* lowerQuery(contents: QueryContents): Generator<LinearQuery, void, undefined> {
  const input = loweringInput(contents);
  for (const arrangement of admissibleArrangements(contents)) {
    yield lowerArrangement(arrangement, input);
  }
}

export interface CompileOptions {
  /** Called before each arrangement is lowered; throwing stops the compilation. */
  onArrangement?: ((index: number) => void) | undefined;
}

/** Disjunction over all arrangements of the query. */
export function compileQuery(contents: QueryContents, options: CompileOptions = {}): LinearOperator {
  const input = loweringInput(contents);
  const queries: LinearQuery[] = [];
  for (const arrangement of admissibleArrangements(contents)) {
    options.onArrangement?.(queries.length);
    queries.push(lowerArrangement(arrangement, input));
  }
  if (queries.length === 0) failUnsupported('order and distance constraints admit no arrangement of the tokens');
  return { type: 'Operator', operator: '|', queries };
}
