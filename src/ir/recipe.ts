// src/ir/recipe.ts
// Recipes combine the results of several queries by set operations.
// Steps are ordered: all queries first, then operations, each operation
// only using steps defined before it.

import type { Identifier, IdentifierAllocator } from './identifier.ts';
import type { Operation, Query, Recipe, SetOperator, Step } from './types.ts';
import { createQuery, contentIdentifiers, token, withoutParts } from './query.ts';
import { failInvariant } from './invariantErrors.ts';

export interface RecipeInit {
  queries: readonly Query[];
  operations?: readonly Operation[];
  goal: Identifier;
}

export function createRecipe(init: RecipeInit): Recipe {
  const [first, ...rest] = init.queries;
  if (first === undefined) failInvariant('Recipe must contain at least one query.', 'non-empty-recipe');
  const operations = [...(init.operations ?? [])];

  const defined = new Set<Identifier>();
  for (const step of [...init.queries, ...operations]) {
    if (defined.has(step.identifier)) {
      failInvariant('Multiple steps in recipe share the same identifier.', 'unique-steps');
    }
    if (step.type === 'Operation' && !(defined.has(step.lhs) && defined.has(step.rhs))) {
      failInvariant('Step in recipe uses undefined query identifier.', 'defined-steps');
    }
    defined.add(step.identifier);
  }
  if (!defined.has(init.goal)) failInvariant('Goal of recipe is not a step of the recipe.', 'defined-goal');

  const recipe: Recipe = { queries: [first, ...rest], operations, goal: init.goal };
  return Object.freeze(recipe);
}

export function recipeOfQuery(query: Query): Recipe {
  return createRecipe({ queries: [query], goal: query.identifier });
}

/** The only query of the recipe, or null when the recipe needs several steps. */
export function simpleRepresentation(recipe: Recipe): Query | null {
  return recipe.queries.length === 1 && recipe.operations.length === 0 ? recipe.queries[0] : null;
}

/** Every step of the recipe in evaluation order. */
export function recipeSteps(recipe: Recipe): Step[] {
  return [...recipe.queries, ...recipe.operations];
}

export function operation(
  allocator: IdentifierAllocator,
  lhs: Identifier,
  operator: SetOperator,
  rhs: Identifier,
  identifier: Identifier = allocator.next(),
): Operation {
  return { type: 'Operation', identifier, lhs, operator, rhs };
}

/**
 * Collects queries and operations step by step.
 * Without an explicit goal, the goal is the only query or else the last operation.
 */
export class RecipeBuilder {
  private readonly queries: Query[] = [];
  private readonly operations: Operation[] = [];
  private explicitGoal: Identifier | null = null;

  constructor(private readonly allocator: IdentifierAllocator) {}

  addQuery(query: Query): Identifier {
    this.queries.push(query);
    return query.identifier;
  }

  addOperation(lhs: Identifier, operator: SetOperator, rhs: Identifier): Identifier {
    const op = operation(this.allocator, lhs, operator, rhs);
    this.operations.push(op);
    return op.identifier;
  }

  setGoal(identifier: Identifier): this {
    this.explicitGoal = identifier;
    return this;
  }

  build(): Recipe {
    return createRecipe({ queries: this.queries, operations: this.operations, goal: this.goal() });
  }

  private goal(): Identifier {
    if (this.explicitGoal) return this.explicitGoal;
    const onlyQuery = this.queries.length === 1 ? this.queries[0] : undefined;
    if (onlyQuery) return onlyQuery.identifier;
    const lastOperation = this.operations[this.operations.length - 1];
    if (lastOperation) return lastOperation.identifier;
    return failInvariant('Recipe has no goal.', 'defined-goal');
  }
}

// ----- Query parts -----

interface ExpandedQuery {
  queries: Query[];
  operations: Operation[];
}

/**
 * Splits a query with parts into one query per part, combined with the main
 * query in declaration order. The last operation reuses the identifier of the
 * original query, so steps referring to it see the combined result.
 */
export function expandQueryParts(query: Query, allocator: IdentifierAllocator): ExpandedQuery {
  if (query.parts.length === 0) return { queries: [query], operations: [] };

  const main: Query = { ...withoutParts(query), identifier: allocator.next() };
  const queries: Query[] = [Object.freeze(main)];
  const operations: Operation[] = [];
  let current = main.identifier;

  query.parts.forEach((part, index) => {
    const own = new Set(part.tokens.map((t) => t.identifier));
    const inherited = [...contentIdentifiers(part)].filter((id) => !own.has(id)).map((id) => token(id));
    const tokens = [...part.tokens, ...inherited];
    const partQuery = createQuery(allocator, {
      // a part without tokens of its own still needs one token to match
      tokens: tokens.length > 0 ? tokens : [token(allocator.next())],
      dependencies: part.dependencies,
      constraints: part.constraints,
      predicates: part.predicates,
    });
    queries.push(partQuery);

    const isLast = index === query.parts.length - 1;
    const operator: SetOperator = part.kind === 'additional' ? 'conjunction' : 'subtraction';
    const op = isLast
      ? operation(allocator, current, operator, partQuery.identifier, query.identifier)
      : operation(allocator, current, operator, partQuery.identifier);
    operations.push(op);
    current = op.identifier;
  });

  return { queries, operations };
}

/** Rewrites every query with parts into plain queries and operations. */
export function expandRecipe(recipe: Recipe, allocator: IdentifierAllocator): Recipe {
  if (recipe.queries.every((q) => q.parts.length === 0)) return recipe;
  const queries: Query[] = [];
  const operations: Operation[] = [];
  for (const query of recipe.queries) {
    const expanded = expandQueryParts(query, allocator);
    queries.push(...expanded.queries);
    operations.push(...expanded.operations);
  }
  return createRecipe({ queries, operations: [...operations, ...recipe.operations], goal: recipe.goal });
}
