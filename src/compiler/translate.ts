// src/compiler/translate.ts
// Recipe -> named CQP steps.
// A recipe with a single query becomes one CQP query. Otherwise each query is
// compiled on its own, named A, B, ... and combined by set operations on the
// named results.

import type { IdentifierAllocator } from '../ir/identifier.ts';
import type { Identifier, Query, Recipe } from '../ir/types.ts';
import { setOperatorSymbols } from '../ir/types.ts';
import { expandRecipe } from '../ir/recipe.ts';
import { compileQuery } from './lowering.ts';
import type { CompileOptions } from './lowering.ts';
import { formatLinearQuery } from './formatter.ts';
import type { FormatOptions } from './formatter.ts';
import { STEP_ALPHABET, nameAt } from './names.ts';

export type TranslatedStep =
  | { kind: 'query'; name: string; query: string }
  | { kind: 'operation'; name: string; lhs: string; operator: string; rhs: string };

export interface TranslateOptions extends FormatOptions, CompileOptions {
  /** Called with every query of the expanded recipe before it is compiled. */
  beforeCompile?: ((query: Query) => void) | undefined;
}

export interface TranslatedPlan {
  steps: TranslatedStep[];
  /** Name of the step whose result is the answer. */
  goal: string;
}

export interface RenderedPlan {
  /** CQP query, or the set expression producing the goal. */
  query: string;
  /** Named steps to run before `query`, in order. Empty for a single query. */
  additionalSteps: string[];
}

export function translateRecipe(
  recipe: Recipe,
  allocator: IdentifierAllocator,
  options: TranslateOptions = {},
): TranslatedPlan {
  const expanded = expandRecipe(recipe, allocator);
  const names = new Map<Identifier, string>();
  const nameFor = (id: Identifier): string => {
    const existing = names.get(id);
    if (existing !== undefined) return existing;
    const name = nameAt(names.size, STEP_ALPHABET);
    names.set(id, name);
    return name;
  };

  const steps: TranslatedStep[] = [];
  for (const query of expanded.queries) {
    options.beforeCompile?.(query);
    const compiled = compileQuery(query, options);
    steps.push({ kind: 'query', name: nameFor(query.identifier), query: formatLinearQuery(compiled, options) });
  }
  for (const op of expanded.operations) {
    steps.push({
      kind: 'operation',
      name: nameFor(op.identifier),
      lhs: nameFor(op.lhs),
      operator: setOperatorSymbols[op.operator],
      rhs: nameFor(op.rhs),
    });
  }
  return { steps, goal: nameFor(expanded.goal) };
}

function stepBody(step: TranslatedStep): string {
  return step.kind === 'query' ? step.query : `${step.lhs} ${step.operator} ${step.rhs}`;
}

export function renderPlan(plan: TranslatedPlan): RenderedPlan {
  const goal = plan.steps.find((s) => s.name === plan.goal);
  if (plan.steps.length === 1 && goal) return { query: stepBody(goal), additionalSteps: [] };
  return {
    query: goal ? stepBody(goal) : plan.goal,
    additionalSteps: plan.steps.filter((s) => s !== goal).map((s) => `${s.name} = ${stepBody(s)};`),
  };
}

export function translate(recipe: Recipe, allocator: IdentifierAllocator, options: TranslateOptions = {}): RenderedPlan {
  return renderPlan(translateRecipe(recipe, allocator, options));
}
