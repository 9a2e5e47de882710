// src/frontends/deptreepy/builder.ts
// s-expression -> recipe for deptreepy patterns.
//
// A pattern without trees describes one token. `(TREE_ root dep ...)` connects
// the root token with the root of every dependent. `AND`/`OR` over trees
// combine whole queries with set operations.

import type { CstNode } from 'chevrotain';
import type { Identifier, IdentifierAllocator } from '../../ir/identifier.ts';
import type { Dependency, Predicate, Recipe, SetOperator, Token } from '../../ir/types.ts';
import { attribute, comparison, conjunctionOf, disjunctionOf, negation, quoted } from '../../ir/predicate.ts';
import { createQuery, dependency, token } from '../../ir/query.ts';
import { RecipeBuilder } from '../../ir/recipe.ts';
import { isToken, orderedChildren, requireNode, unquote } from '../cst.ts';
import { failUnsupported } from '../frontendErrors.ts';

export type Sexp = string | readonly Sexp[];

export function toSexp(node: CstNode): Sexp[] {
  return orderedChildren(node, ['Atom', 'Quoted', 'expression']).map((child) => {
    if (!isToken(child)) return toSexp(child);
    return child.tokenType.name === 'Quoted' ? unquote(child.image) : child.image;
  });
}

/** Drops redundant parentheses around a single element. */
function unwrap(lisp: Sexp): Sexp {
  let current = lisp;
  while (typeof current !== 'string' && current.length === 1 && current[0] !== undefined) {
    current = current[0];
  }
  return current;
}

function head(lisp: Sexp): string | null {
  if (typeof lisp === 'string') return null;
  const [first] = lisp;
  return typeof first === 'string' ? first : null;
}

function containsTree(lisp: Sexp): boolean {
  if (typeof lisp === 'string') return false;
  const first = head(lisp);
  return first === 'TREE' || first === 'TREE_' || lisp.some(containsTree);
}

function describe(lisp: Sexp): string {
  return typeof lisp === 'string' ? lisp : `(${lisp.map(describe).join(' ')})`;
}

function fieldComparisons(field: Sexp, values: readonly Sexp[]): Predicate[] {
  if (typeof field !== 'string') failUnsupported('When matching a field, the field must be a string');
  // `lemma_` matches a substring of the lemma
  const contains = field.endsWith('_');
  const name = contains ? field.slice(0, -1) : field;
  return values.map((value) => {
    if (typeof value !== 'string') failUnsupported('When matching a field, the field value must be a string');
    return comparison(attribute(null, name), contains ? 'contains' : '=', quoted(value));
  });
}

export function convertPredicate(lisp: Sexp): Predicate {
  const expr = unwrap(lisp);
  if (typeof expr === 'string') return failUnsupported(describe(expr));

  const [first, ...args] = expr;
  if (first === undefined) return failUnsupported('empty pattern');

  switch (first) {
    case 'AND':
    case 'OR': {
      if (args.length === 0) return failUnsupported(`${first} without arguments`);
      const members = args.map(convertPredicate);
      return first === 'AND' ? conjunctionOf(members) : disjunctionOf(members);
    }
    case 'NOT':
      return negation(convertPredicate(args));
  }

  const [second, ...rest] = args;
  if (second === 'IN' && rest.length > 0) return disjunctionOf(fieldComparisons(first, rest));
  if (second !== undefined && rest.length === 0) {
    const [single] = fieldComparisons(first, [second]);
    if (single) return single;
  }
  return failUnsupported(describe(expr));
}

/** Tokens and dependencies of one tree pattern. */
class TreeCollector {
  readonly tokens: Token[] = [];
  readonly dependencies: Dependency[] = [];

  constructor(private readonly allocator: IdentifierAllocator) {}

  /** Returns the root token of `lisp`. */
  convert(lisp: Sexp): Identifier {
    const expr = unwrap(lisp);
    const first = head(expr);
    if (first === 'TREE') failUnsupported('Only TREE_ is supported for matching subtrees');

    if (first === 'TREE_' && typeof expr !== 'string') {
      const [, root, ...dependents] = expr;
      if (root === undefined) return failUnsupported('TREE_ without a root');
      const rootId = this.convert(root);
      for (const dependent of dependents) this.dependencies.push(dependency(rootId, this.convert(dependent)));
      return rootId;
    }

    const identifier = this.allocator.next();
    this.tokens.push(token(identifier, convertPredicate(expr)));
    return identifier;
  }
}

const SET_OPERATORS: ReadonlyMap<string, SetOperator> = new Map<string, SetOperator>([
  ['AND', 'conjunction'],
  ['OR', 'disjunction'],
]);

export class DeptreepyRecipeBuilder {
  private readonly recipe: RecipeBuilder;

  constructor(private readonly allocator: IdentifierAllocator) {
    this.recipe = new RecipeBuilder(allocator);
  }

  /** Adds the steps computing `lisp` and returns the identifier of the last one. */
  step(lisp: Sexp): Identifier {
    const expr = unwrap(lisp);
    const first = head(expr);

    if (first === 'NOT' && containsTree(expr)) failUnsupported('negation of a dependency tree');

    const operator = first === null ? undefined : SET_OPERATORS.get(first);
    if (operator && typeof expr !== 'string' && containsTree(expr)) {
      const [, ...args] = expr;
      const [initial, ...others] = args.map((arg) => this.step(arg));
      if (initial === undefined) return failUnsupported(`${first} without arguments`);
      return others.reduce((lhs, rhs) => this.recipe.addOperation(lhs, operator, rhs), initial);
    }

    const collector = new TreeCollector(this.allocator);
    collector.convert(expr);
    return this.recipe.addQuery(createQuery(this.allocator, { tokens: collector.tokens, dependencies: collector.dependencies }));
  }

  build(lisp: Sexp): Recipe {
    return this.recipe.setGoal(this.step(lisp)).build();
  }
}

export function buildPattern(cst: CstNode, allocator: IdentifierAllocator): Recipe {
  return new DeptreepyRecipeBuilder(allocator).build(toSexp(requireNode(cst, 'expression')));
}
