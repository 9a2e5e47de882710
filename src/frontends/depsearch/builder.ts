// src/frontends/depsearch/builder.ts
// CST -> query graph for dep_search queries.
// Every token specification becomes one token. Relations connect the first
// token of the left expression with the first token of the right operand.

import type { CstNode, IToken } from 'chevrotain';
import type { Identifier, IdentifierAllocator } from '../../ir/identifier.ts';
import type { Constraint, Dependency, Predicate, Recipe, Token } from '../../ir/types.ts';
import { attribute, comparison, conjunctionOf, disjunctionOf, negation, quoted } from '../../ir/predicate.ts';
import { distance, order } from '../../ir/constraint.ts';
import { createQuery, dependency, token } from '../../ir/query.ts';
import { recipeOfQuery } from '../../ir/recipe.ts';
import { childNodes, childTokens, optionalNode, optionalToken, requireNode, requireToken, unquote } from '../cst.ts';
import { failParse, failUnsupported } from '../frontendErrors.ts';

// Universal POS tags; other bare words match the word form.
const UPOS_TAGS: ReadonlySet<string> = new Set([
  'ADJ', 'ADP', 'ADV', 'AUX', 'CCONJ', 'DET', 'INTJ', 'NOUN', 'NUM',
  'PART', 'PRON', 'PROPN', 'PUNCT', 'SCONJ', 'SYM', 'VERB', 'X',
]);

type Direction = 'L' | 'R' | null;

const LINEAR = /^([<>])lin_(-?\d+):(-?\d+)(?:@([LR]))?$/;
const DEPENDENCY = /^([<>])(!?)([A-Za-z_][A-Za-z0-9_:]*)?(?:@([LR]))?$/;

export class DepsearchQueryBuilder {
  readonly tokens: Token[] = [];
  readonly dependencies: Dependency[] = [];
  readonly constraints: Constraint[] = [];
  readonly predicates: Predicate[] = [];

  constructor(private readonly allocator: IdentifierAllocator) {}

  query(node: CstNode): this {
    if (childTokens(node, 'Plus').length > 0) failUnsupported('disjunction of queries');
    if (childTokens(node, 'Arrow').length > 0) failUnsupported('universally quantified queries');
    this.expression(requireNode(node, 'expression'));
    return this;
  }

  /** Returns the first token of the expression. */
  expression(node: CstNode): Identifier {
    const head = this.operand(requireNode(node, 'head'));
    const relations = childNodes(node, 'relation');
    const targets = childNodes(node, 'target');
    relations.forEach((relation, index) => {
      const target = targets[index];
      if (target) this.relation(relation, head, this.operand(target));
    });
    return head;
  }

  operand(node: CstNode): Identifier {
    const nested = optionalNode(node, 'expression');
    if (nested) return this.expression(nested);

    const identifier = this.allocator.next();
    this.tokens.push(token(identifier, this.tokenExpr(requireNode(node, 'tokenExpr'))));
    return identifier;
  }

  relation(node: CstNode, head: Identifier, target: Identifier): void {
    if (optionalToken(node, 'Bang')) {
      if (optionalNode(node, 'alternatives')) failUnsupported('complex dependency expression');
      failUnsupported('absence of dependency relation');
    }
    const alternatives = childNodes(requireNode(node, 'alternatives'), 'simpleRelation');
    const [single, ...others] = alternatives;
    if (!single || others.length > 0) failUnsupported('disjunction of dependency relations');
    this.simpleRelation(single, head, target);
  }

  simpleRelation(node: CstNode, head: Identifier, target: Identifier): void {
    const dot = optionalToken(node, 'Dot');
    if (dot) {
      this.constraints.push(order(head, target), distance(head, target).eq(0));
      return;
    }
    const linear = optionalToken(node, 'LinearRelation');
    if (linear) return this.linearRelation(linear, head, target);
    return this.dependencyRelation(requireToken(node, 'DependencyRelation'), head, target);
  }

  private direction(direction: Direction, head: Identifier, target: Identifier): void {
    if (direction === 'R') this.constraints.push(order(head, target));
    else if (direction === 'L') this.constraints.push(order(target, head));
  }

  /** `<lin_S:E` - the tokens are S to E positions apart. */
  private linearRelation(relation: IToken, head: Identifier, target: Identifier): void {
    const match = LINEAR.exec(relation.image);
    const start = Number(match?.[2]);
    const end = Number(match?.[3]);
    if (!match || start < 0 || end < 1 || start > end) {
      failParse(`Invalid linear distance '${relation.image}'.`, relation.startLine, relation.startColumn);
    }
    // distances count the tokens in between
    this.constraints.push(distance(head, target).ge(Math.max(start - 1, 0)), distance(head, target).le(end - 1));
    this.direction(toDirection(match[4]), head, target);
  }

  /** `>label` - the target depends on head; `<label` - head depends on the target. */
  private dependencyRelation(relation: IToken, head: Identifier, target: Identifier): void {
    const match = DEPENDENCY.exec(relation.image);
    if (!match) return failParse(`Invalid relation '${relation.image}'.`, relation.startLine, relation.startColumn);
    const [, arrow, negated, label, direction] = match;

    const dep = arrow === '>' ? dependency(head, target) : dependency(target, head);
    this.dependencies.push(dep);
    if (label) {
      this.predicates.push(comparison(attribute(dep.dst, 'deprel'), negated ? '!=' : '=', quoted(label)));
    }
    this.direction(toDirection(direction), head, target);
  }

  /** Local predicate of a token specification; null matches every token. */
  tokenExpr(node: CstNode): Predicate | null {
    const alternatives = childNodes(node, 'tokenAnd').map((n) => this.tokenAnd(n));
    if (alternatives.some((p) => p === null)) return null;
    return disjunctionOf(alternatives.filter((p): p is Predicate => p !== null));
  }

  tokenAnd(node: CstNode): Predicate | null {
    const members = childNodes(node, 'tokenNot')
      .map((n) => this.tokenNot(n))
      .filter((p): p is Predicate => p !== null);
    return members.length > 0 ? conjunctionOf(members) : null;
  }

  tokenNot(node: CstNode): Predicate | null {
    const negated = optionalNode(node, 'negated');
    if (negated) {
      const inner = this.tokenNot(negated);
      if (inner === null) failUnsupported('negation of the wildcard token');
      return negation(inner);
    }
    return this.tokenAtom(requireNode(node, 'tokenAtom'));
  }

  tokenAtom(node: CstNode): Predicate | null {
    const nested = optionalNode(node, 'tokenExpr');
    if (nested) return this.tokenExpr(nested);

    const word = optionalToken(node, 'Word');
    if (word) {
      if (word.image === '_') return null;
      const field = UPOS_TAGS.has(word.image) ? 'pos' : 'word';
      return comparison(attribute(null, field), '=', quoted(word.image));
    }

    const text = optionalToken(node, 'Quoted');
    if (text) return comparison(attribute(null, 'word'), '=', quoted(unquote(text.image)));

    const feature = requireToken(node, 'Feature').image;
    const separator = feature.indexOf('=');
    const name = feature.slice(0, separator);
    const value = feature.slice(separator + 1);
    if (name === 'L') return comparison(attribute(null, 'lemma'), '=', quoted(value));
    return comparison(attribute(null, 'ufeats'), 'contains', quoted(feature));
  }
}

function toDirection(value: string | undefined): Direction {
  return value === 'L' || value === 'R' ? value : null;
}

export function buildQuery(cst: CstNode, allocator: IdentifierAllocator): Recipe {
  const builder = new DepsearchQueryBuilder(allocator).query(cst);
  return recipeOfQuery(
    createQuery(allocator, {
      tokens: builder.tokens,
      dependencies: builder.dependencies,
      constraints: builder.constraints,
      predicates: builder.predicates,
    }),
  );
}
