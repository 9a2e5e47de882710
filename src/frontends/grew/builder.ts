// src/frontends/grew/builder.ts
// CST -> query graph for grew requests.
// Method names follow the CST rule names. Node names are bound to tokens on
// first use; `with`/`without` items see every name bound before them.

import type { CstNode } from 'chevrotain';
import type { Identifier, IdentifierAllocator } from '../../ir/identifier.ts';
import type { Constraint, Dependency, Operand, Predicate, Query, QueryPartKind, Recipe, Token } from '../../ir/types.ts';
import {
  attribute,
  comparison,
  conjunctionOf,
  disjunctionOf,
  exists,
  literal,
  negation,
  quoted,
  raiseFrom,
} from '../../ir/predicate.ts';
import { distance, order } from '../../ir/constraint.ts';
import { addQueryPart, createQuery, dependency, token } from '../../ir/query.ts';
import { recipeOfQuery } from '../../ir/recipe.ts';
import { childNodes, optionalNode, optionalToken, requireNode, requireToken, unquote } from '../cst.ts';
import { failUnsupported } from '../frontendErrors.ts';

export type Environment = Map<string, Identifier>;

type CompareOperator = '=' | '!=';

/** Collects the clauses of one body (the pattern or one request item). */
export class GrewQueryBuilder {
  readonly dependencies: Dependency[] = [];
  readonly constraints: Constraint[] = [];
  readonly predicates: Predicate[] = [];
  readonly environment: Environment;
  private readonly inheritedNames: ReadonlySet<string>;

  constructor(
    private readonly allocator: IdentifierAllocator,
    inherited?: Environment,
  ) {
    this.environment = new Map(inherited ?? []);
    this.inheritedNames = new Set(inherited?.keys() ?? []);
  }

  /** Identifier bound to `name`, binding a fresh one on first use. */
  lookup(name: string): Identifier {
    const known = this.environment.get(name);
    if (known) return known;
    const fresh = this.allocator.next();
    this.environment.set(name, fresh);
    return fresh;
  }

  /** Tokens bound in this body, without the inherited ones. */
  tokens(): Token[] {
    return [...this.environment]
      .filter(([name]) => !this.inheritedNames.has(name))
      .map(([, identifier]) => token(identifier));
  }

  body(node: CstNode): this {
    for (const clause of childNodes(node, 'clause')) this.clause(clause);
    return this;
  }

  clause(node: CstNode): void {
    const subject = this.lookup(requireToken(node, 'subject').image);

    const nodeTail = optionalNode(node, 'nodeTail');
    if (nodeTail) return this.nodeTail(subject, nodeTail);

    const edgeTail = optionalNode(node, 'edgeTail');
    if (edgeTail) return this.edgeTail(subject, edgeTail);

    const orderTail = optionalNode(node, 'orderTail');
    if (orderTail) return this.orderTail(subject, orderTail);

    return this.constraintTail(subject, requireNode(node, 'constraintTail'));
  }

  nodeTail(subject: Identifier, node: CstNode): void {
    const features = childNodes(node, 'featureStructure').flatMap((fs) => {
      const predicate = this.featureStructure(fs);
      return predicate ? [predicate] : [];
    });
    // `X []` only introduces the node
    if (features.length > 0) this.predicates.push(raiseFrom(disjunctionOf(features), subject));
  }

  edgeTail(src: Identifier, node: CstNode): void {
    const dst = this.lookup(requireToken(node, 'target').image);
    this.dependencies.push(dependency(src, dst));

    const arrow = requireNode(node, 'arrow');
    const types = optionalNode(arrow, 'edgeTypes');
    if (!types) return;

    const deprel = attribute(dst, 'deprel');
    const labels = childNodes(types, 'literal').map((l) => this.literal(l));
    if (optionalToken(arrow, 'NegatedEdgeStart')) {
      this.predicates.push(conjunctionOf(labels.map((label) => comparison(deprel, '!=', label))));
    } else {
      this.predicates.push(disjunctionOf(labels.map((label) => comparison(deprel, '=', label))));
    }
  }

  orderTail(lhs: Identifier, node: CstNode): void {
    const rhs = this.lookup(requireToken(node, 'target').image);
    this.constraints.push(order(lhs, rhs));
    if (optionalToken(node, 'ImmediatelyPrecedes')) this.constraints.push(distance(lhs, rhs).eq(0));
  }

  constraintTail(subject: Identifier, node: CstNode): void {
    const lhs = attribute(subject, requireToken(node, 'attribute').image);
    const operator = this.compare(requireNode(node, 'compare'));
    const rhs = this.featureValue(requireNode(node, 'featureValue'));
    this.predicates.push(comparison(lhs, operator, rhs));
  }

  /** Conjunction of the features, or null for `[]`. */
  featureStructure(node: CstNode): Predicate | null {
    const features = childNodes(node, 'feature').map((f) => this.feature(f));
    return features.length > 0 ? conjunctionOf(features) : null;
  }

  feature(node: CstNode): Predicate {
    const absent = optionalToken(node, 'absent');
    if (absent) return negation(exists(attribute(null, absent.image)));

    const attr = attribute(null, requireToken(node, 'name').image);
    const compare = optionalNode(node, 'compare');
    if (!compare) return exists(attr);

    const values = childNodes(node, 'featureValue').map((v) => this.featureValue(v));
    if (this.compare(compare) === '=') {
      return disjunctionOf(values.map((v) => comparison(attr, '=', v)));
    }
    return conjunctionOf(values.map((v) => comparison(attr, '!=', v)));
  }

  compare(node: CstNode): CompareOperator {
    return optionalToken(node, 'NotEqual') ? '!=' : '=';
  }

  featureValue(node: CstNode): Operand {
    const head = optionalToken(node, 'head');
    if (head) {
      const attr = optionalToken(node, 'attribute');
      // X.upos refers to another node
      if (attr) return attribute(this.lookup(head.image), attr.image);
      return quoted(head.image);
    }
    return this.literalToken(node);
  }

  literal(node: CstNode): Operand {
    const identifier = optionalToken(node, 'Identifier');
    if (identifier) return quoted(identifier.image);
    return this.literalToken(node);
  }

  private literalToken(node: CstNode): Operand {
    const string = optionalToken(node, 'StringLiteral');
    if (string) return quoted(unquote(string.image));

    const regex = optionalToken(node, 'Regex');
    if (regex) return literal(regex.image.slice('re'.length), { representsRegex: true });

    if (optionalToken(node, 'Pcre')) failUnsupported('PCRE expressions are not yet supported');
    throw new Error(`Unknown grew literal in '${node.name}'`);
  }
}

function buildPart(query: Query, kind: QueryPartKind, builder: GrewQueryBuilder): Query {
  return addQueryPart(query, kind, {
    tokens: builder.tokens(),
    dependencies: builder.dependencies,
    constraints: builder.constraints,
    predicates: builder.predicates,
  });
}

/** Builds the recipe of a parsed grew request. */
export function buildRequest(request: CstNode, allocator: IdentifierAllocator): Recipe {
  let builder = new GrewQueryBuilder(allocator).body(requireNode(request, 'body'));
  const tokens = builder.tokens();

  let query = createQuery(allocator, {
    // an empty pattern matches an arbitrary token
    tokens: tokens.length > 0 ? tokens : [token(allocator.next())],
    dependencies: builder.dependencies,
    constraints: builder.constraints,
    predicates: builder.predicates,
  });

  for (const item of childNodes(request, 'requestItem')) {
    const kind: QueryPartKind = optionalToken(item, 'With') ? 'additional' : 'negative';
    builder = new GrewQueryBuilder(allocator, builder.environment).body(requireNode(item, 'body'));
    query = buildPart(query, kind, builder);
  }

  return recipeOfQuery(query);
}
