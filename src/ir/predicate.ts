// src/ir/predicate.ts
// Constructors and symbolic operations on operands and predicates.
//
// Raising turns a token-local predicate into a global one by filling in the
// missing reference; lowering is the inverse once the predicate is attached to
// a token again. Normalization flattens same-kind junctions, collapses
// singletons and removes double negation, so normalized predicates can be
// compared structurally.

import type { Identifier } from './identifier.ts';
import type {
  Attribute,
  Comparison,
  ComparisonOperator,
  Conjunction,
  Disjunction,
  Exists,
  Literal,
  Negation,
  NonEmpty,
  Operand,
  Predicate,
} from './types.ts';
import { isJunction } from './types.ts';
import { escapeRegex } from './regex.ts';
import { failInvariant } from './invariantErrors.ts';

// ----- Constructors -----

export interface LiteralOptions {
  /** The text already is a regular expression and must not be escaped. */
  representsRegex?: boolean;
}

export function literal(value: string, options: LiteralOptions = {}): Literal {
  return { type: 'Literal', value: options.representsRegex ? value : escapeRegex(value) };
}

/** Double-quoted CQP string matching `value` literally. */
export function quoted(value: string): Literal {
  return { type: 'Literal', value: `"${escapeRegex(value).replace(/"/g, '\\"')}"` };
}

export function attribute(reference: Identifier | null, name: string): Attribute {
  return { type: 'Attribute', reference, attribute: name };
}

export function comparison(lhs: Operand, operator: ComparisonOperator, rhs: Operand): Comparison {
  return { type: 'Comparison', lhs, operator, rhs };
}

export function exists(attr: Attribute): Exists {
  return { type: 'Exists', attribute: attr };
}

export function negation(predicate: Predicate): Negation {
  return { type: 'Negation', predicate };
}

function nonEmpty(predicates: readonly Predicate[], kind: string): NonEmpty<Predicate> {
  const [first, ...rest] = predicates;
  if (first === undefined) failInvariant(`Cannot create empty ${kind}.`, 'non-empty-junction');
  return [first, ...rest];
}

export function conjunction(predicates: readonly Predicate[]): Conjunction {
  return { type: 'Conjunction', predicates: nonEmpty(predicates, 'Conjunction') };
}

export function disjunction(predicates: readonly Predicate[]): Disjunction {
  return { type: 'Disjunction', predicates: nonEmpty(predicates, 'Disjunction') };
}

/** Conjunction of the predicates; a single predicate is returned as is. */
export function conjunctionOf(predicates: readonly Predicate[]): Predicate {
  const members = nonEmpty(predicates, 'Conjunction');
  return members.length === 1 ? members[0] : { type: 'Conjunction', predicates: members };
}

/** Disjunction of the predicates; a single predicate is returned as is. */
export function disjunctionOf(predicates: readonly Predicate[]): Predicate {
  const members = nonEmpty(predicates, 'Disjunction');
  return members.length === 1 ? members[0] : { type: 'Disjunction', predicates: members };
}

// ----- Referenced identifiers -----

function collectOperand(node: Operand, into: Set<Identifier>): void {
  if (node.type === 'Attribute' && node.reference !== null) into.add(node.reference);
}

function collectPredicate(node: Predicate, into: Set<Identifier>): void {
  switch (node.type) {
    case 'Comparison':
      collectOperand(node.lhs, into);
      collectOperand(node.rhs, into);
      return;
    case 'Exists':
      collectOperand(node.attribute, into);
      return;
    case 'Negation':
      collectPredicate(node.predicate, into);
      return;
    case 'Conjunction':
    case 'Disjunction':
      for (const p of node.predicates) collectPredicate(p, into);
      return;
  }
}

/** Identifiers appearing in the node, in order of first appearance. */
export function referencedIdentifiers(node: Predicate | Operand): Set<Identifier> {
  const into = new Set<Identifier>();
  if (node.type === 'Literal' || node.type === 'Attribute') collectOperand(node, into);
  else collectPredicate(node, into);
  return into;
}

// ----- Raising / lowering -----

type AttributeMapper = (attr: Attribute) => Attribute;

function mapOperand(node: Operand, f: AttributeMapper): Operand {
  return node.type === 'Attribute' ? f(node) : node;
}

function mapPredicate(node: Predicate, f: AttributeMapper): Predicate {
  switch (node.type) {
    case 'Comparison':
      return comparison(mapOperand(node.lhs, f), node.operator, mapOperand(node.rhs, f));
    case 'Exists':
      return exists(f(node.attribute));
    case 'Negation':
      return negation(mapPredicate(node.predicate, f));
    case 'Conjunction':
      return conjunction(node.predicates.map((p) => mapPredicate(p, f)));
    case 'Disjunction':
      return disjunction(node.predicates.map((p) => mapPredicate(p, f)));
  }
}

const raiseAttribute = (on: Identifier): AttributeMapper => (attr) =>
  attr.reference === null ? attribute(on, attr.attribute) : attr;

const lowerAttribute = (on: Identifier): AttributeMapper => (attr) =>
  attr.reference === on ? attribute(null, attr.attribute) : attr;

/** Qualifies every unqualified attribute with `on`. */
export function raiseFrom(node: Predicate, on: Identifier): Predicate {
  return mapPredicate(node, raiseAttribute(on));
}

/** Removes the qualification of every attribute that refers to `on`. */
export function lowerOnto(node: Predicate, on: Identifier): Predicate {
  return mapPredicate(node, lowerAttribute(on));
}

// ----- Normalization -----

export function normalize(node: Predicate): Predicate {
  switch (node.type) {
    case 'Comparison':
    case 'Exists':
      return node;
    case 'Negation': {
      const inner = normalize(node.predicate);
      // !!p == p
      return inner.type === 'Negation' ? inner.predicate : negation(inner);
    }
    case 'Conjunction':
    case 'Disjunction': {
      const members: Predicate[] = [];
      for (const p of node.predicates) {
        const normalized = normalize(p);
        if (isJunction(normalized) && normalized.type === node.type) members.push(...normalized.predicates);
        else members.push(normalized);
      }
      return node.type === 'Conjunction' ? conjunctionOf(members) : disjunctionOf(members);
    }
  }
}

// ----- Structural equality -----

export function operandEquals(a: Operand, b: Operand): boolean {
  if (a.type === 'Literal') return b.type === 'Literal' && a.value === b.value;
  return b.type === 'Attribute' && a.reference === b.reference && a.attribute === b.attribute;
}

export function predicateEquals(a: Predicate, b: Predicate): boolean {
  switch (a.type) {
    case 'Comparison':
      return (
        b.type === 'Comparison' &&
        a.operator === b.operator &&
        operandEquals(a.lhs, b.lhs) &&
        operandEquals(a.rhs, b.rhs)
      );
    case 'Exists':
      return b.type === 'Exists' && operandEquals(a.attribute, b.attribute);
    case 'Negation':
      return b.type === 'Negation' && predicateEquals(a.predicate, b.predicate);
    case 'Conjunction':
    case 'Disjunction':
      return (
        isJunction(b) &&
        b.type === a.type &&
        a.predicates.length === b.predicates.length &&
        a.predicates.every((p, i) => {
          const other = b.predicates[i];
          return other !== undefined && predicateEquals(p, other);
        })
      );
  }
}

/** Keeps the first of every group of structurally equal predicates. */
export function dedupePredicates(predicates: readonly Predicate[]): Predicate[] {
  const result: Predicate[] = [];
  for (const p of predicates) {
    if (!result.some((q) => predicateEquals(p, q))) result.push(p);
  }
  return result;
}
