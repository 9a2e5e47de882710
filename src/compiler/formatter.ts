// src/compiler/formatter.ts
// Renders linear query trees as CQP text.
// Only tokens that another token refers to receive a name.

import type { Dependency, Identifier, Operand, Predicate } from '../ir/types.ts';
import { referencedIdentifiers } from '../ir/predicate.ts';
import type { LinearQuery, LinearToken, Spacing } from './types.ts';
import { nameAt } from './names.ts';

export type Environment = ReadonlyMap<Identifier, string>;

export interface FormatOptions {
  /** Structural attribute delimiting the region anchors refer to, e.g. `s`. */
  span?: string | undefined;
}

function tokenReferences(token: LinearToken): Identifier[] {
  const ids: Identifier[] = [];
  for (const p of token.predicates) ids.push(...referencedIdentifiers(p));
  for (const d of token.dependencies) ids.push(d.src, d.dst);
  return ids.filter((id) => id !== token.identifier);
}

function collectReferences(node: LinearQuery, into: Set<Identifier>): void {
  switch (node.type) {
    case 'Token':
      for (const id of tokenReferences(node)) into.add(id);
      return;
    case 'Sequence':
      collectReferences(node.lhs, into);
      collectReferences(node.rhs, into);
      return;
    case 'Operator':
      for (const q of node.queries) collectReferences(q, into);
      return;
  }
}

/** Identifiers referenced across token boundaries, in order of first reference. */
export function crossReferences(root: LinearQuery): Set<Identifier> {
  const into = new Set<Identifier>();
  collectReferences(root, into);
  return into;
}

export function buildEnvironment(root: LinearQuery): Environment {
  return new Map([...crossReferences(root)].map((id, index) => [id, nameAt(index)]));
}

function nameOf(id: Identifier, environment: Environment): string {
  // every referenced identifier is named by buildEnvironment
  return environment.get(id) ?? `_${id.id}`;
}

export function formatOperand(operand: Operand, environment: Environment): string {
  if (operand.type === 'Literal') return operand.value;
  if (operand.reference === null) return operand.attribute;
  return `${nameOf(operand.reference, environment)}.${operand.attribute}`;
}

export function formatPredicate(predicate: Predicate, environment: Environment): string {
  switch (predicate.type) {
    case 'Comparison':
      return `${formatOperand(predicate.lhs, environment)} ${predicate.operator} ${formatOperand(predicate.rhs, environment)}`;
    case 'Exists':
      return formatOperand(predicate.attribute, environment);
    case 'Negation': {
      const inner = predicate.predicate;
      const text = formatPredicate(inner, environment);
      return inner.type === 'Comparison' ? `!(${text})` : `!${text}`;
    }
    case 'Conjunction':
      return `(${predicate.predicates.map((p) => formatPredicate(p, environment)).join(' & ')})`;
    case 'Disjunction':
      return `(${predicate.predicates.map((p) => formatPredicate(p, environment)).join(' | ')})`;
  }
}

function formatDependency(dependency: Dependency, token: LinearToken, environment: Environment): string {
  if (dependency.src === token.identifier) return `${nameOf(dependency.dst, environment)}.dephead = ref`;
  return `dephead = ${nameOf(dependency.src, environment)}.ref`;
}

function formatToken(token: LinearToken, environment: Environment, options: FormatOptions): string {
  const name = environment.get(token.identifier);
  const prefix = name === undefined ? '' : `${name}:`;
  const parts: string[] = [];
  for (const p of token.predicates) {
    // predicates on a token are already conjunct
    if (p.type === 'Conjunction') parts.push(...p.predicates.map((q) => formatPredicate(q, environment)));
    else parts.push(formatPredicate(p, environment));
  }
  for (const d of token.dependencies) parts.push(formatDependency(d, token, environment));

  const text = `${prefix}[${parts.join(' & ')}]`;
  if (options.span === undefined || token.anchor === null) return text;
  return token.anchor === 'first' ? `<${options.span}> ${text}` : `${text} </${options.span}>`;
}

export function formatSpacing(spacing: Spacing): string {
  const { min, max } = spacing;
  if (max === null) return min === 0 ? '[]*' : `[]{${min},}`;
  if (min === max) return Array.from({ length: min }, () => '[]').join(' ');
  return `[]{${min},${max}}`;
}

function formatNode(node: LinearQuery, environment: Environment, options: FormatOptions): string {
  switch (node.type) {
    case 'Token':
      return formatToken(node, environment, options);
    case 'Sequence': {
      const side = (q: LinearQuery): string => {
        const text = formatNode(q, environment, options);
        return q.type === 'Operator' ? `(${text})` : text;
      };
      const spacing = formatSpacing(node.spacing);
      return [side(node.lhs), spacing, side(node.rhs)].filter((s) => s !== '').join(' ');
    }
    case 'Operator':
      return node.queries
        .map((q) => {
          const text = formatNode(q, environment, options);
          return q.type === 'Operator' ? `(${text})` : text;
        })
        .join(` ${node.operator} `);
  }
}

/** Renders a linear query, naming every identifier referenced across tokens. */
export function formatLinearQuery(root: LinearQuery, options: FormatOptions = {}): string {
  return formatNode(root, buildEnvironment(root), options);
}
