// src/frontends/deptreepy/index.ts
// Public API: deptreepy pattern text -> Recipe.

import type { CstNode } from 'chevrotain';
import type { IdentifierAllocator } from '../../ir/identifier.ts';
import type { Recipe } from '../../ir/types.ts';
import { failOnRecognitionErrors, tokenize } from '../cst.ts';
import { deptreepyLexer } from './tokens.ts';
import { deptreepyParser } from './parser.ts';
import { buildPattern } from './builder.ts';

export function parseDeptreepy(input: string): CstNode {
  // `TREE_ a b` is read as `(TREE_ a b)`
  const text = input.trimStart().startsWith('(') ? input : `(${input})`;
  deptreepyParser.input = tokenize(deptreepyLexer, text);
  const cst = deptreepyParser.document();
  failOnRecognitionErrors(deptreepyParser.errors);
  return cst;
}

export function translateDeptreepy(input: string, allocator: IdentifierAllocator): Recipe {
  return buildPattern(parseDeptreepy(input), allocator);
}
