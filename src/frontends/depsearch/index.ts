// src/frontends/depsearch/index.ts
// Public API: dep_search query text -> Recipe.

import type { CstNode } from 'chevrotain';
import type { IdentifierAllocator } from '../../ir/identifier.ts';
import type { Recipe } from '../../ir/types.ts';
import { failOnRecognitionErrors, tokenize } from '../cst.ts';
import { depsearchLexer } from './tokens.ts';
import { depsearchParser } from './parser.ts';
import { buildQuery } from './builder.ts';

export function parseDepsearch(input: string): CstNode {
  depsearchParser.input = tokenize(depsearchLexer, input);
  const cst = depsearchParser.query();
  failOnRecognitionErrors(depsearchParser.errors);
  return cst;
}

export function translateDepsearch(input: string, allocator: IdentifierAllocator): Recipe {
  return buildQuery(parseDepsearch(input), allocator);
}
