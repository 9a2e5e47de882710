// src/frontends/grew/index.ts
// Public API: grew request text -> Recipe.

import type { CstNode } from 'chevrotain';
import type { IdentifierAllocator } from '../../ir/identifier.ts';
import type { Recipe } from '../../ir/types.ts';
import { failOnRecognitionErrors, tokenize } from '../cst.ts';
import { grewLexer } from './tokens.ts';
import { grewParser } from './parser.ts';
import { buildRequest } from './builder.ts';

export function parseGrew(input: string): CstNode {
  grewParser.input = tokenize(grewLexer, input);
  const cst = grewParser.request();
  failOnRecognitionErrors(grewParser.errors);
  return cst;
}

export function translateGrew(input: string, allocator: IdentifierAllocator): Recipe {
  return buildRequest(parseGrew(input), allocator);
}
