// src/frontends/conllu/index.ts
// Public API: CoNLL-U text -> Recipe. Only the first sentence is translated.

import type { IdentifierAllocator } from '../../ir/identifier.ts';
import type { Recipe } from '../../ir/types.ts';
import { failParse } from '../frontendErrors.ts';
import { readSentences } from './reader.ts';
import type { Sentence } from './reader.ts';
import { buildSentence } from './builder.ts';

export function parseConllu(input: string): Sentence {
  const [sentence] = readSentences(input);
  if (!sentence) return failParse('Cannot parse an empty CoNLL-U document.');
  if (!sentence.some((t) => t.id.kind === 'word')) return failParse('No tokens were found in the CoNLL-U document.');
  return sentence;
}

export function translateConllu(input: string, allocator: IdentifierAllocator): Recipe {
  return buildSentence(parseConllu(input), allocator);
}
