// src/server/limits.ts
// Bounds on the work a single HTTP translation may do.

import type { Query } from '../ir/types.ts';
import type { TranslateOptions } from '../compiler/translate.ts';
import { LimitExceededError } from '../errors/errors.ts';

export interface Limits {
  maxTokens: number;
  timeoutMs: number;
}

export type Clock = () => number;

/**
 * Translation hooks enforcing `limits`. The token cap is checked on every
 * expanded query before it is compiled; the deadline starts now and is checked
 * before each arrangement is lowered.
 */
export function limitHooks(limits: Limits, clock: Clock = Date.now): Pick<TranslateOptions, 'beforeCompile' | 'onArrangement'> {
  const deadline = clock() + limits.timeoutMs;
  return {
    beforeCompile(query: Query) {
      if (query.tokens.length > limits.maxTokens) {
        throw new LimitExceededError(
          `Query has ${query.tokens.length} tokens, at most ${limits.maxTokens} are allowed.`,
          limits.maxTokens,
          'E_LIMIT_TOKENS',
        );
      }
    },
    onArrangement() {
      if (clock() > deadline) {
        throw new LimitExceededError(`Translation exceeded ${limits.timeoutMs} ms.`, limits.timeoutMs, 'E_LIMIT_TIMEOUT');
      }
    },
  };
}
