// src/cli/output.ts
// Text shown by the CLI and the REPL for translations and failures.

import type { RenderedPlan } from '../compiler/translate.ts';
import {
  AmbiguousTranslatorError,
  NotSupportedError,
  ParseError,
  UnknownTranslatorError,
} from '../errors/errors.ts';

/** Named steps first, then the query producing the result. */
export function formatPlan(plan: RenderedPlan): string {
  return [...plan.additionalSteps, plan.query].join('\n');
}

/** Lines describing an expected failure, or null for errors that are bugs. */
export function describeFailure(err: unknown): string[] | null {
  if (err instanceof ParseError) {
    return [
      'Query could not be parsed:',
      ...err.errors.map((e) => (e.position ? `  ${e.position}: ${e.message}` : `  ${e.message}`)),
    ];
  }
  if (err instanceof NotSupportedError) {
    return [err.reason ? `Query cannot be translated: ${err.reason}.` : 'Query cannot be translated.'];
  }
  if (err instanceof AmbiguousTranslatorError) {
    return [`Unable to determine translator: ${err.message}`];
  }
  if (err instanceof UnknownTranslatorError) {
    return [err.message];
  }
  return null;
}
