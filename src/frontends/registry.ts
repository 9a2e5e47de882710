// src/frontends/registry.ts
// Named translators from source query languages to recipes.
// Without a name, every translator is tried and exactly one has to accept the input.

import type { IdentifierAllocator } from '../ir/identifier.ts';
import type { Recipe } from '../ir/types.ts';
import {
  AmbiguousTranslatorError,
  NotSupportedError,
  ParseError,
  UnknownTranslatorError,
} from '../errors/errors.ts';
import { translateGrew } from './grew/index.ts';
import { translateDepsearch } from './depsearch/index.ts';
import { translateDeptreepy } from './deptreepy/index.ts';
import { translateConllu } from './conllu/index.ts';

export type Translator = (input: string, allocator: IdentifierAllocator) => Recipe;

export interface TranslationResult {
  translator: string;
  recipe: Recipe;
}

export class TranslatorRegistry {
  private readonly translators = new Map<string, Translator>();

  register(name: string, translator: Translator): this {
    if (this.translators.has(name)) throw new Error(`Translator '${name}' is already registered`);
    this.translators.set(name, translator);
    return this;
  }

  names(): string[] {
    return [...this.translators.keys()];
  }

  has(name: string): boolean {
    return this.translators.has(name);
  }

  /**
   * Translates `input` with the named translator, or with the only translator
   * that accepts it. Parse failures and unsupported queries count as rejection
   * while guessing; other errors propagate.
   */
  translate(input: string, allocator: IdentifierAllocator, name?: string): TranslationResult {
    if (name !== undefined) {
      const translator = this.translators.get(name);
      if (!translator) throw new UnknownTranslatorError(name);
      return { translator: name, recipe: translator(input, allocator) };
    }
    return this.guess(input, allocator);
  }

  private guess(input: string, allocator: IdentifierAllocator): TranslationResult {
    const accepted: TranslationResult[] = [];
    const rejected: string[] = [];
    for (const [name, translator] of this.translators) {
      try {
        accepted.push({ translator: name, recipe: translator(input, allocator) });
      } catch (err) {
        if (!(err instanceof ParseError || err instanceof NotSupportedError)) throw err;
        rejected.push(name);
      }
    }
    const [only, ...others] = accepted;
    if (only && others.length === 0) return only;
    throw new AmbiguousTranslatorError(
      accepted.map((r) => r.translator),
      rejected,
    );
  }
}

export function createDefaultRegistry(): TranslatorRegistry {
  return new TranslatorRegistry()
    .register('grew', translateGrew)
    .register('depsearch', translateDepsearch)
    .register('deptreepy', translateDeptreepy)
    .register('conllu', translateConllu);
}
