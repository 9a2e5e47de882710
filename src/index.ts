// src/index.ts
export * from './ir/types.ts';
export { IdentifierAllocator } from './ir/identifier.ts';
export * from './ir/predicate.ts';
export * from './ir/constraint.ts';
export * from './ir/query.ts';
export * from './ir/recipe.ts';
export { escapeRegex } from './ir/regex.ts';

export * from './compiler/types.ts';
export * from './compiler/arrangements.ts';
export * from './compiler/lowering.ts';
export * from './compiler/formatter.ts';
export * from './compiler/names.ts';
export * from './compiler/translate.ts';

export { parseGrew, translateGrew } from './frontends/grew/index.ts';
export { parseDepsearch, translateDepsearch } from './frontends/depsearch/index.ts';
export { parseDeptreepy, translateDeptreepy } from './frontends/deptreepy/index.ts';
export { parseConllu, translateConllu } from './frontends/conllu/index.ts';
export { TranslatorRegistry, createDefaultRegistry } from './frontends/registry.ts';
export type { Translator, TranslationResult } from './frontends/registry.ts';

export {
  TreecqpError,
  ParseError,
  NotSupportedError,
  InvariantError,
  AmbiguousTranslatorError,
  UnknownTranslatorError,
  LimitExceededError,
  ConfigError,
} from './errors/errors.ts';
export type { ErrorCode, InputError } from './errors/errors.ts';
