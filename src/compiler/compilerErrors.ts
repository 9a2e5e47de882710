// src/compiler/compilerErrors.ts
import { NotSupportedError } from '../errors/errors.ts';

export function failUnsupported(reason: string): never {
  throw new NotSupportedError(reason);
}
