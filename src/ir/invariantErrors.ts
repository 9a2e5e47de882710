// src/ir/invariantErrors.ts
import { InvariantError } from '../errors/errors.ts';

export function failInvariant(message: string, rule?: string): never {
  throw rule === undefined ? new InvariantError(message) : new InvariantError(message, rule);
}
