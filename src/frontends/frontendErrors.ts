// src/frontends/frontendErrors.ts
import { NotSupportedError, ParseError, formatLocation } from '../errors/errors.ts';
import type { InputError } from '../errors/errors.ts';

export function failUnsupported(reason = ''): never {
  throw new NotSupportedError(reason);
}

export function failParse(message: string, line?: number, column?: number): never {
  throw new ParseError([{ position: formatLocation(line, column), message }]);
}

export function failParseErrors(errors: readonly InputError[], unexpected = false): never {
  const [first, ...rest] = errors;
  if (first === undefined) return failParse('Parse error');
  throw new ParseError([first, ...rest], unexpected ? 'E_PARSE_UNEXPECTED_TOKEN' : 'E_PARSE_GENERIC');
}
