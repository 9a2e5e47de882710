// src/errors/errors.ts
// treecqp - error types and helpers
// Each layer throws its own error type so callers can classify failures.
// Library layers never log; the CLI and the HTTP service decide what to report.

export type ErrorCode =
  | 'E_PARSE_UNEXPECTED_TOKEN'
  | 'E_PARSE_GENERIC'
  | 'E_NOT_SUPPORTED'
  | 'E_INVARIANT_VIOLATION'
  | 'E_TRANSLATOR_AMBIGUOUS'
  | 'E_TRANSLATOR_UNKNOWN'
  | 'E_LIMIT_TOKENS'
  | 'E_LIMIT_TIMEOUT'
  | 'E_CONFIG_INVALID';

export abstract class TreecqpError extends Error {
  public abstract readonly code: ErrorCode;
  constructor(message: string) {
    super(message);
    // keep instanceof working for subclasses
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** One problem found in the input of a front end. `position` is `line:column` when known. */
export interface InputError {
  position: string | null;
  message: string;
}

// Front ends: input does not follow the grammar of its language
export class ParseError extends TreecqpError {
  public readonly code: ErrorCode;
  public readonly errors: readonly [InputError, ...InputError[]];
  constructor(
    errors: readonly [InputError, ...InputError[]],
    code: Extract<ErrorCode, 'E_PARSE_UNEXPECTED_TOKEN' | 'E_PARSE_GENERIC'> = 'E_PARSE_GENERIC',
  ) {
    super(`Parsing failed. Detected ${errors.length} error(s).`);
    this.name = 'ParseError';
    this.code = code;
    this.errors = errors;
  }
}

// Front ends and compiler: valid input without a translation
export class NotSupportedError extends TreecqpError {
  public readonly code: ErrorCode = 'E_NOT_SUPPORTED';
  constructor(public readonly reason: string = '') {
    super(reason ? `Query is not supported: ${reason}.` : 'Query is not supported.');
    this.name = 'NotSupportedError';
  }
}

// IR: a front end produced a malformed query graph
export class InvariantError extends TreecqpError {
  public readonly code: ErrorCode = 'E_INVARIANT_VIOLATION';
  constructor(
    message: string,
    public readonly rule?: string,
  ) {
    super(message);
    this.name = 'InvariantError';
  }
}

// Registry: zero or several translators accepted the input
export class AmbiguousTranslatorError extends TreecqpError {
  public readonly code: ErrorCode = 'E_TRANSLATOR_AMBIGUOUS';
  constructor(
    public readonly matching: readonly string[],
    public readonly rejected: readonly string[],
  ) {
    super(
      matching.length === 0
        ? 'No translator accepts this query.'
        : `Query is accepted by several translators: ${formatHumanReadable(matching)}.`,
    );
    this.name = 'AmbiguousTranslatorError';
  }

  noTranslatorMatches(): boolean {
    return this.matching.length === 0;
  }

  tooManyTranslatorsMatch(): boolean {
    return this.matching.length > 1;
  }
}

export class UnknownTranslatorError extends TreecqpError {
  public readonly code: ErrorCode = 'E_TRANSLATOR_UNKNOWN';
  constructor(public readonly translator: string) {
    super(`Unknown translator '${translator}'.`);
    this.name = 'UnknownTranslatorError';
  }
}

// Hosts: limits put around the compiler
export class LimitExceededError extends TreecqpError {
  public readonly code: ErrorCode;
  constructor(
    message: string,
    public readonly limit: number,
    code: Extract<ErrorCode, 'E_LIMIT_TOKENS' | 'E_LIMIT_TIMEOUT'>,
  ) {
    super(message);
    this.name = 'LimitExceededError';
    this.code = code;
  }
}

export class ConfigError extends TreecqpError {
  public readonly code: ErrorCode = 'E_CONFIG_INVALID';
  constructor(
    message: string,
    public readonly variable: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function formatLocation(line?: number, column?: number): string | null {
  if (line == null || column == null || Number.isNaN(line) || Number.isNaN(column)) return null;
  return `${line}:${column}`;
}

/** `a`, `a and b`, `a, b and c` */
export function formatHumanReadable(items: readonly string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1] ?? ''}`;
}
