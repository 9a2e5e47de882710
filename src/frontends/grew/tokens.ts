// src/frontends/grew/tokens.ts
import { createToken, Lexer } from 'chevrotain';

// Whitespace and `%` comments never reach the parser.
export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /\s+/, group: Lexer.SKIPPED });
export const Comment = createToken({ name: 'Comment', pattern: /%[^\n\r]*/, group: Lexer.SKIPPED });

// Identifiers may contain `-` and `:` between word characters (`obl:tmod`, `X-1`).
export const Identifier = createToken({
  name: 'Identifier',
  pattern: /[A-Za-z0-9_$]+(?:[-:][A-Za-z0-9_$]+)*/,
});

// ----- Keywords -----
export const Pattern = createToken({ name: 'Pattern', pattern: /pattern/, longer_alt: Identifier });
export const With = createToken({ name: 'With', pattern: /with/, longer_alt: Identifier });
export const Without = createToken({ name: 'Without', pattern: /without/, longer_alt: Identifier });

// ----- Literals -----
// Regex must precede Identifier, since `re` alone is an identifier.
export const Regex = createToken({ name: 'Regex', pattern: /re"(?:[^"\\]|\\.)*"/ });
export const Pcre = createToken({ name: 'Pcre', pattern: /\/(?:[^/\\\n]|\\.)*\/[a-z]*/ });
export const StringLiteral = createToken({ name: 'StringLiteral', pattern: /"(?:[^"\\]|\\.)*"/ });

// ----- Edges -----
// Multi-character tokens first.
export const NegatedEdgeStart = createToken({ name: 'NegatedEdgeStart', pattern: /-\[\^/ });
export const EdgeStart = createToken({ name: 'EdgeStart', pattern: /-\[/ });
export const EdgeEnd = createToken({ name: 'EdgeEnd', pattern: /\]->/ });
export const Arrow = createToken({ name: 'Arrow', pattern: /->/ });

// ----- Operators -----
export const Precedes = createToken({ name: 'Precedes', pattern: /<</ });
export const NotEqual = createToken({ name: 'NotEqual', pattern: /<>/ });
export const ImmediatelyPrecedes = createToken({ name: 'ImmediatelyPrecedes', pattern: /</ });
export const Equals = createToken({ name: 'Equals', pattern: /=/ });
export const Bang = createToken({ name: 'Bang', pattern: /!/ });

// ----- Separators -----
export const LCurly = createToken({ name: 'LCurly', pattern: /\{/ });
export const RCurly = createToken({ name: 'RCurly', pattern: /\}/ });
export const LBracket = createToken({ name: 'LBracket', pattern: /\[/ });
export const RBracket = createToken({ name: 'RBracket', pattern: /\]/ });
export const Semicolon = createToken({ name: 'Semicolon', pattern: /;/ });
export const Comma = createToken({ name: 'Comma', pattern: /,/ });
export const Pipe = createToken({ name: 'Pipe', pattern: /\|/ });
export const Dot = createToken({ name: 'Dot', pattern: /\./ });

// Chevrotain tries the tokens in this order.
export const allTokens = [
  WhiteSpace,
  Comment,

  // Keywords before Identifier (`without` before `with`)
  Pattern,
  Without,
  With,

  // Literals
  Regex,
  Pcre,
  StringLiteral,

  // Edges before their one-character prefixes
  NegatedEdgeStart,
  EdgeStart,
  EdgeEnd,
  Arrow,

  Precedes,
  NotEqual,
  ImmediatelyPrecedes,
  Equals,
  Bang,

  LCurly,
  RCurly,
  LBracket,
  RBracket,
  Semicolon,
  Comma,
  Pipe,
  Dot,

  Identifier,
];

export const grewLexer = new Lexer(allTokens);
