// src/frontends/depsearch/tokens.ts
import { createToken, Lexer } from 'chevrotain';

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /\s+/, group: Lexer.SKIPPED });

// ----- Query operators -----
export const Arrow = createToken({ name: 'Arrow', pattern: /->/ });
export const Plus = createToken({ name: 'Plus', pattern: /\+/ });

// ----- Relations -----
// A relation is one token, so `_ < walk` never reads `walk` as a label.
// Signed numbers are accepted here and rejected while building.
export const LinearRelation = createToken({
  name: 'LinearRelation',
  pattern: /[<>]lin_-?\d+:-?\d+(?:@[LR])?/,
});
export const DependencyRelation = createToken({
  name: 'DependencyRelation',
  pattern: /[<>]!?(?:[A-Za-z_][A-Za-z0-9_:]*)?(?:@[LR])?/,
});
export const Dot = createToken({ name: 'Dot', pattern: /\./ });

// ----- Token specifications -----
export const Bang = createToken({ name: 'Bang', pattern: /!/ });
export const Amp = createToken({ name: 'Amp', pattern: /&/ });
export const Pipe = createToken({ name: 'Pipe', pattern: /\|/ });
export const LParen = createToken({ name: 'LParen', pattern: /\(/ });
export const RParen = createToken({ name: 'RParen', pattern: /\)/ });
export const Quoted = createToken({ name: 'Quoted', pattern: /"(?:[^"\\]|\\.)*"/ });
// L=lemma, Case=Gen
export const Feature = createToken({
  name: 'Feature',
  pattern: /[A-Za-z0-9_À-ɏ]+=[A-Za-z0-9_:À-ɏ-]+/,
});
export const Word = createToken({
  name: 'Word',
  pattern: /[A-Za-z0-9_À-ɏ][A-Za-z0-9_:À-ɏ]*/,
});

export const allTokens = [
  WhiteSpace,
  Arrow,
  Plus,
  LinearRelation,
  DependencyRelation,
  Dot,
  Bang,
  Amp,
  Pipe,
  LParen,
  RParen,
  Quoted,
  Feature,
  Word,
];

export const depsearchLexer = new Lexer(allTokens);
