// src/frontends/deptreepy/tokens.ts
import { createToken, Lexer } from 'chevrotain';

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /\s+/, group: Lexer.SKIPPED });

export const LParen = createToken({ name: 'LParen', pattern: /\(/ });
export const RParen = createToken({ name: 'RParen', pattern: /\)/ });
export const Quoted = createToken({ name: 'Quoted', pattern: /"(?:[^"\\]|\\.)*"/ });
// Any run of characters up to whitespace or a parenthesis: AND, TREE_, NOUN, obl:tmod ...
export const Atom = createToken({ name: 'Atom', pattern: /[^\s()"]+/ });

export const allTokens = [WhiteSpace, LParen, RParen, Quoted, Atom];

export const deptreepyLexer = new Lexer(allTokens);
