// src/frontends/deptreepy/parser.ts
// CST parser for deptreepy patterns, which are plain s-expressions:
//
//   document   := expression
//   expression := "(" (Atom | Quoted | expression)* ")"

import { CstParser } from 'chevrotain';
import { allTokens, Atom, LParen, Quoted, RParen } from './tokens.ts';

export class DeptreepyParser extends CstParser {
  constructor() {
    super(allTokens, { nodeLocationTracking: 'full' });
    this.performSelfAnalysis();
  }

  public document = this.RULE('document', () => {
    this.SUBRULE(this.expression);
  });

  public expression = this.RULE('expression', () => {
    this.CONSUME(LParen);
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Atom) },
        { ALT: () => this.CONSUME(Quoted) },
        { ALT: () => this.SUBRULE(this.expression) },
      ]);
    });
    this.CONSUME(RParen);
  });
}

export const deptreepyParser = new DeptreepyParser();
