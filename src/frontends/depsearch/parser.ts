// src/frontends/depsearch/parser.ts
// CST parser for dep_search queries:
//
//   query        := expression ((Plus | Arrow) expression)*
//   expression   := operand (relation operand)*
//   operand      := tokenExpr | "(" expression ")"
//   relation     := "!" (simpleRelation | "(" alternatives ")") | alternatives
//   alternatives := simpleRelation ("|" simpleRelation)*
//   tokenExpr    := tokenAnd ("|" tokenAnd)*
//   tokenAnd     := tokenNot ("&" tokenNot)*
//   tokenNot     := "!" tokenNot | tokenAtom
//   tokenAtom    := "(" tokenExpr ")" | Word | Quoted | Feature

import { CstParser } from 'chevrotain';
import {
  allTokens,
  Amp,
  Arrow,
  Bang,
  DependencyRelation,
  Dot,
  Feature,
  LinearRelation,
  LParen,
  Pipe,
  Plus,
  Quoted,
  RParen,
  Word,
} from './tokens.ts';

export class DepsearchParser extends CstParser {
  constructor() {
    super(allTokens, { nodeLocationTracking: 'full' });
    this.performSelfAnalysis();
  }

  public query = this.RULE('query', () => {
    this.SUBRULE(this.expression);
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Plus) },
        { ALT: () => this.CONSUME(Arrow) },
      ]);
      this.SUBRULE2(this.expression);
    });
  });

  public expression = this.RULE('expression', () => {
    this.SUBRULE(this.operand, { LABEL: 'head' });
    this.MANY(() => {
      this.SUBRULE(this.relation);
      this.SUBRULE2(this.operand, { LABEL: 'target' });
    });
  });

  // `(` opens either a token specification or a nested expression; try the former first.
  public operand = this.RULE('operand', () => {
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        { GATE: this.BACKTRACK(this.tokenExpr), ALT: () => this.SUBRULE(this.tokenExpr) },
        {
          ALT: () => {
            this.CONSUME(LParen);
            this.SUBRULE(this.expression);
            this.CONSUME(RParen);
          },
        },
      ],
    });
  });

  public relation = this.RULE('relation', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Bang);
          this.OR2([
            { ALT: () => this.SUBRULE(this.simpleRelation) },
            {
              ALT: () => {
                this.CONSUME(LParen);
                this.SUBRULE(this.alternatives);
                this.CONSUME(RParen);
              },
            },
          ]);
        },
      },
      { ALT: () => this.SUBRULE2(this.alternatives) },
    ]);
  });

  public alternatives = this.RULE('alternatives', () => {
    this.AT_LEAST_ONE_SEP({ SEP: Pipe, DEF: () => this.SUBRULE(this.simpleRelation) });
  });

  public simpleRelation = this.RULE('simpleRelation', () => {
    this.OR([
      { ALT: () => this.CONSUME(DependencyRelation) },
      { ALT: () => this.CONSUME(LinearRelation) },
      { ALT: () => this.CONSUME(Dot) },
    ]);
  });

  public tokenExpr = this.RULE('tokenExpr', () => {
    this.AT_LEAST_ONE_SEP({ SEP: Pipe, DEF: () => this.SUBRULE(this.tokenAnd) });
  });

  public tokenAnd = this.RULE('tokenAnd', () => {
    this.AT_LEAST_ONE_SEP({ SEP: Amp, DEF: () => this.SUBRULE(this.tokenNot) });
  });

  public tokenNot = this.RULE('tokenNot', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Bang);
          this.SUBRULE(this.tokenNot, { LABEL: 'negated' });
        },
      },
      { ALT: () => this.SUBRULE(this.tokenAtom) },
    ]);
  });

  public tokenAtom = this.RULE('tokenAtom', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.tokenExpr);
          this.CONSUME(RParen);
        },
      },
      { ALT: () => this.CONSUME(Word) },
      { ALT: () => this.CONSUME(Quoted) },
      { ALT: () => this.CONSUME(Feature) },
    ]);
  });
}

export const depsearchParser = new DepsearchParser();
