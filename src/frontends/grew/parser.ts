// src/frontends/grew/parser.ts
// CST parser for grew requests:
//
//   request      := "pattern" body requestItem*
//   requestItem  := ("with" | "without") body
//   body         := "{" (clause ";"?)* "}"
//   clause       := Identifier (nodeTail | edgeTail | orderTail | constraintTail)

import { CstParser } from 'chevrotain';
import {
  allTokens,
  Arrow,
  Bang,
  Comma,
  Dot,
  EdgeEnd,
  EdgeStart,
  Equals,
  Identifier,
  ImmediatelyPrecedes,
  LBracket,
  LCurly,
  NegatedEdgeStart,
  NotEqual,
  Pattern,
  Pcre,
  Pipe,
  Precedes,
  RBracket,
  RCurly,
  Regex,
  Semicolon,
  StringLiteral,
  With,
  Without,
} from './tokens.ts';

export class GrewParser extends CstParser {
  constructor() {
    super(allTokens, { nodeLocationTracking: 'full' });
    this.performSelfAnalysis();
  }

  public request = this.RULE('request', () => {
    this.CONSUME(Pattern);
    this.SUBRULE(this.body);
    this.MANY(() => this.SUBRULE(this.requestItem));
  });

  public requestItem = this.RULE('requestItem', () => {
    this.OR([
      { ALT: () => this.CONSUME(With) },
      { ALT: () => this.CONSUME(Without) },
    ]);
    this.SUBRULE(this.body);
  });

  public body = this.RULE('body', () => {
    this.CONSUME(LCurly);
    this.MANY(() => {
      this.SUBRULE(this.clause);
      this.OPTION(() => this.CONSUME(Semicolon));
    });
    this.CONSUME(RCurly);
  });

  public clause = this.RULE('clause', () => {
    this.CONSUME(Identifier, { LABEL: 'subject' });
    this.OR([
      { ALT: () => this.SUBRULE(this.nodeTail) },
      { ALT: () => this.SUBRULE(this.edgeTail) },
      { ALT: () => this.SUBRULE(this.orderTail) },
      { ALT: () => this.SUBRULE(this.constraintTail) },
    ]);
  });

  // X [fs] | [fs]
  public nodeTail = this.RULE('nodeTail', () => {
    this.AT_LEAST_ONE_SEP({ SEP: Pipe, DEF: () => this.SUBRULE(this.featureStructure) });
  });

  // X -> Y, X -[a|b]-> Y, X -[^a|b]-> Y
  public edgeTail = this.RULE('edgeTail', () => {
    this.SUBRULE(this.arrow);
    this.CONSUME(Identifier, { LABEL: 'target' });
  });

  public arrow = this.RULE('arrow', () => {
    this.OR([
      { ALT: () => this.CONSUME(Arrow) },
      {
        ALT: () => {
          this.CONSUME(EdgeStart);
          this.SUBRULE(this.edgeTypes);
          this.CONSUME(EdgeEnd);
        },
      },
      {
        ALT: () => {
          this.CONSUME(NegatedEdgeStart);
          this.SUBRULE2(this.edgeTypes);
          this.CONSUME2(EdgeEnd);
        },
      },
    ]);
  });

  public edgeTypes = this.RULE('edgeTypes', () => {
    this.AT_LEAST_ONE_SEP({ SEP: Pipe, DEF: () => this.SUBRULE(this.literal) });
  });

  // X < Y (immediately), X << Y
  public orderTail = this.RULE('orderTail', () => {
    this.OR([
      { ALT: () => this.CONSUME(Precedes) },
      { ALT: () => this.CONSUME(ImmediatelyPrecedes) },
    ]);
    this.CONSUME(Identifier, { LABEL: 'target' });
  });

  // X.lemma = Y.lemma
  public constraintTail = this.RULE('constraintTail', () => {
    this.CONSUME(Dot);
    this.CONSUME(Identifier, { LABEL: 'attribute' });
    this.SUBRULE(this.compare);
    this.SUBRULE(this.featureValue);
  });

  public featureStructure = this.RULE('featureStructure', () => {
    this.CONSUME(LBracket);
    this.MANY_SEP({ SEP: Comma, DEF: () => this.SUBRULE(this.feature) });
    this.CONSUME(RBracket);
  });

  // Tense | !Tense | lemma = a|b | lemma <> a|b
  public feature = this.RULE('feature', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Bang);
          this.CONSUME(Identifier, { LABEL: 'absent' });
        },
      },
      {
        ALT: () => {
          this.CONSUME2(Identifier, { LABEL: 'name' });
          this.OPTION(() => {
            this.SUBRULE(this.compare);
            this.AT_LEAST_ONE_SEP({ SEP: Pipe, DEF: () => this.SUBRULE(this.featureValue) });
          });
        },
      },
    ]);
  });

  public compare = this.RULE('compare', () => {
    this.OR([
      { ALT: () => this.CONSUME(Equals) },
      { ALT: () => this.CONSUME(NotEqual) },
    ]);
  });

  // Identifier (. Identifier)? | literal
  public featureValue = this.RULE('featureValue', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Identifier, { LABEL: 'head' });
          this.OPTION(() => {
            this.CONSUME(Dot);
            this.CONSUME2(Identifier, { LABEL: 'attribute' });
          });
        },
      },
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.CONSUME(Regex) },
      { ALT: () => this.CONSUME(Pcre) },
    ]);
  });

  public literal = this.RULE('literal', () => {
    this.OR([
      { ALT: () => this.CONSUME(Identifier) },
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.CONSUME(Regex) },
      { ALT: () => this.CONSUME(Pcre) },
    ]);
  });
}

// Chevrotain parsers are reusable: set `input` and invoke a rule.
export const grewParser = new GrewParser();
