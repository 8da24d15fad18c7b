import { CstParser, type IToken } from 'chevrotain';
import * as t from './lexer.js';

/** One relationship line: `A |+| B` or `A |o| B`. */
export class ClassParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  public relationship = this.RULE('relationship', () => {
    this.CONSUME(t.EntityName);
    this.OR([
      { ALT: () => this.CONSUME(t.Composition) },
      { ALT: () => this.CONSUME(t.Aggregation) },
    ]);
    this.CONSUME2(t.EntityName);
  });
}

export const parserInstance = new ClassParser();

export function parse(tokens: IToken[]) {
  parserInstance.input = tokens;
  const cst = parserInstance.relationship();
  return { cst, errors: parserInstance.errors };
}
