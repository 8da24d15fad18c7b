import { CstParser, type IToken } from 'chevrotain';
import * as t from './lexer.js';

/** One message line: `Actor -> Actor: text`; the text may be empty. */
export class SequenceParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  public message = this.RULE('message', () => {
    this.CONSUME(t.ActorName);
    this.CONSUME(t.Arrow);
    this.CONSUME2(t.ActorName);
    this.CONSUME(t.Colon);
    this.OPTION(() => this.CONSUME(t.MessageText));
  });
}

export const parserInstance = new SequenceParser();

export function parse(tokens: IToken[]) {
  parserInstance.input = tokens;
  const cst = parserInstance.message();
  return { cst, errors: parserInstance.errors };
}
