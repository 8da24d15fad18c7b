import { CstParser, type IToken } from 'chevrotain';
import * as t from './lexer.js';

/** One state line: `Text (-> Text)+ [: event]`. */
export class StateParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  public transitions = this.RULE('transitions', () => {
    this.CONSUME(t.Text);
    this.AT_LEAST_ONE(() => {
      this.CONSUME(t.Arrow);
      this.CONSUME2(t.Text);
    });
    this.OPTION(() => {
      this.CONSUME(t.Colon);
      this.OPTION2(() => this.CONSUME(t.LabelText));
    });
  });
}

export const parserInstance = new StateParser();

export function parse(tokens: IToken[]) {
  parserInstance.input = tokens;
  const cst = parserInstance.transitions();
  return { cst, errors: parserInstance.errors };
}
