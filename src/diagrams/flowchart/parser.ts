import { CstParser, type IToken } from 'chevrotain';
import * as t from './lexer.js';

/** One flowchart line: `Text (-> Text)+`. */
export class FlowchartParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  public chain = this.RULE('chain', () => {
    this.CONSUME(t.Text);
    this.AT_LEAST_ONE(() => {
      this.CONSUME(t.Arrow);
      this.CONSUME2(t.Text);
    });
  });
}

export const parserInstance = new FlowchartParser();

export function parse(tokens: IToken[]) {
  parserInstance.input = tokens;
  const cst = parserInstance.chain();
  return { cst, errors: parserInstance.errors };
}
