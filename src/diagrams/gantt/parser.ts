import { CstParser, type IToken } from 'chevrotain';
import * as t from './lexer.js';

/** One task line: `Name [YYYY-MM-DD] : Nd`. */
export class GanttParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  public task = this.RULE('task', () => {
    this.CONSUME(t.TaskName);
    this.CONSUME(t.LBracket);
    this.CONSUME(t.IsoDate);
    this.CONSUME(t.RBracket);
    this.CONSUME(t.Colon);
    this.CONSUME(t.Duration);
  });
}

export const parserInstance = new GanttParser();

export function parse(tokens: IToken[]) {
  parserInstance.input = tokens;
  const cst = parserInstance.task();
  return { cst, errors: parserInstance.errors };
}
