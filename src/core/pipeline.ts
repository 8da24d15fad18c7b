import type { CstNode, ILexingResult, IRecognitionException, IToken } from 'chevrotain';
import type { Diagnostic } from './types.js';
import { fromLexerError, fromParserError, type LineShape } from './diagnostics.js';

export interface SourceLine {
  /** 1-based line number in the directive body. */
  number: number;
  text: string;
}

export interface LineAdapters {
  shape: LineShape;
  tokenize: (line: string) => ILexingResult;
  parse: (tokens: IToken[]) => { cst: CstNode; errors: IRecognitionException[] };
  /** Lines for which this returns true carry no statement and are skipped without a warning. */
  ignore?: (tokens: IToken[]) => boolean;
}

export interface ParsedLine {
  line: SourceLine;
  cst: CstNode;
}

/**
 * Tokenizes and parses every non-blank line on its own, so a malformed line can
 * never disturb its neighbours. Returns the CST of each accepted line in source
 * order plus one warning per rejected line.
 */
export function parseLines(text: string, adapters: LineAdapters): { lines: ParsedLine[]; diagnostics: Diagnostic[] } {
  const lines: ParsedLine[] = [];
  const diagnostics: Diagnostic[] = [];

  const rows = text.split(/\r?\n/);
  for (let i = 0; i < rows.length; i++) {
    const line: SourceLine = { number: i + 1, text: rows[i] ?? '' };
    if (!line.text.trim()) continue;

    const lex = adapters.tokenize(line.text);
    if (lex.errors.length > 0) {
      const first = lex.errors[0];
      if (first) diagnostics.push(fromLexerError(first, line.number, adapters.shape));
      continue;
    }
    if (adapters.ignore?.(lex.tokens)) continue;

    const res = adapters.parse(lex.tokens);
    const firstError = res.errors[0];
    if (firstError) {
      diagnostics.push(fromParserError(firstError, line.number, line.text, adapters.shape));
      continue;
    }
    lines.push({ line, cst: res.cst });
  }

  return { lines, diagnostics };
}
