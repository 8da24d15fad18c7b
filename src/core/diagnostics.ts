import type { ILexingError, IRecognitionException } from 'chevrotain';
import type { Diagnostic } from './types.js';
import { warningAt } from './errorBuilder.js';

export function coercePos(line?: number | null, column?: number | null, fallbackLine = 1, fallbackColumn = 1) {
  const ln = typeof line === 'number' && Number.isFinite(line) && line > 0 ? line : fallbackLine;
  const col = typeof column === 'number' && Number.isFinite(column) && column > 0 ? column : fallbackColumn;
  return { line: ln, column: col };
}

export function codeFrame(
  text: string,
  line: number,
  column: number,
  length = 1,
  contextLines = 1
): string {
  const lines = text.split(/\r?\n/);
  const idx = Math.max(0, Math.min(lines.length - 1, line - 1));
  const start = Math.max(0, idx - contextLines);
  const end = Math.min(lines.length - 1, idx + contextLines);
  const numWidth = String(end + 1).length;

  const parts: string[] = [];
  for (let i = start; i <= end; i++) {
    const lno = String(i + 1).padStart(numWidth, ' ');
    parts.push(`${lno} | ${lines[i] ?? ''}`);
    if (i === idx) {
      const caretPad = ' '.repeat(Math.max(0, column - 1));
      const marker = '^'.repeat(Math.max(1, Math.min(length, (lines[i] ?? '').length - column + 1)));
      parts.push(`${' '.repeat(numWidth)} | ${caretPad}${marker}`);
    }
  }
  return parts.join('\n');
}

export interface LineShape {
  /** Diagnostic code used for every malformed line of this diagram kind. */
  code: string;
  /** Human readable diagram kind, e.g. "gantt". */
  label: string;
  /** The accepted line shape, shown as a hint. */
  expected: string;
}

// Tokens carry positions relative to the single line they were lexed from.
export function fromLexerError(e: ILexingError, line: number, shape: LineShape): Diagnostic {
  return warningAt(line, e.column, shape.code, `Unexpected character in ${shape.label} line; the line was skipped`, {
    hint: `Expected: ${shape.expected}`,
    length: Math.max(1, e.length),
  });
}

export function fromParserError(err: IRecognitionException, line: number, lineText: string, shape: LineShape): Diagnostic {
  const tok = err.token;
  // chevrotain reports EOF with NaN positions; point just past the line end instead
  const column = Number.isFinite(tok.startColumn) ? tok.startColumn : lineText.trimEnd().length + 1;
  const found = tok.image ? `"${tok.image.trim()}"` : 'end of line';
  return warningAt(line, column, shape.code, `Malformed ${shape.label} line near ${found}; the line was skipped`, {
    hint: `Expected: ${shape.expected}`,
    length: Math.max(1, tok.image.length),
  });
}
