import type { IToken } from 'chevrotain';
import type { Diagnostic, DiagnosticKind } from './types.js';
import { coercePos } from './diagnostics.js';

type Common = {
  hint?: string;
  length?: number;
};

export function warningAt(line: number | null | undefined, column: number | null | undefined, code: string, message: string, extra: Common = {}): Diagnostic {
  const pos = coercePos(line ?? null, column ?? null, 1, 1);
  return { line: pos.line, column: pos.column, message, severity: 'warning', kind: 'MalformedLine', code, ...extra };
}

export function warningAtToken(tok: IToken | undefined | null, line: number, code: string, message: string, extra: Common = {}): Diagnostic {
  return warningAt(line, tok?.startColumn, code, message, { length: tok?.image.length, ...extra });
}

export function infoAt(kind: DiagnosticKind, code: string, message: string, extra: Common = {}): Diagnostic {
  return { line: 1, column: 1, message, severity: 'info', kind, code, ...extra };
}
