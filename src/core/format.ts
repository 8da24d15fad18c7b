import type { Diagnostic } from './types.js';
import { codeFrame } from './diagnostics.js';

export type OutputFormat = 'html' | 'svg' | 'json';

export function groupDiagnostics(diagnostics: Diagnostic[]) {
  const warns = diagnostics.filter((d) => d.severity === 'warning' || d.severity === 'error');
  const infos = diagnostics.filter((d) => d.severity === 'info');
  return { warns, infos };
}

/** Human readable report with a code frame under each warning. Returns '' when there is nothing to say. */
export function textReport(filename: string, content: string, diagnostics: Diagnostic[]): string {
  const { warns, infos } = groupDiagnostics(diagnostics);
  const lines: string[] = [];

  for (const d of warns) {
    const label = d.severity === 'error' ? '\x1b[31merror\x1b[0m' : '\x1b[33mwarning\x1b[0m';
    lines.push(`${label}[${d.code}]: ${d.message}`);
    lines.push(`at ${filename}:${d.line}:${d.column}`);
    for (const row of codeFrame(content, d.line, d.column, d.length ?? 1).split('\n')) lines.push(`  ${row}`);
    if (d.hint) lines.push(`hint: ${d.hint}`);
    lines.push('');
  }
  for (const d of infos) {
    lines.push(`\x1b[36minfo\x1b[0m[${d.code}]: ${d.message} (${filename})`);
  }
  return lines.join('\n').trimEnd();
}

export function toJsonResult(filename: string, result: { id: string; type: string; canvas: { width: number; height: number }; diagnostics: Diagnostic[] }) {
  const { warns, infos } = groupDiagnostics(result.diagnostics);
  return {
    file: filename,
    id: result.id,
    type: result.type,
    width: result.canvas.width,
    height: result.canvas.height,
    warningCount: warns.length,
    warnings: warns,
    infos,
  };
}
