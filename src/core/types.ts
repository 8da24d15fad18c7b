export type Severity = 'error' | 'warning' | 'info';

/** Recoverable issue categories; only an unknown diagram type is fatal (see errors.ts). */
export type DiagnosticKind = 'MalformedLine' | 'EmptyDiagram' | 'CyclicGraphLeveling';

export interface Diagnostic {
  line: number;
  column: number;
  message: string;
  severity: Severity;
  kind: DiagnosticKind;
  code: string;
  hint?: string;
  length?: number;
}

export const DIAGRAM_KINDS = ['flowchart', 'gantt', 'sequence', 'class-diagram', 'state'] as const;

export type DiagramKind = (typeof DIAGRAM_KINDS)[number];

/** Directive options as handed over by the document parser. */
export type DiagramOptions = Readonly<Record<string, string | undefined>>;

export interface ParseResult<M> {
  model: M;
  diagnostics: Diagnostic[];
}

export interface Canvas {
  width: number;
  height: number;
}

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface TitleLayout {
  text: string;
  x: number;
  y: number;
}
