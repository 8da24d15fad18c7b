import { UnsupportedDiagramTypeError } from './errors.js';
import { DIAGRAM_KINDS, type DiagramKind } from './types.js';

const ALIASES: Readonly<Record<string, DiagramKind>> = {
  class: 'class-diagram',
};

export function isDiagramKind(value: string): value is DiagramKind {
  return (DIAGRAM_KINDS as readonly string[]).includes(value);
}

/** Trims and lowercases a directive type name; returns undefined when it names no known kind. */
export function lookupDiagramType(raw: string): DiagramKind | undefined {
  const key = raw.trim().toLowerCase();
  if (isDiagramKind(key)) return key;
  return ALIASES[key];
}

export function resolveDiagramType(raw: string): DiagramKind {
  const kind = lookupDiagramType(raw);
  if (!kind) throw new UnsupportedDiagramTypeError(raw);
  return kind;
}

const EXTENSIONS: Readonly<Record<string, DiagramKind>> = {
  '.flowchart': 'flowchart',
  '.gantt': 'gantt',
  '.sequence': 'sequence',
  '.class': 'class-diagram',
  '.state': 'state',
};

export const SOURCE_EXTENSIONS = Object.keys(EXTENSIONS);

export function kindFromPath(file: string): DiagramKind | undefined {
  const dot = file.lastIndexOf('.');
  if (dot < 0) return undefined;
  return EXTENSIONS[file.slice(dot).toLowerCase()];
}
