import type { ZodIssue } from 'zod';
import { DIAGRAM_KINDS } from './types.js';

export type DiagramErrorKind = 'UnsupportedDiagramType' | 'InvalidConfig';

export class DiagramError extends Error {
  readonly kind: DiagramErrorKind;

  constructor(kind: DiagramErrorKind, message: string) {
    super(message);
    this.name = 'DiagramError';
    this.kind = kind;
  }
}

export class UnsupportedDiagramTypeError extends DiagramError {
  readonly diagramType: string;

  constructor(diagramType: string) {
    super(
      'UnsupportedDiagramType',
      `Unsupported diagram type "${diagramType}". Expected one of: ${DIAGRAM_KINDS.join(', ')}`
    );
    this.name = 'UnsupportedDiagramTypeError';
    this.diagramType = diagramType;
  }
}

export class ConfigError extends DiagramError {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[], source?: string) {
    const where = source ? ` in ${source}` : '';
    const detail = issues
      .map((i) => `${i.path.length ? i.path.join('.') : '<root>'}: ${i.message}`)
      .join('; ');
    super('InvalidConfig', `Invalid diagram configuration${where}: ${detail}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function isDiagramError(e: unknown): e is DiagramError {
  return e instanceof DiagramError;
}
