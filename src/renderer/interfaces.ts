import type { EngineConfig } from '../core/config.js';
import type { Canvas, Diagnostic, DiagramKind, ParseResult } from '../core/types.js';

export interface LayoutResult<L extends Canvas> {
  layout: L;
  diagnostics: Diagnostic[];
}

export interface RenderContext {
  /** Diagram id; scopes marker ids and CSS. */
  id: string;
  config: EngineConfig;
}

/**
 * One parse/layout/render trio per diagram kind. The dispatcher only sees
 * this shape; kind-specific model and layout types stay behind it.
 */
export interface DiagramPipeline<M, L extends Canvas> {
  readonly kind: DiagramKind;
  parse(content: string): ParseResult<M>;
  layout(model: M, title?: string): LayoutResult<L>;
  render(layout: L, ctx: RenderContext): string;
}
