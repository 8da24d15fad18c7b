import { resolveConfig, type EngineConfig, type EngineConfigInput } from '../core/config.js';
import { resolveDiagramType } from '../core/router.js';
import type { Canvas, Diagnostic, DiagramKind } from '../core/types.js';
import type { ClassModel } from './class-types.js';
import { diagramId, embedDiagram } from './embed.js';
import type { FlowchartModel } from './flowchart-types.js';
import type { GanttModel } from './gantt-types.js';
import type { DiagramPipeline, RenderContext } from './interfaces.js';
import { classPipeline, flowchartPipeline, ganttPipeline, sequencePipeline, statePipeline } from './pipelines.js';
import type { SequenceModel } from './sequence-types.js';
import type { StateModel } from './state-types.js';

export interface RenderOptions {
  /** Display title centred above the diagram. Blank titles are ignored. */
  title?: string;
  /** Position of this diagram among identical ones on a page; feeds the diagram id. */
  occurrence?: number;
}

export interface RenderResult {
  id: string;
  type: DiagramKind;
  /** Container fragment ready to be injected into a page. */
  html: string;
  svg: string;
  canvas: Canvas;
  diagnostics: Diagnostic[];
}

export type ParsedDiagram =
  | { kind: 'flowchart'; model: FlowchartModel; diagnostics: Diagnostic[] }
  | { kind: 'gantt'; model: GanttModel; diagnostics: Diagnostic[] }
  | { kind: 'sequence'; model: SequenceModel; diagnostics: Diagnostic[] }
  | { kind: 'class-diagram'; model: ClassModel; diagnostics: Diagnostic[] }
  | { kind: 'state'; model: StateModel; diagnostics: Diagnostic[] };

interface PipelineOutput {
  svg: string;
  canvas: Canvas;
  diagnostics: Diagnostic[];
}

function run<M, L extends Canvas>(pipeline: DiagramPipeline<M, L>, content: string, title: string | undefined, ctx: RenderContext): PipelineOutput {
  const parsed = pipeline.parse(content);
  const laid = pipeline.layout(parsed.model, title);
  return {
    svg: pipeline.render(laid.layout, ctx),
    canvas: { width: laid.layout.width, height: laid.layout.height },
    diagnostics: [...parsed.diagnostics, ...laid.diagnostics],
  };
}

function unreachable(kind: never): never {
  throw new Error(`Unhandled diagram kind: ${String(kind)}`);
}

/**
 * Dispatches a directive to the parse/layout/render trio of its kind.
 * Holds only immutable configuration; every call is independent.
 */
export class DiagramRenderer {
  readonly config: EngineConfig;
  private readonly flowchart: ReturnType<typeof flowchartPipeline>;
  private readonly gantt: ReturnType<typeof ganttPipeline>;
  private readonly sequence: ReturnType<typeof sequencePipeline>;
  private readonly classDiagram: ReturnType<typeof classPipeline>;
  private readonly state: ReturnType<typeof statePipeline>;

  constructor(config: EngineConfigInput = {}) {
    this.config = resolveConfig(config);
    this.flowchart = flowchartPipeline(this.config);
    this.gantt = ganttPipeline(this.config);
    this.sequence = sequencePipeline(this.config);
    this.classDiagram = classPipeline(this.config);
    this.state = statePipeline(this.config);
  }

  /**
   * Renders one diagram. Throws UnsupportedDiagramTypeError for an unknown
   * type; every other problem comes back as a diagnostic.
   */
  render(type: string, content: string, options: RenderOptions = {}): RenderResult {
    const kind = resolveDiagramType(type);
    const title = options.title?.trim() || undefined;
    const id = diagramId(kind, content, title, options.occurrence);
    const ctx: RenderContext = { id, config: this.config };

    let out: PipelineOutput;
    switch (kind) {
      case 'flowchart':
        out = run(this.flowchart, content, title, ctx);
        break;
      case 'gantt':
        out = run(this.gantt, content, title, ctx);
        break;
      case 'sequence':
        out = run(this.sequence, content, title, ctx);
        break;
      case 'class-diagram':
        out = run(this.classDiagram, content, title, ctx);
        break;
      case 'state':
        out = run(this.state, content, title, ctx);
        break;
      default:
        return unreachable(kind);
    }

    return { id, type: kind, html: embedDiagram(id, kind, out.svg), ...out };
  }

  parse(type: string, content: string): ParsedDiagram {
    const kind = resolveDiagramType(type);
    switch (kind) {
      case 'flowchart':
        return { kind, ...this.flowchart.parse(content) };
      case 'gantt':
        return { kind, ...this.gantt.parse(content) };
      case 'sequence':
        return { kind, ...this.sequence.parse(content) };
      case 'class-diagram':
        return { kind, ...this.classDiagram.parse(content) };
      case 'state':
        return { kind, ...this.state.parse(content) };
      default:
        return unreachable(kind);
    }
  }
}

let defaultRenderer: DiagramRenderer | undefined;

function rendererFor(config?: EngineConfigInput): DiagramRenderer {
  if (config) return new DiagramRenderer(config);
  defaultRenderer ??= new DiagramRenderer();
  return defaultRenderer;
}

/** Renders a diagram directive to its HTML fragment. */
export function renderDiagram(type: string, content: string, options: RenderOptions = {}, config?: EngineConfigInput): string {
  return rendererFor(config).render(type, content, options).html;
}

export function parseDiagram(type: string, content: string, config?: EngineConfigInput): ParsedDiagram {
  return rendererFor(config).parse(type, content);
}

export type { DiagramPipeline, LayoutResult, RenderContext } from './interfaces.js';
