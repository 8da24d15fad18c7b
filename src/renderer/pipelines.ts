import type { EngineConfig } from '../core/config.js';
import { buildClassModel } from './class-builder.js';
import { layoutClassDiagram } from './class-layout.js';
import { renderClassDiagram } from './class-renderer.js';
import type { ClassLayout, ClassModel } from './class-types.js';
import { buildFlowchartModel, createFlowchartClassifier } from './flowchart-builder.js';
import { renderFlowchart } from './flowchart-renderer.js';
import type { FlowchartCategory, FlowchartModel } from './flowchart-types.js';
import { buildGanttModel } from './gantt-builder.js';
import { layoutGantt } from './gantt-layout.js';
import { renderGantt } from './gantt-renderer.js';
import type { GanttLayout, GanttModel } from './gantt-types.js';
import { layoutGraph, type GraphLayoutOptions } from './graph-layout.js';
import type { GraphLayout } from './graph-types.js';
import type { DiagramPipeline } from './interfaces.js';
import { buildSequenceModel } from './sequence-builder.js';
import { layoutSequence } from './sequence-layout.js';
import { renderSequence } from './sequence-renderer.js';
import type { SequenceLayout, SequenceModel } from './sequence-types.js';
import { buildStateModel, createStateClassifier } from './state-builder.js';
import { renderStateDiagram } from './state-renderer.js';
import type { StateKind, StateModel } from './state-types.js';

function graphOptions(config: EngineConfig, codePrefix: string, title?: string): GraphLayoutOptions {
  return { graph: config.graph, titleHeight: config.titleHeight, emptyCanvas: config.emptyCanvas, title, codePrefix };
}

export function flowchartPipeline(config: EngineConfig): DiagramPipeline<FlowchartModel, GraphLayout<FlowchartCategory>> {
  const classify = createFlowchartClassifier(config.flowchart);
  return {
    kind: 'flowchart',
    parse: (content) => buildFlowchartModel(content, classify),
    layout: (model, title) =>
      layoutGraph(
        model.nodes.map((n) => ({ id: n.id, label: n.label, variant: n.category })),
        model.edges,
        graphOptions(config, 'FL', title)
      ),
    render: renderFlowchart,
  };
}

export function statePipeline(config: EngineConfig): DiagramPipeline<StateModel, GraphLayout<StateKind>> {
  const classify = createStateClassifier(config.state);
  return {
    kind: 'state',
    parse: (content) => buildStateModel(content, classify),
    layout: (model, title) =>
      layoutGraph(
        model.states.map((s) => ({ id: s.id, label: s.label, variant: s.kind })),
        model.transitions.map((t) => ({ source: t.source, target: t.target, label: t.label || undefined })),
        graphOptions(config, 'ST', title)
      ),
    render: renderStateDiagram,
  };
}

export function ganttPipeline(config: EngineConfig): DiagramPipeline<GanttModel, GanttLayout> {
  return {
    kind: 'gantt',
    parse: (content) => buildGanttModel(content, config.gantt),
    layout: (model, title) => layoutGantt(model, config, title),
    render: renderGantt,
  };
}

export function sequencePipeline(config: EngineConfig): DiagramPipeline<SequenceModel, SequenceLayout> {
  return {
    kind: 'sequence',
    parse: buildSequenceModel,
    layout: (model, title) => layoutSequence(model, config, title),
    render: renderSequence,
  };
}

export function classPipeline(config: EngineConfig): DiagramPipeline<ClassModel, ClassLayout> {
  return {
    kind: 'class-diagram',
    parse: buildClassModel,
    layout: (model, title) => layoutClassDiagram(model, config, title),
    render: renderClassDiagram,
  };
}
