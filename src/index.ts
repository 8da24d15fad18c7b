// Public SDK surface for programmatic use
// Core types
export type {
  Diagnostic,
  DiagnosticKind,
  DiagramKind,
  DiagramOptions,
  Severity,
  ParseResult,
  Canvas,
  Box,
  Point,
} from './core/types.js';
export { DIAGRAM_KINDS } from './core/types.js';

// Errors and configuration
export { DiagramError, UnsupportedDiagramTypeError, ConfigError, isDiagramError } from './core/errors.js';
export type { DiagramErrorKind } from './core/errors.js';
export { EngineConfigSchema, resolveConfig, DEFAULT_CONFIG } from './core/config.js';
export type { EngineConfig, EngineConfigInput, Theme } from './core/config.js';

// Dispatcher
export { DiagramRenderer, renderDiagram, parseDiagram } from './renderer/index.js';
export type { RenderOptions, RenderResult, ParsedDiagram, DiagramPipeline, LayoutResult, RenderContext } from './renderer/index.js';
export { resolveDiagramType, lookupDiagramType, kindFromPath } from './core/router.js';

// Directive adapter
export { renderDirective, renderDirectives, cleanDirectiveBody } from './core/directive.js';
export type { Directive, DirectiveResult } from './core/directive.js';

// Building blocks
export { assignLevels } from './renderer/leveling.js';
export type { LevelingResult } from './renderer/leveling.js';
export { buildFlowchartModel, createFlowchartClassifier } from './renderer/flowchart-builder.js';
export { buildStateModel, createStateClassifier } from './renderer/state-builder.js';
export { buildGanttModel } from './renderer/gantt-builder.js';
export type { GanttLimits } from './renderer/gantt-builder.js';
export { buildSequenceModel } from './renderer/sequence-builder.js';
export { buildClassModel } from './renderer/class-builder.js';
export { layoutGraph } from './renderer/graph-layout.js';
export { layoutGantt } from './renderer/gantt-layout.js';
export { layoutSequence } from './renderer/sequence-layout.js';
export { layoutClassDiagram } from './renderer/class-layout.js';
export { SvgDocument } from './renderer/svg-generator.js';
export { diagramId, embedDiagram } from './renderer/embed.js';
export { textReport, toJsonResult } from './core/format.js';

export type { FlowchartModel, FlowchartNode, FlowchartCategory } from './renderer/flowchart-types.js';
export type { StateModel, StateNode, StateTransition, StateKind } from './renderer/state-types.js';
export type { GanttModel, GanttTask, GanttLayout } from './renderer/gantt-types.js';
export type { SequenceModel, SequenceActor, SequenceMessage, SequenceLayout } from './renderer/sequence-types.js';
export type { ClassModel, ClassEntity, ClassRelationship, RelationshipKind, ClassLayout } from './renderer/class-types.js';
export type { GraphEdge, GraphLayout } from './renderer/graph-types.js';
