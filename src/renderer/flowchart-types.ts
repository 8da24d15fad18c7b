import type { GraphEdge } from './graph-types.js';

export type FlowchartCategory = 'terminal' | 'decision' | 'process';

export interface FlowchartNode {
  id: string;
  label: string;
  category: FlowchartCategory;
}

export interface FlowchartModel {
  /** Arena of nodes in first-occurrence order; edges refer to positions in this array. */
  nodes: FlowchartNode[];
  edges: GraphEdge[];
}
