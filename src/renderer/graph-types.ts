import type { Box, Canvas, Point, TitleLayout } from '../core/types.js';
import type { LevelingResult } from './leveling.js';

// Shared by flowchart and state diagrams: both are leveled node/edge graphs.

export interface GraphEdge {
  source: number;
  target: number;
  label?: string;
}

export interface GraphNodeInput<V extends string> {
  id: string;
  label: string;
  variant: V;
}

export interface GraphLayoutNode<V extends string> extends Box {
  index: number;
  id: string;
  label: string;
  variant: V;
  level: number;
}

export interface GraphLayoutEdge {
  source: number;
  target: number;
  label?: string;
  from: Point;
  to: Point;
  /** Source and target are the same node; drawn as a loop beside it. */
  self: boolean;
}

export interface GraphLayout<V extends string> extends Canvas {
  title?: TitleLayout;
  nodes: GraphLayoutNode<V>[];
  edges: GraphLayoutEdge[];
  leveling: LevelingResult;
}
