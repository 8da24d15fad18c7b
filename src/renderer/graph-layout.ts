import type { GraphConfig } from '../core/config.js';
import type { Diagnostic } from '../core/types.js';
import { infoAt } from '../core/errorBuilder.js';
import { assignLevels } from './leveling.js';
import { center, clipToBox, placeTitle, titleOffset } from './geometry.js';
import type { GraphEdge, GraphLayout, GraphLayoutEdge, GraphLayoutNode, GraphNodeInput } from './graph-types.js';
import type { LayoutResult } from './interfaces.js';
import { formatNumber, measureText } from './utils.js';

export interface GraphLayoutOptions {
  graph: GraphConfig;
  titleHeight: number;
  emptyCanvas: { width: number; height: number };
  title?: string;
  /** Diagnostic code prefix, e.g. "FL" or "ST". */
  codePrefix: string;
}

/**
 * Leveled placement shared by flowcharts and state diagrams: rows by level,
 * nodes of a row centred on the canvas in insertion order.
 */
export function layoutGraph<V extends string>(
  nodes: ReadonlyArray<GraphNodeInput<V>>,
  edges: ReadonlyArray<GraphEdge>,
  opts: GraphLayoutOptions
): LayoutResult<GraphLayout<V>> {
  const g = opts.graph;
  const diagnostics: Diagnostic[] = [];
  const offset = titleOffset(opts.title, opts.titleHeight);
  const leveling = assignLevels(nodes.length, edges.map((e) => [e.source, e.target] as const));

  if (nodes.length === 0) {
    diagnostics.push(infoAt('EmptyDiagram', 'GEN-EMPTY-DIAGRAM', 'Diagram has no nodes; rendering an empty canvas'));
    const width = opts.emptyCanvas.width;
    return {
      layout: { width, height: opts.emptyCanvas.height + offset, title: placeTitle(opts.title, width, opts.titleHeight), nodes: [], edges: [], leveling },
      diagnostics,
    };
  }

  if (leveling.cyclic) {
    diagnostics.push(
      infoAt('CyclicGraphLeveling', `${opts.codePrefix}-CYCLE`, 'Graph contains a cycle; levels are best effort', {
        hint: leveling.converged ? undefined : `Leveling stopped after ${leveling.iterations} passes`,
      })
    );
  }

  const byLevel = new Map<number, number[]>();
  leveling.levels.forEach((level, i) => {
    const row = byLevel.get(level) ?? [];
    row.push(i);
    byLevel.set(level, row);
  });
  let widest = 0;
  for (const row of byLevel.values()) widest = Math.max(widest, row.length);
  const maxLevel = leveling.levels.reduce((max, level) => Math.max(max, level), 0);
  // Rows stay centred, so loop room is reserved on both sides.
  const loopRoom = selfLoopRoom(edges);
  const width = Math.max(g.canvasWidth, widest * g.columnWidth + 2 * (g.sideMargin + loopRoom));
  const height = g.topMargin + offset + maxLevel * g.levelHeight + g.nodeHeight + g.bottomMargin;

  const placed: GraphLayoutNode<V>[] = [];
  for (const [level, row] of byLevel) {
    const startX = (width - row.length * g.columnWidth) / 2;
    row.forEach((index, i) => {
      const node = nodes[index];
      if (!node) return;
      placed[index] = {
        index,
        id: node.id,
        label: node.label,
        variant: node.variant,
        level,
        x: startX + i * g.columnWidth + (g.columnWidth - g.nodeWidth) / 2,
        y: g.topMargin + offset + level * g.levelHeight,
        width: g.nodeWidth,
        height: g.nodeHeight,
      };
    });
  }

  const laidEdges: GraphLayoutEdge[] = [];
  for (const e of edges) {
    const a = placed[e.source];
    const b = placed[e.target];
    if (!a || !b) continue;
    const self = e.source === e.target;
    let from = center(a);
    let to = center(b);
    if (g.edgeAnchor === 'boundary' && !self) {
      from = clipToBox(a, center(b));
      to = clipToBox(b, center(a));
    }
    laidEdges.push({ source: e.source, target: e.target, label: e.label, from, to, self });
  }

  return {
    layout: { width, height, title: placeTitle(opts.title, width, opts.titleHeight), nodes: placed, edges: laidEdges, leveling },
    diagnostics,
  };
}

export const SELF_LOOP_REACH = 40;
export const SELF_LOOP_LABEL_OFFSET = 34;
const EDGE_LABEL_FONT_SIZE = 11;

/** Horizontal space a self loop and its label need to the right of the node. */
function selfLoopRoom(edges: ReadonlyArray<GraphEdge>): number {
  let room = 0;
  for (const e of edges) {
    if (e.source !== e.target) continue;
    const label = e.label ? SELF_LOOP_LABEL_OFFSET + measureText(e.label, EDGE_LABEL_FONT_SIZE) : 0;
    room = Math.max(room, SELF_LOOP_REACH, label);
  }
  return room;
}

/** Loop drawn off the right side of a node for self edges. */
export function selfLoopPath(node: { x: number; y: number; width: number; height: number }, reach = SELF_LOOP_REACH): string {
  const right = node.x + node.width;
  const cy = node.y + node.height / 2;
  const f = formatNumber;
  return `M ${f(right)} ${f(cy - 10)} C ${f(right + reach)} ${f(cy - 30)}, ${f(right + reach)} ${f(cy + 30)}, ${f(right)} ${f(cy + 10)}`;
}
