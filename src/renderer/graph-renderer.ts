import type { GraphLayout } from './graph-types.js';
import { SELF_LOOP_LABEL_OFFSET, selfLoopPath } from './graph-layout.js';
import { SvgDocument, pathData } from './svg-generator.js';

/** Edges first so that node shapes drawn afterwards sit on top of them. */
export function drawGraphEdges<V extends string>(doc: SvgDocument, layout: GraphLayout<V>): void {
  const arrow = doc.arrowMarker();
  for (const edge of layout.edges) {
    const node = layout.nodes[edge.source];
    if (edge.self && node) {
      doc.path(selfLoopPath(node), { className: 'edge-path', markerEnd: arrow });
      if (edge.label) {
        doc.text({ x: node.x + node.width + SELF_LOOP_LABEL_OFFSET, y: node.y + node.height / 2 }, edge.label, { className: 'edge-label', anchor: 'start' });
      }
      continue;
    }
    doc.path(pathData([edge.from, edge.to]), { className: 'edge-path', markerEnd: arrow });
    if (edge.label) {
      const mid = { x: (edge.from.x + edge.to.x) / 2, y: (edge.from.y + edge.to.y) / 2 - 10 };
      doc.text(mid, edge.label, { className: 'edge-label' });
    }
  }
}
