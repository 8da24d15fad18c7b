import type { FlowchartCategory } from './flowchart-types.js';
import { center } from './geometry.js';
import { drawGraphEdges } from './graph-renderer.js';
import type { GraphLayout } from './graph-types.js';
import type { RenderContext } from './interfaces.js';
import { SvgDocument } from './svg-generator.js';

const CORNER: Record<FlowchartCategory, number> = { terminal: 25, decision: 8, process: 8 };

export function renderFlowchart(layout: GraphLayout<FlowchartCategory>, ctx: RenderContext): string {
  const doc = new SvgDocument(ctx.id, layout, ctx.config.theme, layout.title?.text ?? 'Flowchart');
  doc.title(layout.title);
  drawGraphEdges(doc, layout);
  for (const node of layout.nodes) {
    doc.rect(node, { className: `node-${node.variant}`, rx: CORNER[node.variant] });
    doc.text(center(node), node.label, { className: 'diagram-label' });
  }
  return doc.toString();
}
