import { center } from './geometry.js';
import { drawGraphEdges } from './graph-renderer.js';
import type { GraphLayout } from './graph-types.js';
import type { RenderContext } from './interfaces.js';
import type { StateKind } from './state-types.js';
import { SvgDocument } from './svg-generator.js';

export function renderStateDiagram(layout: GraphLayout<StateKind>, ctx: RenderContext): string {
  const doc = new SvgDocument(ctx.id, layout, ctx.config.theme, layout.title?.text ?? 'State diagram');
  doc.title(layout.title);
  drawGraphEdges(doc, layout);
  for (const node of layout.nodes) {
    const c = center(node);
    switch (node.variant) {
      case 'initial':
        doc.circle(c, 10, 'state-initial');
        doc.text({ x: c.x, y: node.y + node.height + 12 }, node.label, { className: 'edge-label' });
        break;
      case 'final':
        doc.circle(c, 12, 'state-final-ring');
        doc.circle(c, 8, 'state-final-dot');
        doc.text({ x: c.x, y: node.y + node.height + 12 }, node.label, { className: 'edge-label' });
        break;
      case 'normal':
        doc.rect(node, { className: 'state-normal', rx: 25 });
        doc.text(c, node.label, { className: 'diagram-label' });
        break;
    }
  }
  return doc.toString();
}
