import type { RenderContext } from './interfaces.js';
import type { SequenceLayout } from './sequence-types.js';
import { SvgDocument, pathData } from './svg-generator.js';

export function renderSequence(layout: SequenceLayout, ctx: RenderContext): string {
  const doc = new SvgDocument(ctx.id, layout, ctx.config.theme, layout.title?.text ?? 'Sequence diagram');
  const loop = ctx.config.sequence.selfLoopWidth;
  doc.title(layout.title);

  for (const l of layout.lifelines) {
    doc.line({ x: l.x, y: l.y1 }, { x: l.x, y: l.y2 }, { className: 'seq-lifeline' });
  }

  const arrow = doc.arrowMarker();
  for (const m of layout.messages) {
    if (m.self) {
      const d = pathData([
        { x: m.x1, y: m.y - 10 },
        { x: m.x1 + loop, y: m.y - 10 },
        { x: m.x1 + loop, y: m.y + 10 },
        { x: m.x1, y: m.y + 10 },
      ]);
      doc.path(d, { className: 'edge-path', markerEnd: arrow });
      if (m.text) doc.text({ x: m.x1 + loop / 2, y: m.y - 16 }, m.text, { className: 'edge-label' });
      continue;
    }
    doc.line({ x: m.x1, y: m.y }, { x: m.x2, y: m.y }, { className: 'edge-path', markerEnd: arrow });
    if (m.text) doc.text({ x: (m.x1 + m.x2) / 2, y: m.y - 8 }, m.text, { className: 'edge-label' });
  }

  for (const a of layout.actors) {
    doc.rect(a, { className: 'seq-actor', rx: 8 });
    doc.text({ x: a.centerX, y: a.y + a.height / 2 }, a.name, { className: 'diagram-label' });
  }
  return doc.toString();
}
