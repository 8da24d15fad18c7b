import type { ClassLayout } from './class-types.js';
import { center } from './geometry.js';
import type { RenderContext } from './interfaces.js';
import { SvgDocument, pathData } from './svg-generator.js';

export function renderClassDiagram(layout: ClassLayout, ctx: RenderContext): string {
  const doc = new SvgDocument(ctx.id, layout, ctx.config.theme, layout.title?.text ?? 'Class diagram');
  doc.title(layout.title);

  for (const rel of layout.relationships) {
    const marker = doc.diamondMarker(rel.kind === 'composition');
    const style = { className: `class-relationship ${rel.kind}`, markerStart: marker };
    if (rel.self) {
      const reach = 40;
      doc.path(
        pathData([rel.from, { x: rel.from.x + reach, y: rel.from.y }, { x: rel.to.x + reach, y: rel.to.y }, rel.to]),
        style
      );
      continue;
    }
    doc.path(pathData([rel.from, rel.to]), style);
  }

  for (const e of layout.entities) {
    doc.rect(e, { className: 'class-entity', rx: 4 });
    doc.text(center(e), e.name, { className: 'class-entity-name' });
  }
  return doc.toString();
}
