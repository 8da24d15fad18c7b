import type { EngineConfig } from '../core/config.js';
import { infoAt } from '../core/errorBuilder.js';
import { center, clipToBox, placeTitle, titleOffset } from './geometry.js';
import type { ClassLayout, ClassLayoutEntity, ClassLayoutRelationship, ClassModel } from './class-types.js';
import type { LayoutResult } from './interfaces.js';

/** Square-ish grid in registration order; relationship ends stop at the box borders. */
export function layoutClassDiagram(model: ClassModel, config: EngineConfig, title?: string): LayoutResult<ClassLayout> {
  const c = config.class;
  const offset = titleOffset(title, config.titleHeight);
  const n = model.entities.length;

  if (n === 0) {
    const width = config.emptyCanvas.width;
    return {
      layout: { width, height: config.emptyCanvas.height + offset, title: placeTitle(title, width, config.titleHeight), columns: 0, rows: 0, entities: [], relationships: [] },
      diagnostics: [infoAt('EmptyDiagram', 'GEN-EMPTY-DIAGRAM', 'Class diagram has no entities; rendering an empty canvas')],
    };
  }

  const columns = Math.ceil(Math.sqrt(n));
  const rows = Math.ceil(n / columns);
  const entities: ClassLayoutEntity[] = model.entities.map((e, index) => {
    const column = index % columns;
    const row = Math.floor(index / columns);
    return {
      index,
      name: e.name,
      column,
      row,
      x: c.margin + column * c.cellWidth + (c.cellWidth - c.boxWidth) / 2,
      y: offset + c.margin + row * c.cellHeight + (c.cellHeight - c.boxHeight) / 2,
      width: c.boxWidth,
      height: c.boxHeight,
    };
  });

  const relationships: ClassLayoutRelationship[] = [];
  for (const r of model.relationships) {
    const owner = entities[r.owner];
    const member = entities[r.member];
    if (!owner || !member) continue;
    if (r.owner === r.member) {
      const right = owner.x + owner.width;
      relationships.push({ ...r, from: { x: right, y: owner.y + 15 }, to: { x: right, y: owner.y + owner.height - 15 }, self: true });
      continue;
    }
    relationships.push({
      ...r,
      from: clipToBox(owner, center(member)),
      to: clipToBox(member, center(owner)),
      self: false,
    });
  }

  const width = 2 * c.margin + columns * c.cellWidth;
  return {
    layout: {
      width,
      height: offset + 2 * c.margin + rows * c.cellHeight,
      title: placeTitle(title, width, config.titleHeight),
      columns,
      rows,
      entities,
      relationships,
    },
    diagnostics: [],
  };
}
