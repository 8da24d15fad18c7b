import type { GanttLayout } from './gantt-types.js';
import type { RenderContext } from './interfaces.js';
import { SvgDocument } from './svg-generator.js';
import { measureText } from './utils.js';

const BAR_LABEL_FONT_SIZE = 11;

export function renderGantt(layout: GanttLayout, ctx: RenderContext): string {
  const doc = new SvgDocument(ctx.id, layout, ctx.config.theme, layout.title?.text ?? 'Gantt chart');
  const { plot } = layout;
  doc.title(layout.title);

  for (const tick of layout.ticks) {
    const x = plot.x + tick.x;
    doc.line({ x, y: plot.y - 10 }, { x, y: plot.y + plot.height }, { className: 'gantt-grid' });
    doc.text({ x, y: plot.y - 16 }, tick.label, { className: 'gantt-tick' });
  }

  for (const task of layout.tasks) {
    const inset = (layout.rowHeight - task.height) / 2;
    const bar = { x: plot.x + task.x, y: plot.y + task.y + inset, width: task.width, height: task.height };
    const mid = bar.y + bar.height / 2;
    doc.text({ x: layout.labelX, y: mid }, task.name, { className: 'gantt-task-name', anchor: 'start' });
    doc.rect(bar, { className: 'gantt-bar', rx: 4 });
    const days = `${task.durationDays}d`;
    // duration inside the bar only when it fits
    if (measureText(days, BAR_LABEL_FONT_SIZE) + 8 <= bar.width) {
      doc.text({ x: bar.x + 4, y: mid }, days, { className: 'gantt-bar-label', anchor: 'start' });
    }
  }
  return doc.toString();
}
