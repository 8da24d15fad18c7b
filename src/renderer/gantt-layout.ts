import { addDays, differenceInCalendarDays, format, parseISO } from 'date-fns';
import type { EngineConfig } from '../core/config.js';
import { infoAt } from '../core/errorBuilder.js';
import { placeTitle, titleOffset } from './geometry.js';
import type { GanttLayout, GanttLayoutTask, GanttModel, GanttTick } from './gantt-types.js';
import type { LayoutResult } from './interfaces.js';
import { measureText } from './utils.js';

export const TASK_NAME_FONT_SIZE = 12;

/**
 * Maps tasks onto a day grid. Task boxes are relative to the plot origin:
 * `x = days since the earliest start × dayWidth`, `y = row × rowHeight`.
 */
export function layoutGantt(model: GanttModel, config: EngineConfig, title?: string): LayoutResult<GanttLayout> {
  const g = config.gantt;
  const offset = titleOffset(title, config.titleHeight);

  if (model.tasks.length === 0) {
    const width = config.emptyCanvas.width;
    return {
      layout: {
        width,
        height: config.emptyCanvas.height + offset,
        title: placeTitle(title, width, config.titleHeight),
        plot: { x: 0, y: offset, width: 0, height: 0 },
        labelX: 0,
        rowHeight: g.rowHeight,
        tasks: [],
        ticks: [],
        totalDays: 0,
      },
      diagnostics: [infoAt('EmptyDiagram', 'GEN-EMPTY-DIAGRAM', 'Gantt chart has no tasks; rendering an empty canvas')],
    };
  }

  const starts = model.tasks.map((t) => parseISO(t.startDate));
  const minStart = starts.reduce((min, d) => (d < min ? d : min));

  let totalDays = 0;
  const tasks: GanttLayoutTask[] = model.tasks.map((task, row) => {
    const start = starts[row] ?? minStart;
    const dayOffset = differenceInCalendarDays(start, minStart);
    totalDays = Math.max(totalDays, dayOffset + task.durationDays);
    return {
      index: row,
      row,
      name: task.name,
      startDate: task.startDate,
      durationDays: task.durationDays,
      x: dayOffset * g.dayWidth,
      y: row * g.rowHeight,
      width: task.durationDays * g.dayWidth,
      height: g.barHeight,
    };
  });

  // Wide spans keep the weekly rhythm but skip weeks so the axis stays bounded.
  const step = g.tickDays * Math.max(1, Math.ceil(totalDays / (g.tickDays * g.maxTicks)));
  const ticks: GanttTick[] = [];
  for (let day = 0; day <= totalDays; day += step) {
    ticks.push({ day, x: day * g.dayWidth, label: format(addDays(minStart, day), 'MM/dd') });
  }

  const nameWidth = model.tasks.reduce((max, t) => Math.max(max, measureText(t.name, TASK_NAME_FONT_SIZE)), 0);
  const labelColumn = Math.max(g.minLabelWidth, nameWidth + g.labelPadding);
  const plotX = g.margin + labelColumn;
  const plotY = offset + g.headerHeight;
  const plotWidth = tasks.reduce((max, t) => Math.max(max, t.x + t.width), 0);
  const plotHeight = tasks.length * g.rowHeight;
  const width = plotX + plotWidth + g.margin;

  return {
    layout: {
      width,
      height: plotY + plotHeight + g.margin,
      title: placeTitle(title, width, config.titleHeight),
      plot: { x: plotX, y: plotY, width: plotWidth, height: plotHeight },
      labelX: g.margin,
      rowHeight: g.rowHeight,
      tasks,
      ticks,
      totalDays,
    },
    diagnostics: [],
  };
}
