import type { Box, Canvas, TitleLayout } from '../core/types.js';

export interface GanttTask {
  name: string;
  /** ISO calendar date, YYYY-MM-DD. */
  startDate: string;
  durationDays: number;
}

export interface GanttModel {
  tasks: GanttTask[];
}

/** Task bar; x/y are relative to the plot origin. */
export interface GanttLayoutTask extends Box {
  index: number;
  name: string;
  startDate: string;
  durationDays: number;
  row: number;
}

export interface GanttTick {
  /** Days after the earliest task start. */
  day: number;
  x: number;
  label: string;
}

export interface GanttLayout extends Canvas {
  title?: TitleLayout;
  /** Absolute position and size of the timeline area; task boxes are offset by plot.x/plot.y. */
  plot: Box;
  /** Left edge of the task name column. */
  labelX: number;
  rowHeight: number;
  tasks: GanttLayoutTask[];
  ticks: GanttTick[];
  totalDays: number;
}
