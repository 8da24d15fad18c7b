import { describe, expect, it } from 'vitest';
import { resolveConfig } from '../src/core/config.js';
import { buildGanttModel } from '../src/renderer/gantt-builder.js';
import { layoutGantt } from '../src/renderer/gantt-layout.js';

const config = resolveConfig();

describe('gantt parser', () => {
  it('reads name, start date and duration', () => {
    const { model, diagnostics } = buildGanttModel('Task A [2024-01-01] : 5d\nTask B [2024-01-06] : 3d');
    expect(diagnostics).toEqual([]);
    expect(model.tasks).toEqual([
      { name: 'Task A', startDate: '2024-01-01', durationDays: 5 },
      { name: 'Task B', startDate: '2024-01-06', durationDays: 3 },
    ]);
  });

  it('skips a line without a date and keeps the rest', () => {
    const { model, diagnostics } = buildGanttModel('Task A [2024-01-01] : 5d\nTask B : 3d');
    expect(model.tasks.map((t) => t.name)).toEqual(['Task A']);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      line: 2,
      column: 12,
      severity: 'warning',
      kind: 'MalformedLine',
      code: 'GA-MALFORMED-LINE',
      hint: 'Expected: Task name [YYYY-MM-DD] : Nd',
    });
  });

  it('rejects impossible calendar dates', () => {
    const { model, diagnostics } = buildGanttModel('Review [2024-02-30] : 2d');
    expect(model.tasks).toEqual([]);
    expect(diagnostics[0]).toMatchObject({ line: 1, column: 9, code: 'GA-INVALID-DATE', length: 10 });
  });

  it('rejects zero-day tasks', () => {
    const { model, diagnostics } = buildGanttModel('Kickoff [2024-01-01] : 0d');
    expect(model.tasks).toEqual([]);
    expect(diagnostics[0]).toMatchObject({ code: 'GA-INVALID-DURATION', kind: 'MalformedLine' });
  });

  it('takes everything before the bracket as the name', () => {
    const { model, diagnostics } = buildGanttModel('Phase 1: Design [2024-01-01] : 5d\nReview ] notes [2024-01-06] : 2d');
    expect(diagnostics).toEqual([]);
    expect(model.tasks.map((t) => t.name)).toEqual(['Phase 1: Design', 'Review ] notes']);
  });

  it('rejects durations beyond the configured maximum', () => {
    const { model, diagnostics } = buildGanttModel('Long [2024-01-01] : 90000000d');
    expect(model.tasks).toEqual([]);
    expect(diagnostics).toEqual([
      {
        line: 1,
        column: 21,
        length: 9,
        severity: 'warning',
        kind: 'MalformedLine',
        code: 'GA-INVALID-DURATION',
        message: 'Task duration exceeds 3650 days; the line was skipped',
        hint: 'Raise gantt.maxDays to allow longer tasks',
      },
    ]);
    expect(buildGanttModel('Long [2024-01-01] : 4000d', { maxDays: 5000 }).model.tasks).toHaveLength(1);
  });

  it('keeps inner spacing of task names', () => {
    const { model } = buildGanttModel('Design  review [2024-03-01] : 2d');
    expect(model.tasks[0]?.name).toBe('Design  review');
  });

  it('accepts names that look like dates', () => {
    const { model } = buildGanttModel('2024-01-01 [2024-01-02] : 1d');
    expect(model.tasks).toEqual([{ name: '2024-01-01', startDate: '2024-01-02', durationDays: 1 }]);
  });

  it('reports diagnostics in line order', () => {
    const { diagnostics } = buildGanttModel('A [2024-13-01] : 1d\nbroken\nC [2024-01-01] : 0d');
    expect(diagnostics.map((d) => [d.line, d.code])).toEqual([
      [1, 'GA-INVALID-DATE'],
      [2, 'GA-MALFORMED-LINE'],
      [3, 'GA-INVALID-DURATION'],
    ]);
  });
});

describe('layoutGantt', () => {
  const model = buildGanttModel('Task A [2024-01-01] : 5d\nTask B [2024-01-06] : 3d').model;

  it('maps start offsets and durations onto the day grid', () => {
    const { layout } = layoutGantt(model, config);
    expect(layout.tasks.map((t) => [t.x, t.width])).toEqual([
      [0, 100],
      [100, 60],
    ]);
    expect(layout.tasks.map((t) => t.y)).toEqual([0, 40]);
  });

  it('sizes the canvas from the label column and the latest end', () => {
    const { layout } = layoutGantt(model, config);
    expect(layout.plot).toEqual({ x: 100, y: 40, width: 160, height: 80 });
    expect(layout.width).toBe(280);
    expect(layout.height).toBe(140);
  });

  it('pushes the plot down when there is a title', () => {
    const { layout } = layoutGantt(model, config, 'Plan');
    expect(layout.plot.y).toBe(80);
    expect(layout.height).toBe(180);
    expect(layout.title).toEqual({ text: 'Plan', x: 140, y: 28 });
  });

  it('places weekly ticks', () => {
    const { layout } = layoutGantt(model, config);
    expect(layout.totalDays).toBe(8);
    expect(layout.ticks).toEqual([
      { day: 0, x: 0, label: '01/01' },
      { day: 7, x: 140, label: '01/08' },
    ]);
  });

  it('widens the tick step for long spans', () => {
    const long = { tasks: [{ name: 'Long', startDate: '2024-01-01', durationDays: 3000 }] };
    const { layout } = layoutGantt(long, config);
    expect(layout.ticks).toHaveLength(54);
    expect(layout.ticks.slice(0, 2).map((t) => t.day)).toEqual([0, 56]);
  });

  it('bounds the tick count however long the span', () => {
    const huge = { tasks: [{ name: 'Huge', startDate: '2024-01-01', durationDays: 7_000_000 }] };
    const { layout } = layoutGantt(huge, config);
    expect(layout.ticks).toHaveLength(60);
    expect(layout.ticks.every((t) => t.day % 7 === 0)).toBe(true);
  });

  it('follows a configured day width', () => {
    const { layout } = layoutGantt(model, resolveConfig({ gantt: { dayWidth: 10 } }));
    expect(layout.tasks.map((t) => [t.x, t.width])).toEqual([
      [0, 50],
      [50, 30],
    ]);
  });

  it('uses the minimum canvas when there are no tasks', () => {
    const { layout, diagnostics } = layoutGantt({ tasks: [] }, config);
    expect([layout.width, layout.height]).toEqual([200, 100]);
    expect(diagnostics.map((d) => d.kind)).toEqual(['EmptyDiagram']);
  });
});
