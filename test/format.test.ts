import { describe, expect, it } from 'vitest';
import { textReport, toJsonResult } from '../src/core/format.js';
import { DiagramRenderer } from '../src/renderer/index.js';

const renderer = new DiagramRenderer();
const source = 'Task A [2024-01-01] : 5d\nTask B : 3d';

describe('textReport', () => {
  it('points at the offending token with a code frame', () => {
    const res = renderer.render('gantt', source);
    const report = textReport('doc.gantt', source, res.diagnostics).split('\n');
    expect(report[0]).toContain('[GA-MALFORMED-LINE]: Malformed gantt line near end of line; the line was skipped');
    expect(report[1]).toBe('at doc.gantt:2:12');
    expect(report[2]).toBe('  1 | Task A [2024-01-01] : 5d');
    expect(report[3]).toBe('  2 | Task B : 3d');
    expect(report[4]).toBe('    |            ^');
    expect(report[5]).toBe('hint: Expected: Task name [YYYY-MM-DD] : Nd');
  });

  it('lists infos after warnings', () => {
    const res = renderer.render('flowchart', 'A -> B -> A');
    const report = textReport('loop.flowchart', 'A -> B -> A', res.diagnostics);
    expect(report).toContain('[FL-CYCLE]');
    expect(report.endsWith('(loop.flowchart)')).toBe(true);
  });

  it('is empty without diagnostics', () => {
    expect(textReport('ok.flowchart', 'A -> B', [])).toBe('');
  });
});

describe('toJsonResult', () => {
  it('summarises a render', () => {
    const res = renderer.render('gantt', source);
    const json = toJsonResult('doc.gantt', res);
    expect(json).toMatchObject({ file: 'doc.gantt', id: res.id, type: 'gantt', warningCount: 1, infos: [] });
    expect(json.width).toBe(res.canvas.width);
    expect(json.warnings[0]?.line).toBe(2);
  });
});
