import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig } from '../src/core/config.js';
import { ConfigError } from '../src/core/errors.js';
import { DiagramRenderer } from '../src/renderer/index.js';

describe('resolveConfig', () => {
  it('fills in every default', () => {
    const cfg = resolveConfig();
    expect(cfg.graph.canvasWidth).toBe(800);
    expect(cfg.graph.edgeAnchor).toBe('center');
    expect(cfg.gantt.dayWidth).toBe(20);
    expect(cfg.sequence.laneSpacing).toBe(150);
    expect(cfg.flowchart.terminalKeywords).toEqual(['start', 'end']);
    expect(cfg.theme.terminal).toEqual({ fill: '#d1fae5', stroke: '#059669' });
    expect(cfg).toEqual(DEFAULT_CONFIG);
  });

  it('merges a partial override with the defaults', () => {
    const cfg = resolveConfig({ gantt: { dayWidth: 10 }, theme: { decision: { fill: '#ffffff' } } });
    expect(cfg.gantt.dayWidth).toBe(10);
    expect(cfg.gantt.rowHeight).toBe(40);
    expect(cfg.theme.decision).toEqual({ fill: '#ffffff', stroke: '#d97706' });
  });

  it('names the offending path', () => {
    expect(() => resolveConfig({ gantt: { dayWidth: -1 } })).toThrow(ConfigError);
    expect(() => resolveConfig({ gantt: { dayWidth: -1 } })).toThrow(/gantt\.dayWidth/);
  });

  it('rejects unknown keys', () => {
    expect(() => resolveConfig({ colour: 'red' })).toThrow(ConfigError);
  });

  it('keeps nodes inside their column', () => {
    expect(() => resolveConfig({ graph: { nodeWidth: 200 } }, 'diagrams.json')).toThrow(
      'Invalid diagram configuration in diagrams.json: graph.nodeWidth: must not exceed graph.columnWidth'
    );
  });

  it('keeps class boxes inside their cell', () => {
    expect(() => resolveConfig({ class: { boxHeight: 200 } })).toThrow(/entity box must fit/);
  });

  it('is applied by the renderer', () => {
    expect(() => new DiagramRenderer({ sequence: { laneSpacing: 0 } })).toThrow(ConfigError);
    const wide = new DiagramRenderer({ graph: { canvasWidth: 1000 } });
    expect(wide.render('flowchart', 'A -> B').canvas.width).toBe(1000);
  });
});
