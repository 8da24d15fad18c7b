import { describe, expect, it } from 'vitest';
import { cleanDirectiveBody, renderDirective, renderDirectives } from '../src/core/directive.js';
import { renderDiagram } from '../src/renderer/index.js';

describe('cleanDirectiveBody', () => {
  it('strips paragraph tags and surrounding whitespace', () => {
    expect(cleanDirectiveBody('<p>A -> B</p>\n<p>B -> C</p>\n')).toBe('A -> B\nB -> C');
  });
});

describe('renderDirective', () => {
  it('renders the cleaned body', () => {
    const out = renderDirective({ type: 'flowchart', body: '<p>A -> B</p>' });
    expect(out.html).toBe(renderDiagram('flowchart', 'A -> B'));
    expect(out.error).toBeUndefined();
    expect(out.diagnostics).toEqual([]);
  });

  it('passes the title option through', () => {
    const out = renderDirective({ type: 'flowchart', body: 'A -> B', options: { title: 'Flow' } });
    expect(out.result?.canvas.height).toBe(270);
    expect(out.html).toContain('class="diagram-title">Flow</text>');
  });

  it('turns an unknown type into a placeholder', () => {
    const out = renderDirective({ type: ' pie ', body: 'a: 1' });
    expect(out.result).toBeUndefined();
    expect(out.error).toContain('Unsupported diagram type "pie"');
    expect(out.html.startsWith('<div class="diagram-container diagram-error" data-diagram-id="diagram-error-')).toBe(true);
    expect(out.html).toContain('data-diagram-type="pie"');
    expect(out.html).toContain('>Diagram Error</text>');
  });
});

describe('renderDirectives', () => {
  it('renders each directive on its own', () => {
    const out = renderDirectives([
      { type: 'flowchart', body: 'A -> B' },
      { type: 'pie', body: 'a: 1' },
      { type: 'gantt', body: 'Task A [2024-01-01] : 2d' },
    ]);
    expect(out).toHaveLength(3);
    expect(out[0]?.result?.type).toBe('flowchart');
    expect(out[1]?.error).toBeDefined();
    expect(out[2]?.result?.type).toBe('gantt');
  });

  it('keeps rendering siblings of a gantt chart with an oversized task', () => {
    const [flow, gantt] = renderDirectives([
      { type: 'flowchart', body: 'A -> B' },
      { type: 'gantt', body: 'Long [2024-01-01] : 90000000d' },
    ]);
    expect(flow?.result?.type).toBe('flowchart');
    expect(gantt?.result?.diagnostics.map((d) => d.code)).toEqual(['GA-INVALID-DURATION', 'GEN-EMPTY-DIAGRAM']);
    expect(gantt?.result?.canvas).toEqual({ width: 200, height: 100 });
  });

  it('gives identical directives distinct ids', () => {
    const [a, b] = renderDirectives([
      { type: 'state', body: 'A -> B' },
      { type: 'state', body: 'A -> B' },
    ]);
    expect(a?.result?.id).toMatch(/^state-[0-9a-f]{8}$/);
    expect(a?.result?.id).not.toBe(b?.result?.id);
  });

  it('applies the shared configuration', () => {
    const [out] = renderDirectives([{ type: 'flowchart', body: 'A -> B' }], { graph: { canvasWidth: 900 } });
    expect(out?.result?.canvas.width).toBe(900);
  });
});
