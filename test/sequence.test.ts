import { describe, expect, it } from 'vitest';
import { resolveConfig } from '../src/core/config.js';
import { buildSequenceModel } from '../src/renderer/sequence-builder.js';
import { layoutSequence } from '../src/renderer/sequence-layout.js';

const config = resolveConfig();

describe('sequence parser', () => {
  it('assigns lanes by first appearance', () => {
    const { model, diagnostics } = buildSequenceModel('Alice -> Bob: Hello\nBob -> Alice: Hi');
    expect(diagnostics).toEqual([]);
    expect(model.actors).toEqual([
      { name: 'Alice', lane: 0 },
      { name: 'Bob', lane: 1 },
    ]);
    expect(model.messages).toEqual([
      { from: 0, to: 1, text: 'Hello', index: 0 },
      { from: 1, to: 0, text: 'Hi', index: 1 },
    ]);
  });

  it('takes everything after the first colon as the message', () => {
    const { model } = buildSequenceModel('Client -> Server: GET /a: b');
    expect(model.messages[0]?.text).toBe('GET /a: b');
  });

  it('allows an empty message', () => {
    const { model } = buildSequenceModel('A -> B:');
    expect(model.messages[0]?.text).toBe('');
  });

  it('warns about a line without a colon', () => {
    const { model, diagnostics } = buildSequenceModel('A -> B\nA -> C: ok');
    expect(model.actors.map((a) => a.name)).toEqual(['A', 'C']);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({ line: 1, column: 7, code: 'SQ-MALFORMED-LINE' });
  });

  it('warns about a line without an arrow', () => {
    const { diagnostics } = buildSequenceModel('Alice: hello');
    expect(diagnostics[0]).toMatchObject({ line: 1, column: 6, code: 'SQ-MALFORMED-LINE' });
  });
});

describe('layoutSequence', () => {
  it('orders messages top to bottom', () => {
    const { model } = buildSequenceModel('Alice -> Bob: Hello\nBob -> Alice: Hi');
    const { layout } = layoutSequence(model, config);
    expect(layout.actors.map((a) => [a.x, a.centerX])).toEqual([
      [40, 90],
      [190, 240],
    ]);
    const [first, second] = layout.messages;
    expect(first?.y).toBe(110);
    expect(second?.y).toBe(160);
    expect(first && second && second.y > first.y).toBe(true);
    expect([first?.x1, first?.x2]).toEqual([90, 240]);
  });

  it('runs lifelines below the last message', () => {
    const { model } = buildSequenceModel('Alice -> Bob: Hello\nBob -> Alice: Hi');
    const { layout } = layoutSequence(model, config);
    expect(layout.lifelines).toEqual([
      { x: 90, y1: 70, y2: 200 },
      { x: 240, y1: 70, y2: 200 },
    ]);
    expect([layout.width, layout.height]).toEqual([330, 230]);
  });

  it('makes room for a self message loop', () => {
    const { model } = buildSequenceModel('A -> A: think');
    const { layout } = layoutSequence(model, config);
    expect(layout.messages[0]?.self).toBe(true);
    expect(layout.width).toBe(220);
  });

  it('uses the minimum canvas when there are no messages', () => {
    const { layout, diagnostics } = layoutSequence({ actors: [], messages: [] }, config, 'Empty');
    expect([layout.width, layout.height]).toEqual([200, 140]);
    expect(diagnostics[0]?.code).toBe('GEN-EMPTY-DIAGRAM');
  });
});
