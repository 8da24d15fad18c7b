import { describe, expect, it } from 'vitest';
import { resolveConfig } from '../src/core/config.js';
import { buildStateModel, createStateClassifier } from '../src/renderer/state-builder.js';

describe('state parser', () => {
  it('puts the event on the last transition of the line only', () => {
    const { model, diagnostics } = buildStateModel('Idle -> Running -> Done: finish');
    expect(diagnostics).toEqual([]);
    expect(model.states.map((s) => s.id)).toEqual(['Idle', 'Running', 'Done']);
    expect(model.transitions).toEqual([
      { source: 0, target: 1, label: '' },
      { source: 1, target: 2, label: 'finish' },
    ]);
  });

  it('uses an empty label when there is no event', () => {
    const { model } = buildStateModel('A -> B\nB -> C:');
    expect(model.transitions.map((t) => t.label)).toEqual(['', '']);
  });

  it('keeps colons inside the event text', () => {
    const { model } = buildStateModel('A -> B: retry: 3 times');
    expect(model.transitions[0]?.label).toBe('retry: 3 times');
  });

  it('ignores lines without an arrow', () => {
    const { model, diagnostics } = buildStateModel('note: nothing here\nA -> B');
    expect(diagnostics).toEqual([]);
    expect(model.states).toHaveLength(2);
  });

  it('warns when a target state is missing', () => {
    const { model, diagnostics } = buildStateModel('A -> : go');
    expect(model.states).toEqual([]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({ line: 1, column: 6, code: 'ST-MALFORMED-LINE' });
  });

  it('marks every state normal by default', () => {
    const { model } = buildStateModel('Start -> End');
    expect(model.states.map((s) => s.kind)).toEqual(['normal', 'normal']);
  });

  it('classifies initial and final states from configured keywords', () => {
    const classify = createStateClassifier(resolveConfig({ state: { initialKeywords: ['idle'], finalKeywords: ['Done'] } }).state);
    const { model } = buildStateModel('Idle -> Busy -> Done', classify);
    expect(model.states.map((s) => s.kind)).toEqual(['initial', 'normal', 'final']);
  });
});
