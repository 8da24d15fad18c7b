import type { EngineConfig } from '../core/config.js';
import { DEFAULT_CONFIG } from '../core/config.js';
import { firstToken, hasToken, tokensOf } from '../core/cst.js';
import type { LineShape } from '../core/diagnostics.js';
import { parseLines } from '../core/pipeline.js';
import type { ParseResult } from '../core/types.js';
import { Arrow, LabelText, Text, tokenize } from '../diagrams/state/lexer.js';
import { parse } from '../diagrams/state/parser.js';
import type { StateKind, StateModel, StateNode, StateTransition } from './state-types.js';

export const STATE_LINE: LineShape = {
  code: 'ST-MALFORMED-LINE',
  label: 'state',
  expected: 'State -> State (-> State)* [: event]',
};

export type StateClassifier = (label: string) => StateKind;

/** With the default (empty) keyword lists every state is `normal`. */
export function createStateClassifier(cfg: EngineConfig['state']): StateClassifier {
  const initial = new Set(cfg.initialKeywords.map((k) => k.toLowerCase()));
  const final = new Set(cfg.finalKeywords.map((k) => k.toLowerCase()));
  return (label) => {
    const key = label.trim().toLowerCase();
    if (initial.has(key)) return 'initial';
    if (final.has(key)) return 'final';
    return 'normal';
  };
}

export function buildStateModel(
  text: string,
  classify: StateClassifier = createStateClassifier(DEFAULT_CONFIG.state)
): ParseResult<StateModel> {
  const { lines, diagnostics } = parseLines(text, {
    shape: STATE_LINE,
    tokenize,
    parse,
    ignore: (tokens) => !hasToken(tokens, Arrow),
  });

  const states: StateNode[] = [];
  const transitions: StateTransition[] = [];
  const byId = new Map<string, number>();

  const intern = (label: string): number => {
    const known = byId.get(label);
    if (known !== undefined) return known;
    const index = states.length;
    states.push({ id: label, label, kind: classify(label) });
    byId.set(label, index);
    return index;
  };

  for (const { cst } of lines) {
    const chain = tokensOf(cst, Text).map((tok) => intern(tok.image.trim()));
    const event = firstToken(cst, LabelText)?.image.trim() ?? '';
    for (let i = 1; i < chain.length; i++) {
      const source = chain[i - 1];
      const target = chain[i];
      if (source === undefined || target === undefined) continue;
      // only the last segment of a line carries the event
      transitions.push({ source, target, label: i === chain.length - 1 ? event : '' });
    }
  }

  return { model: { states, transitions }, diagnostics };
}
