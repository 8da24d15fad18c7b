import { firstToken, tokensOf } from '../core/cst.js';
import type { LineShape } from '../core/diagnostics.js';
import { parseLines } from '../core/pipeline.js';
import type { ParseResult } from '../core/types.js';
import { ActorName, MessageText, tokenize } from '../diagrams/sequence/lexer.js';
import { parse } from '../diagrams/sequence/parser.js';
import type { SequenceActor, SequenceMessage, SequenceModel } from './sequence-types.js';

export const SEQUENCE_LINE: LineShape = {
  code: 'SQ-MALFORMED-LINE',
  label: 'sequence',
  expected: 'Actor -> Actor: message',
};

export function buildSequenceModel(text: string): ParseResult<SequenceModel> {
  const { lines, diagnostics } = parseLines(text, { shape: SEQUENCE_LINE, tokenize, parse });

  const actors: SequenceActor[] = [];
  const messages: SequenceMessage[] = [];
  const lanes = new Map<string, number>();

  const lane = (name: string): number => {
    const known = lanes.get(name);
    if (known !== undefined) return known;
    const next = actors.length;
    actors.push({ name, lane: next });
    lanes.set(name, next);
    return next;
  };

  for (const { cst } of lines) {
    const [fromTok, toTok] = tokensOf(cst, ActorName);
    if (!fromTok || !toTok) continue;
    const from = lane(fromTok.image.trim());
    const to = lane(toTok.image.trim());
    const text = firstToken(cst, MessageText)?.image.trim() ?? '';
    messages.push({ from, to, text, index: messages.length });
  }

  return { model: { actors, messages }, diagnostics };
}
