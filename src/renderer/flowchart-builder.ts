import type { EngineConfig } from '../core/config.js';
import { DEFAULT_CONFIG } from '../core/config.js';
import { hasToken, tokensOf } from '../core/cst.js';
import type { LineShape } from '../core/diagnostics.js';
import { parseLines } from '../core/pipeline.js';
import type { ParseResult } from '../core/types.js';
import { Arrow, Text, tokenize } from '../diagrams/flowchart/lexer.js';
import { parse } from '../diagrams/flowchart/parser.js';
import type { FlowchartCategory, FlowchartModel, FlowchartNode } from './flowchart-types.js';
import type { GraphEdge } from './graph-types.js';

export const FLOWCHART_LINE: LineShape = {
  code: 'FL-MALFORMED-LINE',
  label: 'flowchart',
  expected: 'Node -> Node (-> Node)*',
};

export type FlowchartClassifier = (label: string) => FlowchartCategory;

/**
 * Keyword classifier: a label equal (ignoring case and outer blanks) to one of
 * the terminal keywords is a terminal, one equal to a decision keyword or ending
 * in "?" (when enabled) is a decision, anything else is a process step.
 */
export function createFlowchartClassifier(cfg: EngineConfig['flowchart']): FlowchartClassifier {
  const terminal = new Set(cfg.terminalKeywords.map((k) => k.toLowerCase()));
  const decision = new Set(cfg.decisionKeywords.map((k) => k.toLowerCase()));
  return (label) => {
    const key = label.trim().toLowerCase();
    if (terminal.has(key)) return 'terminal';
    if (decision.has(key)) return 'decision';
    if (cfg.questionIsDecision && key.endsWith('?')) return 'decision';
    return 'process';
  };
}

export function buildFlowchartModel(
  text: string,
  classify: FlowchartClassifier = createFlowchartClassifier(DEFAULT_CONFIG.flowchart)
): ParseResult<FlowchartModel> {
  const { lines, diagnostics } = parseLines(text, {
    shape: FLOWCHART_LINE,
    tokenize,
    parse,
    // lines without an arrow carry no edges (comments, prose)
    ignore: (tokens) => !hasToken(tokens, Arrow),
  });

  const nodes: FlowchartNode[] = [];
  const edges: GraphEdge[] = [];
  const byId = new Map<string, number>();

  const intern = (label: string): number => {
    const known = byId.get(label);
    if (known !== undefined) return known;
    const index = nodes.length;
    nodes.push({ id: label, label, category: classify(label) });
    byId.set(label, index);
    return index;
  };

  for (const { cst } of lines) {
    const chain = tokensOf(cst, Text).map((tok) => intern(tok.image.trim()));
    for (let i = 1; i < chain.length; i++) {
      const source = chain[i - 1];
      const target = chain[i];
      if (source !== undefined && target !== undefined) edges.push({ source, target });
    }
  }

  return { model: { nodes, edges }, diagnostics };
}
