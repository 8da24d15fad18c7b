import type { Theme } from '../core/config.js';

// Scoped under the diagram id so several diagrams (and themes) can share one page.
export function buildDiagramCss(scope: string, theme: Theme): string {
  const s = `#${scope}`;
  const font = theme.fontFamily;
  return [
    `${s} text { font-family: ${font}; fill: ${theme.textColor}; }`,
    `${s} .diagram-title { font-size: 18px; font-weight: bold; }`,
    `${s} .diagram-label { font-size: 12px; dominant-baseline: middle; }`,
    `${s} .edge-path { stroke: ${theme.edgeColor}; stroke-width: 2; fill: none; }`,
    `${s} .edge-label { font-size: 11px; fill: ${theme.labelColor}; }`,
    `${s} .node-terminal { fill: ${theme.terminal.fill}; stroke: ${theme.terminal.stroke}; stroke-width: 2; }`,
    `${s} .node-decision { fill: ${theme.decision.fill}; stroke: ${theme.decision.stroke}; stroke-width: 2; }`,
    `${s} .node-process { fill: ${theme.process.fill}; stroke: ${theme.process.stroke}; stroke-width: 2; }`,
    `${s} .state-normal { fill: ${theme.state.fill}; stroke: ${theme.state.stroke}; stroke-width: 2; }`,
    `${s} .state-initial { fill: ${theme.edgeColor}; }`,
    `${s} .state-final-ring { fill: none; stroke: ${theme.edgeColor}; stroke-width: 2; }`,
    `${s} .state-final-dot { fill: ${theme.edgeColor}; }`,
    `${s} .gantt-grid { stroke: ${theme.gridColor}; stroke-width: 1; stroke-dasharray: 4; }`,
    `${s} .gantt-tick { font-size: 10px; fill: ${theme.mutedColor}; }`,
    `${s} .gantt-task-name { font-size: 12px; dominant-baseline: middle; }`,
    `${s} .gantt-bar { fill: ${theme.task.fill}; stroke: ${theme.task.stroke}; stroke-width: 1; }`,
    `${s} .gantt-bar-label { font-size: 11px; fill: #ffffff; dominant-baseline: middle; }`,
    `${s} .seq-actor { fill: ${theme.actor.fill}; stroke: ${theme.actor.stroke}; stroke-width: 2; }`,
    `${s} .seq-lifeline { stroke: ${theme.lifelineColor}; stroke-width: 1; stroke-dasharray: 5,5; }`,
    `${s} .class-entity { fill: ${theme.entity.fill}; stroke: ${theme.entity.stroke}; stroke-width: 2; }`,
    `${s} .class-entity-name { font-size: 13px; font-weight: bold; dominant-baseline: middle; }`,
    `${s} .class-relationship { stroke: ${theme.entity.stroke}; stroke-width: 2; fill: none; }`,
  ].join(' ');
}
