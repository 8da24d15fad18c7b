import type { EngineConfigInput } from './config.js';
import { isDiagramError } from './errors.js';
import type { Diagnostic, DiagramOptions } from './types.js';
import { DiagramRenderer, type RenderResult } from '../renderer/index.js';
import { embedDiagram } from '../renderer/embed.js';
import { escapeXml, fnv1a } from '../renderer/utils.js';

export interface Directive {
  /** Directive name as written in the document, e.g. "flowchart" or "class". */
  type: string;
  body: string;
  options?: DiagramOptions;
}

export interface DirectiveResult {
  html: string;
  /** Absent when the directive could not be rendered at all. */
  result?: RenderResult;
  error?: string;
  diagnostics: Diagnostic[];
}

/** Removes paragraph tags the document parser leaves around directive bodies. */
export function cleanDirectiveBody(body: string): string {
  return body.replace(/<\/?p>/g, '').trim();
}

function wrapText(text: string, maxLength: number): string[] {
  const words = text.split(' ');
  const lines: string[] = [];
  let currentLine = '';
  for (const word of words) {
    if (currentLine.length + word.length + 1 <= maxLength) {
      currentLine += (currentLine ? ' ' : '') + word;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);
  return lines.slice(0, 3);
}

export function generateErrorSvg(message: string): string {
  const width = 400;
  const height = 200;
  const tspans = wrapText(message, 40)
    .map((line, i) => `<tspan x="${width / 2}" dy="${i === 0 ? 0 : 15}">${escapeXml(line)}</tspan>`)
    .join('');
  return (
    `<svg viewBox="0 0 ${width} ${height}" xmlns="http://www.w3.org/2000/svg" class="diagram-svg" width="${width}" height="${height}">` +
    `<rect width="${width}" height="${height}" fill="#fee" stroke="#c00" stroke-width="2"/>` +
    `<text x="${width / 2}" y="${height / 2 - 20}" text-anchor="middle" font-family="Inter, sans-serif" font-size="16" fill="#c00">Diagram Error</text>` +
    `<text x="${width / 2}" y="${height / 2 + 10}" text-anchor="middle" font-family="Inter, sans-serif" font-size="12" fill="#666">${tspans}</text>` +
    '</svg>'
  );
}

function optionsOf(options: DiagramOptions | undefined, occurrence: number) {
  return { title: options?.['title'], occurrence };
}

/**
 * Renders one directive for a page. An unknown diagram type becomes a visible
 * placeholder instead of an exception so the rest of the page still builds.
 */
export function renderDirective(
  directive: Directive,
  occurrence = 0,
  renderer: DiagramRenderer = new DiagramRenderer()
): DirectiveResult {
  const body = cleanDirectiveBody(directive.body);
  try {
    const result = renderer.render(directive.type, body, optionsOf(directive.options, occurrence));
    return { html: result.html, result, diagnostics: result.diagnostics };
  } catch (e) {
    if (!isDiagramError(e)) throw e;
    const type = directive.type.trim();
    const id = `diagram-error-${fnv1a(`${type}\u0000${body}\u0000${occurrence}`)}`;
    return { html: embedDiagram(id, type, generateErrorSvg(e.message), 'diagram-error'), error: e.message, diagnostics: [] };
  }
}

/** Renders every directive of a page independently; `occurrence` is the position in the list. */
export function renderDirectives(directives: Directive[], config?: EngineConfigInput): DirectiveResult[] {
  const renderer = new DiagramRenderer(config);
  return directives.map((d, i) => renderDirective(d, i, renderer));
}
