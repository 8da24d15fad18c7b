import type { DiagramKind } from '../core/types.js';
import { escapeXml, fnv1a } from './utils.js';

const DOWNLOAD_ICON =
  '<svg width="16" height="16" viewBox="0 0 24 24" fill="none" stroke="currentColor" stroke-width="2" stroke-linecap="round" stroke-linejoin="round">' +
  '<path d="M21 15v4a2 2 0 0 1-2 2H5a2 2 0 0 1-2-2v-4"/>' +
  '<polyline points="7 10 12 15 17 10"/>' +
  '<line x1="12" y1="15" x2="12" y2="3"/>' +
  '</svg>';

/**
 * Stable id: `<kind>-<8 hex digits>` hashed from the inputs, so identical
 * input renders identically. `occurrence` tells apart equal diagrams on one page.
 */
export function diagramId(kind: DiagramKind, content: string, title?: string, occurrence = 0): string {
  return `${kind}-${fnv1a([kind, content, title ?? '', String(occurrence)].join('\u0000'))}`;
}

function dataAttrs(id: string, kind: string): string {
  return `data-diagram-id="${escapeXml(id)}" data-diagram-type="${escapeXml(kind)}"`;
}

/** Wraps an SVG document in the container and download button the site script hooks onto. */
export function embedDiagram(id: string, kind: string, svg: string, extraClass?: string): string {
  const cls = extraClass ? `diagram-container ${extraClass}` : 'diagram-container';
  return (
    `<div class="${cls}" ${dataAttrs(id, kind)}>` +
    `<button class="diagram-download" type="button" ${dataAttrs(id, kind)} aria-label="Download diagram as SVG">${DOWNLOAD_ICON}</button>` +
    svg +
    '</div>'
  );
}
