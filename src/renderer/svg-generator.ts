import type { Theme } from '../core/config.js';
import type { Box, Canvas, Point, TitleLayout } from '../core/types.js';
import { buildDiagramCss } from './styles.js';
import { escapeXml, formatNumber } from './utils.js';

type AttrValue = string | number | undefined;
export type Attrs = Record<string, AttrValue>;

function attrs(list: Attrs): string {
  const out: string[] = [];
  for (const [name, value] of Object.entries(list)) {
    if (value === undefined) continue;
    out.push(`${name}="${typeof value === 'number' ? formatNumber(value) : escapeXml(value)}"`);
  }
  return out.length ? ` ${out.join(' ')}` : '';
}

export interface ShapeStyle {
  className?: string;
  rx?: number;
  markerStart?: string;
  markerEnd?: string;
}

/**
 * Kind-agnostic SVG builder shared by every diagram renderer.
 *
 * Marker definitions are registered on first use and emitted once in `<defs>`;
 * their ids are prefixed with the diagram id so several diagrams can live on
 * one page. Shapes are emitted in call order, so callers draw edges before
 * nodes.
 */
export class SvgDocument {
  private readonly parts: string[] = [];
  private readonly defs = new Map<string, string>();

  constructor(
    readonly id: string,
    readonly canvas: Canvas,
    private readonly theme: Theme,
    private readonly label?: string
  ) {}

  /** Returns the `url(#…)` reference of the shared arrowhead. */
  arrowMarker(): string {
    const markerId = `${this.id}-arrow`;
    if (!this.defs.has(markerId)) {
      this.defs.set(
        markerId,
        `<marker${attrs({ id: markerId, viewBox: '0 0 10 7', refX: 9, refY: 3.5, markerWidth: 10, markerHeight: 7, orient: 'auto' })}>` +
          `<polygon${attrs({ points: '0 0, 10 3.5, 0 7', fill: this.theme.edgeColor })}/></marker>`
      );
    }
    return `url(#${markerId})`;
  }

  /** Diamond drawn at the start of a path; filled for composition, hollow for aggregation. */
  diamondMarker(filled: boolean): string {
    const markerId = `${this.id}-diamond-${filled ? 'filled' : 'hollow'}`;
    if (!this.defs.has(markerId)) {
      const stroke = this.theme.entity.stroke;
      this.defs.set(
        markerId,
        `<marker${attrs({ id: markerId, viewBox: '0 0 16 16', refX: 1, refY: 8, markerWidth: 16, markerHeight: 16, orient: 'auto' })}>` +
          `<polygon${attrs({ points: '1 8, 8 1, 15 8, 8 15', fill: filled ? stroke : '#ffffff', stroke, 'stroke-width': 2 })}/></marker>`
      );
    }
    return `url(#${markerId})`;
  }

  title(title: TitleLayout | undefined): this {
    if (title) this.text({ x: title.x, y: title.y }, title.text, { className: 'diagram-title' });
    return this;
  }

  rect(box: Box, style: ShapeStyle = {}): this {
    this.parts.push(
      `<rect${attrs({ x: box.x, y: box.y, width: box.width, height: box.height, rx: style.rx, class: style.className })}/>`
    );
    return this;
  }

  circle(at: Point, r: number, className?: string): this {
    this.parts.push(`<circle${attrs({ cx: at.x, cy: at.y, r, class: className })}/>`);
    return this;
  }

  line(from: Point, to: Point, style: ShapeStyle = {}): this {
    this.parts.push(
      `<line${attrs({
        x1: from.x,
        y1: from.y,
        x2: to.x,
        y2: to.y,
        class: style.className,
        'marker-start': style.markerStart,
        'marker-end': style.markerEnd,
      })}/>`
    );
    return this;
  }

  path(d: string, style: ShapeStyle = {}): this {
    this.parts.push(
      `<path${attrs({ d, class: style.className, 'marker-start': style.markerStart, 'marker-end': style.markerEnd })}/>`
    );
    return this;
  }

  text(at: Point, content: string, opts: { className?: string; anchor?: 'start' | 'middle' | 'end' } = {}): this {
    this.parts.push(
      `<text${attrs({ x: at.x, y: at.y, 'text-anchor': opts.anchor ?? 'middle', class: opts.className })}>${escapeXml(content)}</text>`
    );
    return this;
  }

  toString(): string {
    const { width, height } = this.canvas;
    const head = `<svg${attrs({
      viewBox: `0 0 ${formatNumber(width)} ${formatNumber(height)}`,
      xmlns: 'http://www.w3.org/2000/svg',
      class: 'diagram-svg',
      id: this.id,
      width,
      height,
      role: 'img',
      'aria-label': this.label,
    })}>`;
    const defs = this.defs.size ? `<defs>${[...this.defs.values()].join('')}</defs>` : '';
    const style = `<style>${buildDiagramCss(this.id, this.theme)}</style>`;
    return `${head}${style}${defs}${this.parts.join('')}</svg>`;
  }
}

/** Path data helper: `M x y L x y …` with deterministic number formatting. */
export function pathData(points: Point[], close = false): string {
  const d = points.map((p, i) => `${i === 0 ? 'M' : 'L'} ${formatNumber(p.x)} ${formatNumber(p.y)}`).join(' ');
  return close ? `${d} Z` : d;
}
