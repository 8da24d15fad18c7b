import type { Box, Point, TitleLayout } from '../core/types.js';

export function center(box: Box): Point {
  return { x: box.x + box.width / 2, y: box.y + box.height / 2 };
}

/**
 * Point where the segment from the centre of `box` towards `toward` leaves the
 * box. Returns the centre itself when both points coincide.
 */
export function clipToBox(box: Box, toward: Point): Point {
  const c = center(box);
  const dx = toward.x - c.x;
  const dy = toward.y - c.y;
  if (dx === 0 && dy === 0) return c;
  const tx = dx === 0 ? Infinity : box.width / 2 / Math.abs(dx);
  const ty = dy === 0 ? Infinity : box.height / 2 / Math.abs(dy);
  const t = Math.min(tx, ty, 1);
  return { x: c.x + dx * t, y: c.y + dy * t };
}

export function titleOffset(title: string | undefined, titleHeight: number): number {
  return title ? titleHeight : 0;
}

export function placeTitle(title: string | undefined, width: number, titleHeight: number): TitleLayout | undefined {
  if (!title) return undefined;
  return { text: title, x: width / 2, y: Math.round(titleHeight * 0.7) };
}
