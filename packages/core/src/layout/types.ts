/**
 * packages/core/src/layout/types.ts — Geometry primitives.
 *
 * All coordinates are integer pixels in the frame's coordinate space, with the
 * origin at the top-left corner and y growing downwards.
 */

/** Rectangle with position (x,y) and dimensions (w,h) in pixels. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Size dimensions (width and height) in pixels. */
export type Size = Readonly<{ w: number; h: number }>;

/** Point or offset in pixels. */
export type Pos = Readonly<{ x: number; y: number }>;

/** Four independent edge insets. */
export type Insets = Readonly<{ top: number; right: number; bottom: number; left: number }>;

export const ZERO_POS: Pos = Object.freeze({ x: 0, y: 0 });
export const ZERO_SIZE: Size = Object.freeze({ w: 0, h: 0 });
export const ZERO_RECT: Rect = Object.freeze({ x: 0, y: 0, w: 0, h: 0 });
export const ZERO_INSETS: Insets = Object.freeze({ top: 0, right: 0, bottom: 0, left: 0 });

export function pos(x: number, y: number): Pos {
  return { x, y };
}

export function size(w: number, h: number): Size {
  return { w, h };
}

export function rect(x: number, y: number, w: number, h: number): Rect {
  return { x, y, w, h };
}

/** Check if point (x,y) is inside rect (exclusive of right/bottom edges). */
export function contains(r: Rect, x: number, y: number): boolean {
  return x >= r.x && x < r.x + r.w && y >= r.y && y < r.y + r.h;
}

export function intersectRect(a: Rect, b: Rect): Rect | null {
  const x0 = Math.max(a.x, b.x);
  const y0 = Math.max(a.y, b.y);
  const x1 = Math.min(a.x + a.w, b.x + b.w);
  const y1 = Math.min(a.y + a.h, b.y + b.h);
  if (x1 <= x0 || y1 <= y0) return null;
  return { x: x0, y: y0, w: x1 - x0, h: y1 - y0 };
}

/** Shrink a rect by insets, never below zero size. */
export function insetRect(r: Rect, insets: Insets): Rect {
  return {
    x: r.x + insets.left,
    y: r.y + insets.top,
    w: Math.max(0, r.w - insets.left - insets.right),
    h: Math.max(0, r.h - insets.top - insets.bottom),
  };
}
