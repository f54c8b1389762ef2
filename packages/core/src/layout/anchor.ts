/**
 * packages/core/src/layout/anchor.ts — Nine-point anchors.
 *
 * A child is placed so that its `anchor` point coincides with the parent's
 * `origin` point: `floor(parentLen * origin - selfLen * anchor)` per axis.
 */

export const Anchor = Object.freeze({
  TOP_LEFT: "top-left",
  TOP_CENTER: "top-center",
  TOP_RIGHT: "top-right",
  CENTER_LEFT: "center-left",
  CENTER: "center",
  CENTER_RIGHT: "center-right",
  BOTTOM_LEFT: "bottom-left",
  BOTTOM_CENTER: "bottom-center",
  BOTTOM_RIGHT: "bottom-right",
} as const);

export type Anchor = (typeof Anchor)[keyof typeof Anchor];

export type AnchorFractions = Readonly<{ fx: number; fy: number }>;

const FRACTIONS: Readonly<Record<Anchor, AnchorFractions>> = Object.freeze({
  "top-left": { fx: 0, fy: 0 },
  "top-center": { fx: 0.5, fy: 0 },
  "top-right": { fx: 1, fy: 0 },
  "center-left": { fx: 0, fy: 0.5 },
  center: { fx: 0.5, fy: 0.5 },
  "center-right": { fx: 1, fy: 0.5 },
  "bottom-left": { fx: 0, fy: 1 },
  "bottom-center": { fx: 0.5, fy: 1 },
  "bottom-right": { fx: 1, fy: 1 },
});

export function anchorFractions(anchor: Anchor): AnchorFractions {
  return FRACTIONS[anchor];
}

/** Offset of a `selfLen` span inside a `parentLen` span along one axis. */
export function anchorOffset(
  parentLen: number,
  selfLen: number,
  originFrac: number,
  anchorFrac: number,
): number {
  return Math.floor(parentLen * originFrac - selfLen * anchorFrac);
}
