/**
 * packages/core/src/pixel/alphaComp.ts — Alpha composition operators.
 *
 * Every operator takes the incoming (source) color first and the color already
 * in the target (destination) second. Non-trivial operators work on integer
 * weights scaled by 255 so identities such as `over(c, TRANSPARENT) === c`
 * hold exactly.
 */

import { type Color, TRANSPARENT, argb, colorA, colorB, colorG, colorR } from "./color.js";

export type AlphaCompFn = (src: Color, dst: Color) => Color;

/**
 * Weighted blend: each channel is (src·ws + dst·wd) / (ws + wd), and the
 * resulting alpha is (ws + wd) / 255. Zero total weight yields transparent.
 */
function blendWeighted(src: Color, dst: Color, ws: number, wd: number): Color {
  const total = ws + wd;
  if (total === 0) return TRANSPARENT;
  return argb(
    Math.round(total / 255),
    Math.round((colorR(src) * ws + colorR(dst) * wd) / total),
    Math.round((colorG(src) * ws + colorG(dst) * wd) / total),
    Math.round((colorB(src) * ws + colorB(dst) * wd) / total),
  );
}

/**
 * Source over destination (standard alpha compositing). A fully transparent
 * side yields the other side unchanged; two transparent sides yield 0.
 */
export const over: AlphaCompFn = (src, dst) => {
  const sa = colorA(src);
  const da = colorA(dst);
  if (sa === 0 && da === 0) return TRANSPARENT;
  if (da === 0) return src >>> 0;
  if (sa === 0) return dst >>> 0;
  return blendWeighted(src, dst, sa * 255, da * (255 - sa));
};

/** Destination over source. */
export const dstOver: AlphaCompFn = (src, dst) => over(dst, src);

/** Porter-Duff xor: each side shows only where the other is absent. */
export const xor: AlphaCompFn = (src, dst) => {
  const sa = colorA(src);
  const da = colorA(dst);
  return blendWeighted(src, dst, sa * (255 - da), da * (255 - sa));
};

/** Saturating per-channel sum. */
export const add: AlphaCompFn = (src, dst) =>
  argb(
    colorA(src) + colorA(dst),
    colorR(src) + colorR(dst),
    colorG(src) + colorG(dst),
    colorB(src) + colorB(dst),
  );

/** Replace the destination with the source. */
export const src: AlphaCompFn = (s) => s;

/** Keep the destination untouched. */
export const dst: AlphaCompFn = (_s, d) => d;

export const alphaComp = Object.freeze({ over, dstOver, xor, add, src, dst });
