/**
 * packages/core/src/pixel/color.ts — Packed ARGB color values.
 *
 * A Color is an unsigned 32-bit number laid out as 0xAARRGGBB. The packing is
 * done with shifts so the layout never depends on host endianness, and every
 * constructor normalizes through `>>> 0` so values stay non-negative.
 */

/** Packed 0xAARRGGBB color. */
export type Color = number;

export const TRANSPARENT: Color = 0;

function clampU8(v: number): number {
  if (!Number.isFinite(v)) return 0;
  if (v <= 0) return 0;
  if (v >= 255) return 255;
  return Math.trunc(v);
}

/** Create a packed color from channels. Channels are clamped to 0..255. */
export function argb(a: number, r: number, g: number, b: number): Color {
  return (
    ((clampU8(a) << 24) | (clampU8(r) << 16) | (clampU8(g) << 8) | clampU8(b)) >>> 0
  );
}

/** Hex-literal constructor, e.g. `colorFromHex(0xff181425)`. */
export function colorFromHex(hex: number): Color {
  return hex >>> 0;
}

export function colorA(c: Color): number {
  return (c >>> 24) & 0xff;
}

export function colorR(c: Color): number {
  return (c >>> 16) & 0xff;
}

export function colorG(c: Color): number {
  return (c >>> 8) & 0xff;
}

export function colorB(c: Color): number {
  return c & 0xff;
}

/** Channels in core order: [a, r, g, b]. */
export function colorToArray(c: Color): [number, number, number, number] {
  return [colorA(c), colorR(c), colorG(c), colorB(c)];
}

/** Saturating per-channel sum. */
export function colorAdd(x: Color, y: Color): Color {
  return argb(
    colorA(x) + colorA(y),
    colorR(x) + colorR(y),
    colorG(x) + colorG(y),
    colorB(x) + colorB(y),
  );
}

/** Saturating per-channel difference. */
export function colorSub(x: Color, y: Color): Color {
  return argb(
    colorA(x) - colorA(y),
    colorR(x) - colorR(y),
    colorG(x) - colorG(y),
    colorB(x) - colorB(y),
  );
}

/** Saturating scalar product on all four channels. */
export function colorMul(c: Color, k: number): Color {
  return argb(colorA(c) * k, colorR(c) * k, colorG(c) * k, colorB(c) * k);
}

/** Truncating scalar division on all four channels; `k <= 0` yields 0. */
export function colorDiv(c: Color, k: number): Color {
  if (!(k > 0)) return TRANSPARENT;
  return argb(colorA(c) / k, colorR(c) / k, colorG(c) / k, colorB(c) / k);
}

/** RGB of the first color with the alpha of the second. */
export function rgbA(rgb: Color, a: Color): Color {
  return ((rgb & 0x00ff_ffff) | (a & 0xff00_0000)) >>> 0;
}

/** `#aarrggbb` form, for diagnostics. */
export function colorToHexString(c: Color): string {
  return `#${(c >>> 0).toString(16).padStart(8, "0")}`;
}
