/**
 * packages/core/src/renderer/primitives.ts — Pixel drawing primitives.
 *
 * Every primitive clips its destination against the target bitmap; fully
 * off-bitmap or zero-sized requests write nothing. Source rectangles are
 * expected to be validated by the caller.
 */

import type { Bitmap } from "../bitmap/bitmap.js";
import { type Rect, intersectRect } from "../layout/types.js";
import { type AlphaCompFn, over } from "../pixel/alphaComp.js";
import { type Color, TRANSPARENT, rgbA } from "../pixel/color.js";
import type { NineSliceFill, NineSlicingSprite, Rotate, Sprite } from "./sprite.js";
import { rotatedSize } from "./sprite.js";

/** Colour lookup in destination-local coordinates (0..w, 0..h). */
type Sampler = (u: number, v: number) => Color;

function toI32(v: number): number {
  if (!Number.isFinite(v)) return 0;
  return Math.trunc(v);
}

function blitMapped(target: Bitmap, dest: Rect, sample: Sampler, comp: AlphaCompFn): void {
  const clip = intersectRect({ x: 0, y: 0, w: target.width, h: target.height }, dest);
  if (!clip) return;
  const px = target.pixels;
  for (let y = clip.y; y < clip.y + clip.h; y++) {
    const row = y * target.width;
    const v = y - dest.y;
    for (let x = clip.x; x < clip.x + clip.w; x++) {
      const i = row + x;
      px[i] = comp(sample(x - dest.x, v), px[i] ?? TRANSPARENT) >>> 0;
    }
  }
}

function sheetSampler(sheet: Bitmap, ox: number, oy: number, mask: Color | undefined): Sampler {
  return (sx: number, sy: number): Color => {
    const c = sheet.pixels[(oy + sy) * sheet.width + ox + sx] ?? TRANSPARENT;
    return mask === undefined ? c : rgbA(mask, c);
  };
}

export function fillRect(target: Bitmap, r: Rect, color: Color, comp: AlphaCompFn = over): void {
  const dest = { x: toI32(r.x), y: toI32(r.y), w: toI32(r.w), h: toI32(r.h) };
  blitMapped(target, dest, () => color, comp);
}

/** Outline drawn inside `r`; each pixel is composited once. */
export function strokeRect(
  target: Bitmap,
  r: Rect,
  color: Color,
  width: number,
  comp: AlphaCompFn = over,
): void {
  const sw = toI32(width);
  if (sw <= 0 || r.w <= 0 || r.h <= 0) return;
  if (sw * 2 >= r.w || sw * 2 >= r.h) {
    fillRect(target, r, color, comp);
    return;
  }
  const innerH = r.h - sw * 2;
  fillRect(target, { x: r.x, y: r.y, w: r.w, h: sw }, color, comp);
  fillRect(target, { x: r.x, y: r.y + r.h - sw, w: r.w, h: sw }, color, comp);
  fillRect(target, { x: r.x, y: r.y + sw, w: sw, h: innerH }, color, comp);
  fillRect(target, { x: r.x + r.w - sw, y: r.y + sw, w: sw, h: innerH }, color, comp);
}

/**
 * Copy `src` from `sheet` with its top-left at (x, y), rotated clockwise by
 * `rotate`. `mask` replaces the sprite RGB and keeps its alpha.
 */
export function blitSprite(
  target: Bitmap,
  sheet: Bitmap,
  src: Sprite,
  x: number,
  y: number,
  rotate: Rotate = 0,
  mask?: Color,
  comp: AlphaCompFn = over,
): void {
  const dims = rotatedSize(src, rotate);
  if (dims.w <= 0 || dims.h <= 0) return;
  const read = sheetSampler(sheet, src.x, src.y, mask);
  const lastX = src.w - 1;
  const lastY = src.h - 1;
  let sample: Sampler;
  switch (rotate) {
    case 90:
      sample = (u, v) => read(v, lastY - u);
      break;
    case 180:
      sample = (u, v) => read(lastX - u, lastY - v);
      break;
    case 270:
      sample = (u, v) => read(lastX - v, u);
      break;
    default:
      sample = read;
  }
  blitMapped(target, { x: toI32(x), y: toI32(y), w: dims.w, h: dims.h }, sample, comp);
}

type Band = Readonly<{
  src: number;
  srcLen: number;
  dst: number;
  dstLen: number;
  part: "start" | "mid" | "end";
}>;

/** Split one axis into start/mid/end bands; corners shrink when the target is too small. */
function splitAxis(
  srcOrigin: number,
  srcLen: number,
  lead: number,
  trail: number,
  dstLen: number,
): Band[] {
  const dl = Math.min(lead, dstLen);
  const dt = Math.min(trail, dstLen - dl);
  const dm = dstLen - dl - dt;
  return [
    { src: srcOrigin, srcLen: lead, dst: 0, dstLen: dl, part: "start" },
    { src: srcOrigin + lead, srcLen: srcLen - lead - trail, dst: dl, dstLen: dm, part: "mid" },
    { src: srcOrigin + srcLen - trail, srcLen: trail, dst: dl + dm, dstLen: dt, part: "end" },
  ];
}

function mapBand(band: Band, u: number, fill: NineSliceFill): number {
  switch (band.part) {
    case "start":
      return u;
    case "end":
      return band.srcLen - band.dstLen + u;
    default:
      return fill === "stretch" ? Math.floor((u * band.srcLen) / band.dstLen) : u % band.srcLen;
  }
}

/** Stretch a nine-slice sprite over `dest`. Insets must fit inside the sprite rect. */
export function blitNineSlice(
  target: Bitmap,
  sheet: Bitmap,
  nss: NineSlicingSprite,
  dest: Rect,
  mask?: Color,
  comp: AlphaCompFn = over,
): void {
  const dx = toI32(dest.x);
  const dy = toI32(dest.y);
  const dw = toI32(dest.w);
  const dh = toI32(dest.h);
  if (dw <= 0 || dh <= 0) return;

  const { rect: sr, insets } = nss;
  const fill = nss.fill ?? "tile";
  const cols = splitAxis(sr.x, sr.w, insets.left, insets.right, dw);
  const rows = splitAxis(sr.y, sr.h, insets.top, insets.bottom, dh);
  const read = sheetSampler(sheet, 0, 0, mask);

  for (const row of rows) {
    if (row.dstLen <= 0 || row.srcLen <= 0) continue;
    for (const col of cols) {
      if (col.dstLen <= 0 || col.srcLen <= 0) continue;
      blitMapped(
        target,
        { x: dx + col.dst, y: dy + row.dst, w: col.dstLen, h: row.dstLen },
        (u, v) => read(col.src + mapBand(col, u, fill), row.src + mapBand(row, v, fill)),
        comp,
      );
    }
  }
}
