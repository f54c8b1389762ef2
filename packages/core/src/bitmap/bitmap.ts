/**
 * packages/core/src/bitmap/bitmap.ts — Owned 2D pixel buffers.
 *
 * A Bitmap owns a row-major Uint32Array of packed ARGB colors. Sub-rectangles
 * (sprites in a sheet) are addressed through BitmapView without copying.
 *
 * Coordinate access outside the buffer is a programming error and always
 * throws; drawing operations clip instead.
 */

import { PxUiError } from "../errors.js";
import { type Rect, type Size, intersectRect } from "../layout/types.js";
import { type AlphaCompFn, over } from "../pixel/alphaComp.js";
import { type Color, TRANSPARENT, argb } from "../pixel/color.js";

/** Read-only pixel source: a whole bitmap or a view into one. */
export interface PixelSource {
  readonly width: number;
  readonly height: number;
  get(x: number, y: number): Color;
}

function requireDimension(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) {
    throw new PxUiError("PXUI_INVALID_PROPS", `Bitmap: ${name} must be a non-negative integer`);
  }
  return v;
}

function outOfBounds(what: string, x: number, y: number, w: number, h: number): never {
  throw new PxUiError(
    "PXUI_OUT_OF_BOUNDS",
    `${what}: (${String(x)}, ${String(y)}) outside ${String(w)}x${String(h)}`,
  );
}

export class Bitmap implements PixelSource {
  readonly width: number;
  readonly height: number;
  readonly pixels: Uint32Array;

  constructor(dimensions: Size, pixels?: Uint32Array) {
    this.width = requireDimension("width", dimensions.w);
    this.height = requireDimension("height", dimensions.h);
    const len = this.width * this.height;
    if (pixels !== undefined && pixels.length !== len) {
      throw new PxUiError(
        "PXUI_INVALID_PROPS",
        `Bitmap: buffer length ${String(pixels.length)} does not match ${String(this.width)}x${String(this.height)}`,
      );
    }
    this.pixels = pixels ?? new Uint32Array(len);
  }

  /** Wrap an existing packed-ARGB buffer (not copied). */
  static fromBuffer(pixels: Uint32Array, dimensions: Size): Bitmap {
    return new Bitmap(dimensions, pixels);
  }

  /**
   * Build a bitmap from decoder output: top-to-bottom, left-to-right pixels
   * with bytes in R, G, B, A order. Channels are reordered into ARGB.
   */
  static fromRgba(bytes: Uint8Array, dimensions: Size): Bitmap {
    const bmp = new Bitmap(dimensions);
    if (bytes.length !== bmp.pixels.length * 4) {
      throw new PxUiError(
        "PXUI_INVALID_PROPS",
        `Bitmap.fromRgba: expected ${String(bmp.pixels.length * 4)} bytes, got ${String(bytes.length)}`,
      );
    }
    for (let i = 0; i < bmp.pixels.length; i++) {
      const off = i * 4;
      const r = bytes[off] ?? 0;
      const g = bytes[off + 1] ?? 0;
      const b = bytes[off + 2] ?? 0;
      const a = bytes[off + 3] ?? 0;
      bmp.pixels[i] = argb(a, r, g, b);
    }
    return bmp;
  }

  get size(): Size {
    return { w: this.width, h: this.height };
  }

  index(x: number, y: number): number {
    const inside =
      Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
    if (!inside) {
      outOfBounds("Bitmap.index", x, y, this.width, this.height);
    }
    return y * this.width + x;
  }

  get(x: number, y: number): Color {
    return this.pixels[this.index(x, y)] ?? TRANSPARENT;
  }

  set(x: number, y: number, color: Color): void {
    this.pixels[this.index(x, y)] = color >>> 0;
  }

  fill(color: Color): void {
    this.pixels.fill(color >>> 0);
  }

  /** Sub-view without copying. The rectangle must lie inside the bitmap. */
  view(r: Rect): BitmapView {
    return new BitmapView(this, r);
  }

  /** Copy a sub-rectangle into a new bitmap. */
  crop(r: Rect): Bitmap {
    assertRectInside(this, r, "Bitmap.crop");
    const out = new Bitmap({ w: r.w, h: r.h });
    for (let y = 0; y < r.h; y++) {
      const start = (r.y + y) * this.width + r.x;
      out.pixels.set(this.pixels.subarray(start, start + r.w), y * r.w);
    }
    return out;
  }

  /**
   * Composite `source` onto this bitmap with its top-left at (x, y).
   * Pixels falling outside this bitmap are dropped.
   */
  blit(source: PixelSource, x: number, y: number, comp: AlphaCompFn = over): void {
    const clip = intersectRect(
      { x: 0, y: 0, w: this.width, h: this.height },
      { x, y, w: source.width, h: source.height },
    );
    if (!clip) return;
    for (let dy = clip.y; dy < clip.y + clip.h; dy++) {
      const row = dy * this.width;
      for (let dx = clip.x; dx < clip.x + clip.w; dx++) {
        const i = row + dx;
        this.pixels[i] = comp(source.get(dx - x, dy - y), this.pixels[i] ?? TRANSPARENT) >>> 0;
      }
    }
  }
}

export class BitmapView implements PixelSource {
  readonly bitmap: Bitmap;
  readonly rect: Rect;

  constructor(bitmap: Bitmap, r: Rect) {
    assertRectInside(bitmap, r, "BitmapView");
    this.bitmap = bitmap;
    this.rect = r;
  }

  get width(): number {
    return this.rect.w;
  }

  get height(): number {
    return this.rect.h;
  }

  get(x: number, y: number): Color {
    if (x < 0 || y < 0 || x >= this.rect.w || y >= this.rect.h) {
      outOfBounds("BitmapView.get", x, y, this.rect.w, this.rect.h);
    }
    return this.bitmap.get(this.rect.x + x, this.rect.y + y);
  }
}

function assertRectInside(bitmap: Bitmap, r: Rect, what: string): void {
  const integral =
    Number.isInteger(r.x) && Number.isInteger(r.y) && Number.isInteger(r.w) && Number.isInteger(r.h);
  if (integral && rectFits(r, bitmap.width, bitmap.height)) return;
  throw new PxUiError(
    "PXUI_OUT_OF_BOUNDS",
    `${what}: rect ${String(r.x)},${String(r.y)} ${String(r.w)}x${String(r.h)} outside ${String(bitmap.width)}x${String(bitmap.height)}`,
  );
}

/** True when `r` lies entirely inside a `width` x `height` area. */
export function rectFits(r: Rect, width: number, height: number): boolean {
  return r.x >= 0 && r.y >= 0 && r.w >= 0 && r.h >= 0 && r.x + r.w <= width && r.y + r.h <= height;
}
