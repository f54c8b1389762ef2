/**
 * packages/core/src/renderer/text.ts — Fixed-width bitmap font shaping.
 *
 * The font sheet is a grid of equally sized glyph cells in character-code
 * order starting at `firstCode`. Shaping turns a string into glyph rectangles
 * with their offsets from the run origin; drawing is done later through the
 * sprite path against the font sheet.
 */

import type { Size } from "../layout/types.js";
import type { Sprite } from "./sprite.js";

export type BitmapFontLayout = Readonly<{
  glyphWidth: number;
  glyphHeight: number;
  /** Glyph cells per sheet row. */
  columns: number;
  /** Character code of the first cell. */
  firstCode: number;
  /** Horizontal gap between glyphs. */
  letterSpacing: number;
  /** Vertical gap between lines. */
  lineSpacing: number;
  /** Drawn in place of characters the sheet does not cover. */
  fallbackChar: string;
}>;

export const DEFAULT_FONT_LAYOUT: BitmapFontLayout = Object.freeze({
  glyphWidth: 4,
  glyphHeight: 6,
  columns: 16,
  firstCode: 32,
  letterSpacing: 1,
  lineSpacing: 1,
  fallbackChar: "?",
});

export type GlyphPlacement = Readonly<{ sprite: Sprite; x: number; y: number }>;

/** Pre-shaped glyph run. */
export type Text = Readonly<{
  source: string;
  glyphs: readonly GlyphPlacement[];
  size: Size;
}>;

function glyphCell(font: BitmapFontLayout, sheet: Size, code: number): Sprite | null {
  const index = code - font.firstCode;
  if (index < 0) return null;
  const col = index % font.columns;
  const row = Math.floor(index / font.columns);
  const x = col * font.glyphWidth;
  const y = row * font.glyphHeight;
  if (x + font.glyphWidth > sheet.w || y + font.glyphHeight > sheet.h) return null;
  return { x, y, w: font.glyphWidth, h: font.glyphHeight };
}

/** Glyph rectangle for `ch`, falling back to `fallbackChar`, or null if neither exists. */
export function lookupGlyph(font: BitmapFontLayout, sheet: Size, ch: string): Sprite | null {
  const direct = glyphCell(font, sheet, ch.codePointAt(0) ?? -1);
  if (direct) return direct;
  return glyphCell(font, sheet, font.fallbackChar.codePointAt(0) ?? -1);
}

/** Shape `source` into glyph placements. `\n` starts a new line. */
export function shapeText(font: BitmapFontLayout, sheet: Size, source: string): Text {
  if (source.length === 0) {
    return { source, glyphs: [], size: { w: 0, h: 0 } };
  }

  const glyphs: GlyphPlacement[] = [];
  const advanceX = font.glyphWidth + font.letterSpacing;
  const advanceY = font.glyphHeight + font.lineSpacing;
  const lines = source.split("\n");
  let width = 0;

  for (let lineIndex = 0; lineIndex < lines.length; lineIndex++) {
    const line = lines[lineIndex] ?? "";
    const y = lineIndex * advanceY;
    let count = 0;
    for (const ch of line) {
      const cell = lookupGlyph(font, sheet, ch);
      if (cell) glyphs.push({ sprite: cell, x: count * advanceX, y });
      count++;
    }
    if (count > 0) {
      width = Math.max(width, count * font.glyphWidth + (count - 1) * font.letterSpacing);
    }
  }

  const height = lines.length * font.glyphHeight + (lines.length - 1) * font.lineSpacing;
  return { source, glyphs, size: { w: width, h: height } };
}
