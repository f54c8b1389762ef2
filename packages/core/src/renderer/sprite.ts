import type { Insets, Rect, Size } from "../layout/types.js";

/** Opaque spritesheet handle handed out by the renderer. */
export type SpritesheetId = number;

/** Pixel rectangle inside a spritesheet. */
export type Sprite = Rect;

/** Clockwise rotation in degrees. */
export type Rotate = 0 | 90 | 180 | 270;

/** How a nine-slice fills its edges and center. */
export type NineSliceFill = "tile" | "stretch";

/**
 * Sprite cut into a 3x3 grid by fixed insets. Corners are drawn unscaled,
 * edges repeat along their long axis and the center on both axes.
 */
export type NineSlicingSprite = Readonly<{
  rect: Rect;
  insets: Insets;
  fill?: NineSliceFill | undefined;
}>;

/** Sprite reference attached to a widget. */
export type WidgetSprite =
  | Readonly<{ kind: "simple"; sheet: SpritesheetId; sprite: Sprite }>
  | Readonly<{ kind: "nineSlice"; sheet: SpritesheetId; sprite: NineSlicingSprite }>;

export function sprite(x: number, y: number, w: number, h: number): Sprite {
  return { x, y, w, h };
}

export function nineSlice(
  r: Rect,
  insets: Insets | number,
  fill: NineSliceFill = "tile",
): NineSlicingSprite {
  const i =
    typeof insets === "number"
      ? { top: insets, right: insets, bottom: insets, left: insets }
      : insets;
  return { rect: r, insets: i, fill };
}

export function simpleWidgetSprite(sheet: SpritesheetId, s: Sprite): WidgetSprite {
  return { kind: "simple", sheet, sprite: s };
}

export function nineSliceWidgetSprite(sheet: SpritesheetId, s: NineSlicingSprite): WidgetSprite {
  return { kind: "nineSlice", sheet, sprite: s };
}

/** Size a sprite occupies on screen once rotated. */
export function rotatedSize(s: Size, rotate: Rotate): Size {
  return rotate === 90 || rotate === 270 ? { w: s.h, h: s.w } : { w: s.w, h: s.h };
}
