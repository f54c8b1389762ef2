/**
 * packages/core/src/renderer/drawCommands.ts — Draw command definitions.
 *
 * Commands are plain data executed strictly in order by the Renderer; later
 * commands paint over earlier ones. `comp` defaults to `over` and `mask`
 * replaces the source RGB while keeping its alpha.
 */

import type { Pos, Rect } from "../layout/types.js";
import type { AlphaCompFn } from "../pixel/alphaComp.js";
import type { Color } from "../pixel/color.js";
import type { NineSlicingSprite, Rotate, Sprite, SpritesheetId } from "./sprite.js";
import type { Text } from "./text.js";

export type ClearCommand = Readonly<{
  kind: "clear";
  /** Defaults to the renderer's configured clear color. */
  color?: Color | undefined;
}>;

export type SpriteCommand = Readonly<{
  kind: "sprite";
  sheet: SpritesheetId;
  sprite: Sprite;
  pos: Pos;
  rotate?: Rotate | undefined;
  mask?: Color | undefined;
  comp?: AlphaCompFn | undefined;
}>;

export type NineSliceCommand = Readonly<{
  kind: "nineSlice";
  sheet: SpritesheetId;
  sprite: NineSlicingSprite;
  rect: Rect;
  mask?: Color | undefined;
  comp?: AlphaCompFn | undefined;
}>;

export type TextCommand = Readonly<{
  kind: "text";
  text: Text;
  pos: Pos;
  mask?: Color | undefined;
  comp?: AlphaCompFn | undefined;
}>;

export type FillRectCommand = Readonly<{
  kind: "fillRect";
  rect: Rect;
  color: Color;
  comp?: AlphaCompFn | undefined;
}>;

export type StrokeRectCommand = Readonly<{
  kind: "strokeRect";
  rect: Rect;
  color: Color;
  width: number;
  comp?: AlphaCompFn | undefined;
}>;

export type DrawCommand =
  | ClearCommand
  | SpriteCommand
  | NineSliceCommand
  | TextCommand
  | FillRectCommand
  | StrokeRectCommand;

export type DrawCommandKind = DrawCommand["kind"];
