/**
 * packages/core/src/widgets/props.ts — Widget declaration data.
 *
 * Everything a widget is re-declared with each frame: identity key, behavior
 * flags, sizing, padding, child layout, anchoring, colors and optional
 * drawables. Props are plain immutable data; `widgetProps` fills defaults.
 */

import { Anchor } from "../layout/anchor.js";
import { type Insets, type Pos, ZERO_INSETS, ZERO_POS } from "../layout/types.js";
import type { AlphaCompFn } from "../pixel/alphaComp.js";
import { type Color, TRANSPARENT } from "../pixel/color.js";
import type { Rotate, WidgetSprite } from "../renderer/sprite.js";
import type { Text } from "../renderer/text.js";
import type { WidgetKey } from "../runtime/widgetKey.js";

/** Arena handle for a live widget. Never reused after the widget is freed. */
export type WidgetId = number;

/** Behavior bits. Combine with `|`. */
export const WidgetFlags = Object.freeze({
  NONE: 0,
  DRAW_BACKGROUND: 1 << 0,
  DRAW_BORDER: 1 << 1,
  DRAW_SPRITE: 1 << 2,
  DRAW_TEXT: 1 << 3,
  CAN_HOVER: 1 << 4,
  CAN_CLICK: 1 << 5,
  CAN_FOCUS: 1 << 6,
} as const);

export function hasFlag(flags: number, flag: number): boolean {
  return (flags & flag) !== 0;
}

/**
 * One axis of a widget size.
 * - number: exact pixels
 * - "fill": take what the parent offers
 * - "hug": fit content plus padding
 */
export type WidgetDim = number | "fill" | "hug";

export type WidgetSize = Readonly<{ w: WidgetDim; h: WidgetDim }>;

export type FlexDirection = "horizontal" | "vertical";

/** How a widget arranges its children. */
export type WidgetLayout =
  | Readonly<{ kind: "none" }>
  | Readonly<{ kind: "flex"; direction: FlexDirection; gap: number }>;

export type WidgetProps = Readonly<{
  key: WidgetKey;
  flags: number;
  size: WidgetSize;
  padding: Insets;
  layout: WidgetLayout;
  /** Point of this widget placed on `origin`. */
  anchor: Anchor;
  /** Point of the parent content box this widget is placed on. */
  origin: Anchor;
  /** Layout offset; moves the widget and its subtree. */
  offset: Pos;
  /** Paint-only offset; layout and children are unaffected. */
  drawOffset: Pos;
  /** Background color. */
  color: Color;
  borderColor: Color;
  borderWidth: number;
  sprite: WidgetSprite | undefined;
  text: Text | undefined;
  rotate: Rotate;
  /** Replaces the RGB of the sprite and text while keeping their alpha. */
  mask: Color | undefined;
  comp: AlphaCompFn | undefined;
}>;

/** Fields that may be set at declaration time or patched afterwards. */
export type WidgetPropsInit = Partial<Omit<WidgetProps, "key">>;

export const HUG_SIZE: WidgetSize = Object.freeze({ w: "hug", h: "hug" });
export const FILL_SIZE: WidgetSize = Object.freeze({ w: "fill", h: "fill" });
export const NO_LAYOUT: WidgetLayout = Object.freeze({ kind: "none" });

export function fixedSize(w: number, h: number): WidgetSize {
  return { w, h };
}

export function fillSize(): WidgetSize {
  return FILL_SIZE;
}

export function hugSize(): WidgetSize {
  return HUG_SIZE;
}

export function padAll(v: number): Insets {
  return { top: v, right: v, bottom: v, left: v };
}

/** Horizontal and vertical padding. */
export function padHV(h: number, v: number): Insets {
  return { top: v, right: h, bottom: v, left: h };
}

export function padTRBL(top: number, right: number, bottom: number, left: number): Insets {
  return { top, right, bottom, left };
}

export function hflex(gap = 0): WidgetLayout {
  return { kind: "flex", direction: "horizontal", gap };
}

export function vflex(gap = 0): WidgetLayout {
  return { kind: "flex", direction: "vertical", gap };
}

/** Apply `init` over `base`, ignoring fields set to undefined for required props. */
export function mergeProps(base: WidgetProps, init: WidgetPropsInit | undefined): WidgetProps {
  if (!init) return base;
  return {
    key: base.key,
    flags: init.flags ?? base.flags,
    size: init.size ?? base.size,
    padding: init.padding ?? base.padding,
    layout: init.layout ?? base.layout,
    anchor: init.anchor ?? base.anchor,
    origin: init.origin ?? base.origin,
    offset: init.offset ?? base.offset,
    drawOffset: init.drawOffset ?? base.drawOffset,
    color: init.color ?? base.color,
    borderColor: init.borderColor ?? base.borderColor,
    borderWidth: init.borderWidth ?? base.borderWidth,
    sprite: "sprite" in init ? init.sprite : base.sprite,
    text: "text" in init ? init.text : base.text,
    rotate: init.rotate ?? base.rotate,
    mask: "mask" in init ? init.mask : base.mask,
    comp: "comp" in init ? init.comp : base.comp,
  };
}

/** Props for `key` with defaults: hug size, no layout, top-left anchoring, nothing drawn. */
export function widgetProps(key: WidgetKey, init?: WidgetPropsInit): WidgetProps {
  const base: WidgetProps = {
    key,
    flags: WidgetFlags.NONE,
    size: HUG_SIZE,
    padding: ZERO_INSETS,
    layout: NO_LAYOUT,
    anchor: Anchor.TOP_LEFT,
    origin: Anchor.TOP_LEFT,
    offset: ZERO_POS,
    drawOffset: ZERO_POS,
    color: TRANSPARENT,
    borderColor: TRANSPARENT,
    borderWidth: 0,
    sprite: undefined,
    text: undefined,
    rotate: 0,
    mask: undefined,
    comp: undefined,
  };
  return mergeProps(base, init);
}
