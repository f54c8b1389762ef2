/**
 * packages/core/src/widgets/components.ts — Composite widgets.
 *
 * Prop constructors for single-drawable widgets and small widget groups built
 * from them (icon button, nine-slice button, digit readouts). Composite
 * helpers derive their inner keys from the key they are given, so several
 * instances can live side by side.
 */

import type { UiContext } from "../app/uiContext.js";
import { invalidProps } from "../errors.js";
import { Anchor } from "../layout/anchor.js";
import { type Color, colorFromHex } from "../pixel/color.js";
import {
  type NineSlicingSprite,
  type Sprite,
  type SpritesheetId,
  type WidgetSprite,
  nineSliceWidgetSprite,
  simpleWidgetSprite,
} from "../renderer/sprite.js";
import type { Text } from "../renderer/text.js";
import type { WidgetReaction } from "../runtime/reaction.js";
import { type WidgetKey, childKey } from "../runtime/widgetKey.js";
import {
  WidgetFlags,
  type WidgetId,
  type WidgetProps,
  type WidgetPropsInit,
  hflex,
  padAll,
  padHV,
  widgetProps,
} from "./props.js";

export function textProps(key: WidgetKey, text: Text, init?: WidgetPropsInit): WidgetProps {
  return widgetProps(key, { flags: WidgetFlags.DRAW_TEXT, text, ...init });
}

export function spriteProps(key: WidgetKey, sprite: WidgetSprite, init?: WidgetPropsInit): WidgetProps {
  return widgetProps(key, { flags: WidgetFlags.DRAW_SPRITE, sprite, ...init });
}

export function simpleSpriteProps(
  key: WidgetKey,
  sheet: SpritesheetId,
  s: Sprite,
  init?: WidgetPropsInit,
): WidgetProps {
  return spriteProps(key, simpleWidgetSprite(sheet, s), init);
}

export function nineSliceSpriteProps(
  key: WidgetKey,
  sheet: SpritesheetId,
  s: NineSlicingSprite,
  init?: WidgetPropsInit,
): WidgetProps {
  return spriteProps(key, nineSliceWidgetSprite(sheet, s), init);
}

const BUTTON_FLAGS = WidgetFlags.CAN_FOCUS | WidgetFlags.CAN_HOVER | WidgetFlags.CAN_CLICK;

/**
 * Button with a background and a centered icon. The background switches to
 * `hoverColor` while hovered.
 */
export function btnIcon(
  ui: UiContext,
  props: WidgetProps,
  icon: WidgetProps,
  hoverColor: Color,
): WidgetReaction {
  const button = ui.buildWidget({
    ...props,
    flags: props.flags | BUTTON_FLAGS | WidgetFlags.DRAW_BACKGROUND,
  });
  const inner = ui.buildWidget({ ...icon, anchor: Anchor.CENTER, origin: Anchor.CENTER });
  ui.addChild(button.id, inner.id);

  if (button.hovered) {
    ui.patchProps(button.id, { color: hoverColor });
  }
  return button;
}

/**
 * Nine-slice button wrapping an already declared `child`. While pressed and
 * hovered it shows `pressedSprite` and both button and child paint one pixel
 * down and to the right.
 */
export function btnBox(
  ui: UiContext,
  props: WidgetProps,
  normalSprite: WidgetSprite,
  pressedSprite: WidgetSprite,
  child: WidgetId,
): WidgetReaction {
  const button = ui.buildWidget({
    ...props,
    flags: BUTTON_FLAGS | WidgetFlags.DRAW_SPRITE,
    sprite: normalSprite,
  });
  ui.addChild(button.id, child);

  if (button.pressed && button.hovered) {
    const pushed = { x: 1, y: 1 };
    ui.patchProps(button.id, { sprite: pressedSprite, drawOffset: pushed });
    ui.patchProps(child, { drawOffset: pushed });
  }
  return button;
}

function requireDigitSprites(digits: readonly Sprite[]): void {
  if (digits.length !== 10) {
    invalidProps(`digit sprite table must hold 10 sprites (got ${String(digits.length)})`);
  }
}

function digitSprite(digits: readonly Sprite[], d: number): Sprite {
  const s = digits[d];
  if (!s) return invalidProps(`no sprite for digit ${String(d)}`);
  return s;
}

export type DigitsDisplayOptions = Readonly<{
  sheet: SpritesheetId;
  box: NineSlicingSprite;
  /** Drawn in every slot; digits sit on top of it. */
  placeholder: Sprite;
  /** Sprites for 0..9. */
  digits: readonly Sprite[];
}>;

/**
 * Three-digit counter in a nine-slice box. Leading zeros are left blank,
 * showing only the placeholder, so 0 shows no digit at all. Values wrap at
 * 1000.
 */
export function bigDigitsDisplay(
  ui: UiContext,
  key: WidgetKey,
  n: number,
  opts: DigitsDisplayOptions,
): WidgetReaction {
  requireDigitSprites(opts.digits);
  const value = Math.max(0, Math.trunc(n));
  const display = ui.buildWidget(
    nineSliceSpriteProps(key, opts.sheet, opts.box, { layout: hflex(2), padding: padHV(3, 2) }),
  );

  const places: ReadonlyArray<readonly [number, number]> = [
    [2, Math.floor(value / 100) % 10],
    [1, Math.floor(value / 10) % 10],
    [0, value % 10],
  ];
  let shown = false;
  for (const [place, d] of places) {
    const holder = ui.buildWidget(
      simpleSpriteProps(childKey(key, "slot", place), opts.sheet, opts.placeholder),
    );
    if (shown || d > 0) {
      const digit = ui.buildWidget(
        simpleSpriteProps(childKey(key, "digit", place), opts.sheet, digitSprite(opts.digits, d)),
      );
      ui.addChild(holder.id, digit.id);
      shown = true;
    }
    ui.addChild(display.id, holder.id);
  }
  return display;
}

export const TIME_BRIGHT: Color = colorFromHex(0xff99e550);
export const TIME_DIMMED: Color = colorFromHex(0xff64a328);

export type TimeDisplayOptions = Readonly<{
  sheet: SpritesheetId;
  box: NineSlicingSprite;
  colon: Sprite;
  digits: readonly Sprite[];
  /** Mask for minutes and seconds. */
  bright?: Color;
  /** Mask for milliseconds and the colon before them. */
  dimmed?: Color;
}>;

/** `MM:SS:mmm` readout for a duration in milliseconds. Minutes wrap at 60. */
export function timeDisplay(
  ui: UiContext,
  key: WidgetKey,
  elapsedMs: number,
  opts: TimeDisplayOptions,
): WidgetReaction {
  requireDigitSprites(opts.digits);
  const bright = opts.bright ?? TIME_BRIGHT;
  const dimmed = opts.dimmed ?? TIME_DIMMED;
  const ms = Math.max(0, Math.trunc(elapsedMs));
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60) % 60;
  const seconds = totalSeconds % 60;
  const millis = ms % 1000;

  const display = ui.buildWidget(
    nineSliceSpriteProps(key, opts.sheet, opts.box, { layout: hflex(1), padding: padAll(2) }),
  );

  const digit = (group: string, place: number, d: number, mask: Color): void => {
    const w = ui.buildWidget(
      simpleSpriteProps(childKey(key, group, place), opts.sheet, digitSprite(opts.digits, d), {
        mask,
      }),
    );
    ui.addChild(display.id, w.id);
  };
  const colon = (index: number, mask: Color): void => {
    const w = ui.buildWidget(simpleSpriteProps(childKey(key, "colon", index), opts.sheet, opts.colon, { mask }));
    ui.addChild(display.id, w.id);
  };

  digit("min", 1, Math.floor(minutes / 10) % 10, bright);
  digit("min", 0, minutes % 10, bright);
  colon(0, bright);
  digit("sec", 1, Math.floor(seconds / 10) % 10, bright);
  digit("sec", 0, seconds % 10, bright);
  colon(1, dimmed);
  digit("ms", 2, Math.floor(millis / 100) % 10, dimmed);
  digit("ms", 1, Math.floor(millis / 10) % 10, dimmed);
  digit("ms", 0, millis % 10, dimmed);

  return display;
}
