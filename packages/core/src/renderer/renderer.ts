/**
 * packages/core/src/renderer/renderer.ts — Software compositor.
 *
 * Owns the output bitmap, the spritesheet registry and the font sheet, and
 * executes draw command lists against the output in order.
 *
 * Contract violations inside a command (unknown sheet, source rect outside
 * its sheet, insets larger than the sprite) throw in dev mode and skip the
 * command otherwise. Geometry outside the output is clipped silently.
 */

import { Bitmap, rectFits } from "../bitmap/bitmap.js";
import { type ContractGuard, createContractGuard } from "../debug/devWarnings.js";
import type { Rect } from "../layout/types.js";
import { over } from "../pixel/alphaComp.js";
import { type ResolvedRendererConfig, type RendererConfig, resolveRendererConfig } from "./config.js";
import type { DrawCommand, NineSliceCommand, SpriteCommand, TextCommand } from "./drawCommands.js";
import { blitNineSlice, blitSprite, fillRect, strokeRect } from "./primitives.js";
import type { NineSlicingSprite, SpritesheetId } from "./sprite.js";
import { type BitmapFontLayout, type Text, shapeText } from "./text.js";

export class Renderer {
  private readonly output: Bitmap;
  private readonly fontSheet: Bitmap;
  private readonly sheets: Bitmap[] = [];
  private readonly config: ResolvedRendererConfig;
  private readonly guard: ContractGuard;

  constructor(output: Bitmap, fontSheet: Bitmap, config?: RendererConfig) {
    this.output = output;
    this.fontSheet = fontSheet;
    this.config = resolveRendererConfig(config);
    this.guard = createContractGuard(this.config.devMode, this.config.warn);
  }

  /** Register a sheet; ids are handed out in order and never reused. */
  registerSpritesheet(bitmap: Bitmap): SpritesheetId {
    this.sheets.push(bitmap);
    return this.sheets.length - 1;
  }

  spritesheet(id: SpritesheetId): Bitmap | undefined {
    return this.sheets[id];
  }

  get spritesheetCount(): number {
    return this.sheets.length;
  }

  get font(): BitmapFontLayout {
    return this.config.font;
  }

  /** Shape a string against the font sheet. */
  text(source: string): Text {
    return shapeText(this.config.font, this.fontSheet.size, source);
  }

  /** The frame target, handed to the presentation layer after `draw`. */
  framebuffer(): Bitmap {
    return this.output;
  }

  draw(commands: readonly DrawCommand[]): void {
    for (const cmd of commands) {
      this.execute(cmd);
    }
  }

  private execute(cmd: DrawCommand): void {
    switch (cmd.kind) {
      case "clear":
        this.output.fill(cmd.color ?? this.config.clearColor);
        return;
      case "fillRect":
        fillRect(this.output, cmd.rect, cmd.color, cmd.comp ?? over);
        return;
      case "strokeRect":
        strokeRect(this.output, cmd.rect, cmd.color, cmd.width, cmd.comp ?? over);
        return;
      case "sprite":
        this.drawSprite(cmd);
        return;
      case "nineSlice":
        this.drawNineSlice(cmd);
        return;
      case "text":
        this.drawText(cmd);
        return;
    }
  }

  private resolveSheet(id: SpritesheetId): Bitmap | null {
    const sheet = this.sheets[id];
    if (sheet) return sheet;
    this.guard.violation(
      "render",
      {
        code: "PXUI_UNKNOWN_SPRITESHEET",
        detail: `spritesheet id ${String(id)} is not registered (${String(this.sheets.length)} known)`,
      },
      `sheet:${String(id)}`,
    );
    return null;
  }

  private checkSource(sheet: Bitmap, r: Rect, what: string): boolean {
    if (rectFits(r, sheet.width, sheet.height)) return true;
    this.guard.violation("render", {
      code: "PXUI_OUT_OF_BOUNDS",
      detail: `${what} rect ${String(r.x)},${String(r.y)} ${String(r.w)}x${String(r.h)} outside its ${String(sheet.width)}x${String(sheet.height)} sheet`,
    });
    return false;
  }

  private checkInsets(nss: NineSlicingSprite): boolean {
    const { rect: r, insets: i } = nss;
    const valid =
      i.top >= 0 &&
      i.right >= 0 &&
      i.bottom >= 0 &&
      i.left >= 0 &&
      i.left + i.right <= r.w &&
      i.top + i.bottom <= r.h;
    if (valid) return true;
    this.guard.violation("render", {
      code: "PXUI_INVALID_PROPS",
      detail: `nine-slice insets ${String(i.top)},${String(i.right)},${String(i.bottom)},${String(i.left)} do not fit a ${String(r.w)}x${String(r.h)} sprite`,
    });
    return false;
  }

  private drawSprite(cmd: SpriteCommand): void {
    const sheet = this.resolveSheet(cmd.sheet);
    if (!sheet || !this.checkSource(sheet, cmd.sprite, "sprite")) return;
    blitSprite(
      this.output,
      sheet,
      cmd.sprite,
      cmd.pos.x,
      cmd.pos.y,
      cmd.rotate ?? 0,
      cmd.mask,
      cmd.comp ?? over,
    );
  }

  private drawNineSlice(cmd: NineSliceCommand): void {
    const sheet = this.resolveSheet(cmd.sheet);
    if (!sheet || !this.checkSource(sheet, cmd.sprite.rect, "nine-slice")) return;
    if (!this.checkInsets(cmd.sprite)) return;
    blitNineSlice(this.output, sheet, cmd.sprite, cmd.rect, cmd.mask, cmd.comp ?? over);
  }

  private drawText(cmd: TextCommand): void {
    const comp = cmd.comp ?? over;
    for (const glyph of cmd.text.glyphs) {
      if (!this.checkSource(this.fontSheet, glyph.sprite, "glyph")) return;
      blitSprite(
        this.output,
        this.fontSheet,
        glyph.sprite,
        cmd.pos.x + glyph.x,
        cmd.pos.y + glyph.y,
        0,
        cmd.mask,
        comp,
      );
    }
  }
}
