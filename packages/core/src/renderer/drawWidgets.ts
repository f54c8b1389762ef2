/**
 * packages/core/src/renderer/drawWidgets.ts — Widget tree to draw commands.
 *
 * Walks live widgets in depth-first preorder (roots in declaration order,
 * children in order) so parents paint beneath their children. Each widget
 * emits, when its flags ask for them: background, sprite, text, border.
 * Everything is drawn at the solved rect shifted by `drawOffset`.
 */

import type { Rect } from "../layout/types.js";
import type { Widget, WidgetStore } from "../runtime/widgetStore.js";
import { WidgetFlags, hasFlag } from "../widgets/props.js";
import type { DrawCommand } from "./drawCommands.js";

function paintRect(w: Widget): Rect {
  const { rect: r, props } = w;
  return { x: r.x + props.drawOffset.x, y: r.y + props.drawOffset.y, w: r.w, h: r.h };
}

function emitWidget(w: Widget, out: DrawCommand[]): void {
  const p = w.props;
  const r = paintRect(w);

  if (hasFlag(p.flags, WidgetFlags.DRAW_BACKGROUND)) {
    out.push({ kind: "fillRect", rect: r, color: p.color, comp: p.comp });
  }

  if (hasFlag(p.flags, WidgetFlags.DRAW_SPRITE) && p.sprite) {
    const s = p.sprite;
    if (s.kind === "simple") {
      out.push({
        kind: "sprite",
        sheet: s.sheet,
        sprite: s.sprite,
        pos: { x: r.x, y: r.y },
        rotate: p.rotate,
        mask: p.mask,
        comp: p.comp,
      });
    } else {
      out.push({ kind: "nineSlice", sheet: s.sheet, sprite: s.sprite, rect: r, mask: p.mask, comp: p.comp });
    }
  }

  if (hasFlag(p.flags, WidgetFlags.DRAW_TEXT) && p.text) {
    out.push({ kind: "text", text: p.text, pos: { x: r.x, y: r.y }, mask: p.mask, comp: p.comp });
  }

  if (hasFlag(p.flags, WidgetFlags.DRAW_BORDER) && p.borderWidth > 0) {
    out.push({ kind: "strokeRect", rect: r, color: p.borderColor, width: p.borderWidth, comp: p.comp });
  }
}

function visit(store: WidgetStore, w: Widget, out: DrawCommand[]): void {
  emitWidget(w, out);
  for (const child of store.liveChildren(w)) {
    visit(store, child, out);
  }
}

/** Append draw commands for every live widget to `out`. */
export function drawWidgets(store: WidgetStore, out: DrawCommand[]): void {
  for (const root of store.roots()) {
    visit(store, root, out);
  }
}
