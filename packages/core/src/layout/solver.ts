/**
 * packages/core/src/layout/solver.ts — Two-pass layout solver.
 *
 * Pass 1 (measure, bottom-up): every live widget gets an intrinsic size from
 * its fixed dimensions, or from its content (children extent, simple sprite,
 * text) plus padding. "fill" measures like "hug" so that hugging ancestors
 * still see its content.
 *
 * Pass 2 (place, top-down): roots are placed in the viewport, children in
 * their parent's content box. Inside a flex parent, fill children split the
 * main-axis remainder equally and anchors only act on the cross axis.
 * Elsewhere a child is anchored in the content box and moved by its offset.
 *
 * Children are not clipped to their parent.
 */

import type { ContractGuard } from "../debug/devWarnings.js";
import { rotatedSize } from "../renderer/sprite.js";
import type { Widget, WidgetStore } from "../runtime/widgetStore.js";
import { WidgetFlags, type WidgetDim, hasFlag } from "../widgets/props.js";
import { anchorFractions, anchorOffset } from "./anchor.js";
import { type Rect, type Size, insetRect } from "./types.js";

export type LayoutResult = Readonly<{
  /** Widgets measured and placed this pass. */
  solved: number;
  /** Solved root rectangles in declaration order. */
  roots: readonly Rect[];
}>;

type Axis = "x" | "y";

/**
 * Split `total` into `count` integer shares. Shares differ by at most one
 * pixel; leftover pixels go to the lower indices.
 */
export function distributeEvenly(total: number, count: number): number[] {
  if (count <= 0) return [];
  const target = Number.isFinite(total) ? Math.max(0, Math.floor(total)) : 0;
  const base = Math.floor(target / count);
  const leftover = target - base * count;
  const out = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    out[i] = base + (i < leftover ? 1 : 0);
  }
  return out;
}

function dimOf(w: Widget, axis: Axis): WidgetDim {
  return axis === "x" ? w.props.size.w : w.props.size.h;
}

function lenOf(s: Size, axis: Axis): number {
  return axis === "x" ? s.w : s.h;
}

function offsetOf(w: Widget, axis: Axis): number {
  return axis === "x" ? w.props.offset.x : w.props.offset.y;
}

function toPixels(v: number): number {
  return Number.isFinite(v) ? Math.max(0, Math.trunc(v)) : 0;
}

/** Size of what the widget itself draws, used as a floor for hug sizing. */
function drawableSize(w: Widget): Size {
  const p = w.props;
  let dw = 0;
  let dh = 0;
  if (hasFlag(p.flags, WidgetFlags.DRAW_SPRITE) && p.sprite?.kind === "simple") {
    const s = rotatedSize(p.sprite.sprite, p.rotate);
    dw = s.w;
    dh = s.h;
  }
  if (hasFlag(p.flags, WidgetFlags.DRAW_TEXT) && p.text) {
    dw = Math.max(dw, p.text.size.w);
    dh = Math.max(dh, p.text.size.h);
  }
  return { w: dw, h: dh };
}

function contentExtent(w: Widget, children: readonly Widget[]): Size {
  const layout = w.props.layout;
  if (layout.kind === "flex") {
    const main: Axis = layout.direction === "horizontal" ? "x" : "y";
    let mainSum = 0;
    let cross = 0;
    for (const child of children) {
      mainSum += lenOf(child.intrinsic, main);
      cross = Math.max(cross, lenOf(child.intrinsic, main === "x" ? "y" : "x"));
    }
    if (children.length > 1) mainSum += toPixels(layout.gap) * (children.length - 1);
    return main === "x" ? { w: mainSum, h: cross } : { w: cross, h: mainSum };
  }

  let ew = 0;
  let eh = 0;
  for (const child of children) {
    ew = Math.max(ew, child.props.offset.x + child.intrinsic.w);
    eh = Math.max(eh, child.props.offset.y + child.intrinsic.h);
  }
  return { w: ew, h: eh };
}

function measure(store: WidgetStore, w: Widget): number {
  const children = store.liveChildren(w);
  let count = 1;
  for (const child of children) count += measure(store, child);

  const content = contentExtent(w, children);
  const own = drawableSize(w);
  const pad = w.props.padding;
  const hugW = Math.max(content.w, own.w) + pad.left + pad.right;
  const hugH = Math.max(content.h, own.h) + pad.top + pad.bottom;
  const dw = w.props.size.w;
  const dh = w.props.size.h;
  w.intrinsic = {
    w: typeof dw === "number" ? toPixels(dw) : toPixels(hugW),
    h: typeof dh === "number" ? toPixels(dh) : toPixels(hugH),
  };
  return count;
}

/** Length along `axis` when the parent offers `available`. */
function resolveLen(w: Widget, axis: Axis, available: number): number {
  const dim = dimOf(w, axis);
  if (dim === "fill") return Math.max(0, available);
  return lenOf(w.intrinsic, axis);
}

function anchored(parentLen: number, selfLen: number, w: Widget, axis: Axis): number {
  const o = anchorFractions(w.props.origin);
  const a = anchorFractions(w.props.anchor);
  return axis === "x"
    ? anchorOffset(parentLen, selfLen, o.fx, a.fx)
    : anchorOffset(parentLen, selfLen, o.fy, a.fy);
}

export type SolveContext = Readonly<{ store: WidgetStore; guard: ContractGuard }>;

function warnFillInHug(ctx: SolveContext, parent: Widget, child: Widget, axis: Axis): void {
  if (dimOf(parent, axis) === "hug" && dimOf(child, axis) === "fill") {
    ctx.guard.warnOnce(
      "layout",
      `fill-in-hug:${child.key}:${axis}`,
      `widget "${child.key}" fills along ${axis} inside hugging parent "${parent.key}"; it gets its content size`,
    );
  }
}

function placeFlexChildren(
  ctx: SolveContext,
  parent: Widget,
  content: Rect,
  children: readonly Widget[],
  main: Axis,
  gap: number,
): void {
  const cross: Axis = main === "x" ? "y" : "x";
  const mainAvail = lenOf(content, main);
  const crossAvail = lenOf(content, cross);

  let fixedSum = 0;
  let fillCount = 0;
  for (const child of children) {
    if (dimOf(child, main) === "fill") fillCount++;
    else fixedSum += lenOf(child.intrinsic, main);
  }
  const gaps = children.length > 1 ? gap * (children.length - 1) : 0;
  const shares = distributeEvenly(mainAvail - fixedSum - gaps, fillCount);

  let cursor = main === "x" ? content.x : content.y;
  let fillIndex = 0;
  for (const child of children) {
    warnFillInHug(ctx, parent, child, cross);
    let mainLen: number;
    if (dimOf(child, main) === "fill") {
      mainLen = shares[fillIndex] ?? 0;
      fillIndex++;
    } else {
      mainLen = lenOf(child.intrinsic, main);
    }
    const crossLen = resolveLen(child, cross, crossAvail);
    const crossStart = main === "x" ? content.y : content.x;
    const crossPos = crossStart + anchored(crossAvail, crossLen, child, cross) + offsetOf(child, cross);
    const mainPos = cursor + offsetOf(child, main);
    const r: Rect =
      main === "x"
        ? { x: mainPos, y: crossPos, w: mainLen, h: crossLen }
        : { x: crossPos, y: mainPos, w: crossLen, h: mainLen };
    place(ctx, child, r);
    cursor += mainLen + gap;
  }
}

function placeAnchored(ctx: SolveContext, w: Widget, content: Rect, parent: Widget | null): void {
  if (parent) {
    warnFillInHug(ctx, parent, w, "x");
    warnFillInHug(ctx, parent, w, "y");
  }
  const cw = resolveLen(w, "x", content.w);
  const ch = resolveLen(w, "y", content.h);
  place(ctx, w, {
    x: content.x + anchored(content.w, cw, w, "x") + w.props.offset.x,
    y: content.y + anchored(content.h, ch, w, "y") + w.props.offset.y,
    w: cw,
    h: ch,
  });
}

function place(ctx: SolveContext, w: Widget, r: Rect): void {
  w.rect = r;
  const children = ctx.store.liveChildren(w);
  if (children.length === 0) return;
  const content = insetRect(r, w.props.padding);
  const layout = w.props.layout;
  if (layout.kind === "flex") {
    const main: Axis = layout.direction === "horizontal" ? "x" : "y";
    placeFlexChildren(ctx, w, content, children, main, toPixels(layout.gap));
    return;
  }
  for (const child of children) {
    placeAnchored(ctx, child, content, w);
  }
}

/** Measure and place every live widget against `viewport`. */
export function solveLayout(ctx: SolveContext, viewport: Size): LayoutResult {
  const roots = ctx.store.roots();
  let solved = 0;
  for (const root of roots) solved += measure(ctx.store, root);

  const screen: Rect = { x: 0, y: 0, w: viewport.w, h: viewport.h };
  const rootRects: Rect[] = [];
  for (const root of roots) {
    placeAnchored(ctx, root, screen, null);
    rootRects.push(root.rect);
  }
  return { solved, roots: rootRects };
}
