/**
 * packages/core/src/runtime/widgetStore.ts — Widget arena.
 *
 * Owns every widget record by id. A widget is "live" when it was declared in
 * the current frame; layout, drawing and hit testing only ever walk live
 * widgets, starting from the live roots in declaration order.
 *
 * The frame counter opens lazily on the first declaration after a commit, so
 * the reaction pass that follows `freeUntouchedWidgets` still sees the frame
 * that was just built.
 */

import { type Rect, type Size, ZERO_RECT, ZERO_SIZE } from "../layout/types.js";
import type { WidgetId, WidgetProps } from "../widgets/props.js";
import type { WidgetKey } from "./widgetKey.js";

/** Mutable interaction state written by the reaction pass. */
export type WidgetInteraction = {
  hovered: boolean;
  /** Mouse buttons whose press started on this widget and is still held. */
  pressedButtons: number;
  /** Mouse buttons released this reaction pass after pressing this widget. */
  clickedButtons: number;
  focused: boolean;
};

export type Widget = {
  readonly id: WidgetId;
  readonly key: WidgetKey;
  props: WidgetProps;
  parent: WidgetId | null;
  children: WidgetId[];
  /** Frame in which `children` was last rebuilt by addChild. */
  childrenFrame: number;
  /** Frame in which the widget was last declared. */
  frame: number;
  /** Measured size from the last layout pass. */
  intrinsic: Size;
  /** Solved rectangle from the last layout pass. */
  rect: Rect;
  interaction: WidgetInteraction;
};

/** Read-only view handed out to callers. */
export type WidgetView = Readonly<{
  id: WidgetId;
  key: WidgetKey;
  props: WidgetProps;
  parent: WidgetId | null;
  children: readonly WidgetId[];
  intrinsic: Size;
  rect: Rect;
  interaction: Readonly<WidgetInteraction>;
}>;

function createInteraction(): WidgetInteraction {
  return { hovered: false, pressedButtons: 0, clickedButtons: 0, focused: false };
}

export class WidgetStore {
  private readonly widgets = new Map<WidgetId, Widget>();
  private currentFrame = 0;
  private frameOpen = false;
  private declared: WidgetId[] = [];

  get frame(): number {
    return this.currentFrame;
  }

  get size(): number {
    return this.widgets.size;
  }

  /** Open a new frame if the previous one was committed. */
  beginDeclaration(): void {
    if (this.frameOpen) return;
    this.frameOpen = true;
    this.currentFrame++;
    this.declared = [];
  }

  /** Close the frame; the next declaration opens a new one. */
  endFrame(): void {
    this.frameOpen = false;
  }

  get(id: WidgetId): Widget | undefined {
    return this.widgets.get(id);
  }

  isLive(w: Widget): boolean {
    return w.frame === this.currentFrame;
  }

  /** Create or refresh the record for `id` and mark it declared this frame. */
  declare(id: WidgetId, props: WidgetProps): Widget {
    let w = this.widgets.get(id);
    if (!w) {
      w = {
        id,
        key: props.key,
        props,
        parent: null,
        children: [],
        childrenFrame: 0,
        frame: 0,
        intrinsic: ZERO_SIZE,
        rect: ZERO_RECT,
        interaction: createInteraction(),
      };
      this.widgets.set(id, w);
    }
    w.props = props;
    if (w.frame !== this.currentFrame) {
      w.frame = this.currentFrame;
      this.declared.push(id);
    }
    return w;
  }

  /**
   * Append `child` to `parent`. The first call for a parent within a frame
   * replaces its previous child list.
   */
  attach(parent: Widget, child: Widget): void {
    this.breakStaleCycle(parent, child);
    if (parent.childrenFrame !== this.currentFrame) {
      for (const oldId of parent.children) {
        const old = this.widgets.get(oldId);
        if (old && old.parent === parent.id) old.parent = null;
      }
      parent.children = [];
      parent.childrenFrame = this.currentFrame;
    }
    if (child.parent !== null && child.parent !== parent.id) {
      const prevParent = this.widgets.get(child.parent);
      if (prevParent) prevParent.children = prevParent.children.filter((id) => id !== child.id);
    }
    if (child.parent === parent.id) {
      parent.children = parent.children.filter((id) => id !== child.id);
    }
    child.parent = parent.id;
    parent.children.push(child.id);
  }

  /**
   * If `child` is still an ancestor of `parent` through a link kept from an
   * earlier frame, cut that link so the new edge does not close a cycle.
   */
  private breakStaleCycle(parent: Widget, child: Widget): void {
    let below = parent;
    let up = below.parent === null ? undefined : this.widgets.get(below.parent);
    while (up) {
      if (up.id === child.id) {
        up.children = up.children.filter((id) => id !== below.id);
        below.parent = null;
        return;
      }
      below = up;
      up = below.parent === null ? undefined : this.widgets.get(below.parent);
    }
  }

  /**
   * True if `ancestor` is `w` or one of its parents. Only links made by this
   * frame's attach calls count; links left from earlier frames are about to
   * be replaced.
   */
  isAncestor(ancestor: Widget, w: Widget): boolean {
    let cursor: Widget | undefined = w;
    while (cursor) {
      if (cursor.id === ancestor.id) return true;
      cursor = this.currentParent(cursor);
    }
    return false;
  }

  private currentParent(w: Widget): Widget | undefined {
    if (w.parent === null) return undefined;
    const parent = this.widgets.get(w.parent);
    if (!parent || !this.isLive(parent) || parent.childrenFrame !== this.currentFrame) return undefined;
    return parent;
  }

  /** Live children of `w` in declaration order. */
  liveChildren(w: Widget): Widget[] {
    const out: Widget[] = [];
    for (const id of w.children) {
      const child = this.widgets.get(id);
      if (child && this.isLive(child) && child.parent === w.id) out.push(child);
    }
    return out;
  }

  /** Live widgets without a live parent, in declaration order. */
  roots(): Widget[] {
    const out: Widget[] = [];
    for (const id of this.declared) {
      const w = this.widgets.get(id);
      if (!w || !this.isLive(w)) continue;
      const parent = w.parent === null ? undefined : this.widgets.get(w.parent);
      if (!parent || !this.isLive(parent)) out.push(w);
    }
    return out;
  }

  /** Ids declared in the current frame, in order. */
  declaredIds(): readonly WidgetId[] {
    return this.declared;
  }

  /** Remove the given widgets and unlink them from surviving neighbours. */
  release(ids: readonly WidgetId[]): void {
    const removed: Widget[] = [];
    for (const id of ids) {
      const w = this.widgets.get(id);
      if (!w) continue;
      this.widgets.delete(id);
      removed.push(w);
    }
    for (const w of removed) {
      if (w.parent !== null) {
        const parent = this.widgets.get(w.parent);
        if (parent) parent.children = parent.children.filter((id) => id !== w.id);
      }
      for (const childId of w.children) {
        const child = this.widgets.get(childId);
        if (child && child.parent === w.id) child.parent = null;
      }
    }
  }

  values(): IterableIterator<Widget> {
    return this.widgets.values();
  }
}
