/**
 * packages/core/src/app/uiContext.ts — Retained widget tree driven by an
 * immediate-mode frame loop.
 *
 * Frame order:
 *   1. buildWidget / addChild / patchProps  (declare this frame's tree)
 *   2. solveLayout                           (measure + place)
 *   3. drawWidgets                           (emit draw commands)
 *   4. freeUntouchedWidgets                  (drop what was not declared)
 *   5. react                                 (pointer input against the solved tree)
 *
 * Reactions computed in step 5 are what `buildWidget` returns during the
 * next frame's step 1.
 */

import { type ContractGuard, createContractGuard } from "../debug/devWarnings.js";
import type { PxUiErrorCode } from "../errors.js";
import { type LayoutResult, solveLayout } from "../layout/solver.js";
import type { Size } from "../layout/types.js";
import type { DrawCommand } from "../renderer/drawCommands.js";
import { drawWidgets } from "../renderer/drawWidgets.js";
import { requestPendingFocusChange } from "../runtime/focus.js";
import {
  type Mouse,
  type ReactionState,
  type WidgetReaction,
  createReactionState,
  forgetWidgets,
  react,
  reactionOf,
} from "../runtime/reaction.js";
import {
  type FrameDiff,
  type KeyReconciler,
  createKeyReconciler,
  createWidgetIdAllocator,
} from "../runtime/reconcile.js";
import type { WidgetKey } from "../runtime/widgetKey.js";
import { type Widget, WidgetStore, type WidgetView } from "../runtime/widgetStore.js";
import {
  WidgetFlags,
  type WidgetId,
  type WidgetProps,
  type WidgetPropsInit,
  hasFlag,
  mergeProps,
} from "../widgets/props.js";
import { type ResolvedUiConfig, type UiConfig, resolveUiConfig, resolveViewport } from "./config.js";

export class UiContext {
  private readonly config: ResolvedUiConfig;
  private readonly guard: ContractGuard;
  private readonly store = new WidgetStore();
  private readonly keys: KeyReconciler = createKeyReconciler(createWidgetIdAllocator());
  private readonly reaction: ReactionState = createReactionState();
  private viewportSize: Size;

  constructor(config: UiConfig) {
    this.config = resolveUiConfig(config);
    this.guard = createContractGuard(this.config.devMode, this.config.warn);
    this.viewportSize = this.config.viewport;
  }

  get frame(): number {
    return this.store.frame;
  }

  get viewport(): Size {
    return this.viewportSize;
  }

  /** Resize the root layout area; takes effect on the next layout pass. */
  setViewport(viewport: Size): void {
    this.viewportSize = resolveViewport(viewport);
  }

  get widgetCount(): number {
    return this.store.size;
  }

  /**
   * Declare a widget for this frame. Returns the reaction state computed by
   * the previous `react` call.
   */
  buildWidget(props: WidgetProps): WidgetReaction {
    this.store.beginDeclaration();
    const claim = this.keys.claim(props.key);
    let id: WidgetId;
    if (claim.ok) {
      id = claim.value.id;
    } else {
      this.guard.violation("tree", claim.fatal, `duplicate:${props.key}`);
      id = claim.id;
    }
    return reactionOf(this.store.declare(id, props));
  }

  /** Append `child` to `parent`'s children for this frame. */
  addChild(parent: WidgetId, child: WidgetId): void {
    const p = this.liveWidget(parent, "addChild");
    const c = this.liveWidget(child, "addChild");
    if (!p || !c) return;
    if (this.store.isAncestor(c, p)) {
      this.fail(
        "PXUI_INVALID_STATE",
        `addChild: widget ${String(child)} is ${child === parent ? "the parent itself" : "an ancestor of"} ${String(parent)}`,
      );
      return;
    }
    this.store.attach(p, c);
  }

  /** Update props of a widget declared this frame; the key never changes. */
  patchProps(id: WidgetId, patch: WidgetPropsInit): void {
    const w = this.existingWidget(id, "patchProps");
    if (!w) return;
    w.props = mergeProps(w.props, patch);
  }

  hasWidget(id: WidgetId): boolean {
    return this.store.get(id) !== undefined;
  }

  getWidget(id: WidgetId): WidgetView | undefined {
    return this.existingWidget(id, "getWidget") ?? undefined;
  }

  reactionFor(id: WidgetId): WidgetReaction | undefined {
    const w = this.existingWidget(id, "reactionFor");
    return w ? reactionOf(w) : undefined;
  }

  /** Id bound to `key` in this frame or the previous one. */
  lookup(key: WidgetKey): WidgetId | undefined {
    const id = this.keys.lookup(key);
    return id !== undefined && this.store.get(id) ? id : undefined;
  }

  /** Live roots in declaration order. */
  roots(): readonly WidgetId[] {
    return this.store.roots().map((w) => w.id);
  }

  solveLayout(): LayoutResult {
    const result = solveLayout({ store: this.store, guard: this.guard }, this.viewportSize);
    this.config.onLayout?.({
      frame: this.store.frame,
      solvedWidgets: result.solved,
      roots: result.roots,
    });
    return result;
  }

  drawWidgets(out: DrawCommand[]): void {
    drawWidgets(this.store, out);
  }

  /** Free every widget not declared this frame and close the frame. */
  freeUntouchedWidgets(): FrameDiff {
    const diff = this.keys.commit();
    if (diff.freed.length > 0) {
      this.store.release(diff.freed);
      forgetWidgets(this.reaction, new Set(diff.freed));
    }
    this.store.endFrame();
    return diff;
  }

  react(mouse: Mouse): void {
    react(this.reaction, this.store, mouse);
  }

  get focusedId(): WidgetId | null {
    return this.reaction.focus.focusedId;
  }

  /** Focus `id` at the start of the next reaction pass. */
  requestFocus(id: WidgetId): void {
    const w = this.existingWidget(id, "requestFocus");
    if (!w) return;
    if (!hasFlag(w.props.flags, WidgetFlags.CAN_FOCUS)) {
      this.fail("PXUI_INVALID_STATE", `requestFocus: widget "${w.key}" is not focusable`);
      return;
    }
    this.reaction.focus = requestPendingFocusChange(this.reaction.focus, id);
  }

  /** Clear focus at the start of the next reaction pass. */
  clearFocus(): void {
    this.reaction.focus = requestPendingFocusChange(this.reaction.focus, null);
  }

  private fail(code: PxUiErrorCode, detail: string): void {
    this.guard.violation("tree", { code, detail });
  }

  private existingWidget(id: WidgetId, op: string): Widget | null {
    const w = this.store.get(id);
    if (w) return w;
    this.fail("PXUI_STALE_WIDGET", `${op}: widget id ${String(id)} does not exist`);
    return null;
  }

  private liveWidget(id: WidgetId, op: string): Widget | null {
    const w = this.existingWidget(id, op);
    if (!w) return null;
    if (this.store.isLive(w)) return w;
    this.fail("PXUI_STALE_WIDGET", `${op}: widget "${w.key}" was not declared this frame`);
    return null;
  }
}
