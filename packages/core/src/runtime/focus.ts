/**
 * packages/core/src/runtime/focus.ts — Focus state management.
 *
 * Focus rules:
 *   - A left click on a CAN_FOCUS widget focuses it
 *   - Focus persists across frames until another focusable widget is
 *     clicked, focus is cleared, or the focused widget is freed
 *   - Programmatic changes are queued and applied at the start of the next
 *     reaction pass, so reactions read during a build stay consistent
 */

import { WidgetFlags, type WidgetId, hasFlag } from "../widgets/props.js";
import type { WidgetStore } from "./widgetStore.js";

/**
 * Focus carried between reaction passes. A `requestFocus` or `clearFocus`
 * call parks its target in `pendingFocusedId` until the next pass starts.
 */
export type FocusState = Readonly<{
  focusedId: WidgetId | null;
  /** Absent: nothing queued. `null`: focus is cleared on the next pass. */
  pendingFocusedId?: WidgetId | null;
}>;

export function createFocusState(): FocusState {
  return Object.freeze({ focusedId: null });
}

/** Queue `target` (or `null` to clear); the current focus stays until the next reaction pass. */
export function requestPendingFocusChange(state: FocusState, target: WidgetId | null): FocusState {
  return Object.freeze({ focusedId: state.focusedId, pendingFocusedId: target });
}

/** Start of a reaction pass: a queued target replaces the focus. */
export function applyPendingFocusChange(state: FocusState): FocusState {
  if (state.pendingFocusedId === undefined) return state;
  return Object.freeze({ focusedId: state.pendingFocusedId });
}

/** Drop focus that points at a missing or no longer focusable widget. */
export function validateFocus(state: FocusState, store: WidgetStore): FocusState {
  if (state.focusedId === null) return state;
  const w = store.get(state.focusedId);
  if (w && hasFlag(w.props.flags, WidgetFlags.CAN_FOCUS)) return state;
  return Object.freeze({ focusedId: null, pendingFocusedId: state.pendingFocusedId });
}

/** Mirror `state` into the widgets' `focused` flags. */
export function syncFocusFlags(prev: FocusState, next: FocusState, store: WidgetStore): void {
  if (prev.focusedId !== null && prev.focusedId !== next.focusedId) {
    const old = store.get(prev.focusedId);
    if (old) old.interaction.focused = false;
  }
  if (next.focusedId !== null) {
    const cur = store.get(next.focusedId);
    if (cur) cur.interaction.focused = true;
  }
}
