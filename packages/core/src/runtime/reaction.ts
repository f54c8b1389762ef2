/**
 * packages/core/src/runtime/reaction.ts — Pointer reaction pass.
 *
 * Turns one mouse snapshot into per-widget interaction state:
 *   - hovered: the topmost interactive widget under the pointer, if CAN_HOVER
 *   - pressed: a press edge on a CAN_CLICK widget captures that button; the
 *     widget stays pressed while the button is held, even off the widget
 *   - clicked: set for exactly one pass when a captured button is released,
 *     wherever the pointer is at that moment
 *   - focused: see focus.ts
 *
 * `clicked` is a one-pass pulse: it is cleared at the start of the next pass.
 */

import { hitTest } from "../layout/hitTest.js";
import type { Pos } from "../layout/types.js";
import { WidgetFlags, type WidgetId, hasFlag } from "../widgets/props.js";
import {
  type FocusState,
  applyPendingFocusChange,
  createFocusState,
  syncFocusFlags,
  validateFocus,
} from "./focus.js";
import type { Widget, WidgetStore } from "./widgetStore.js";

export const MouseButton = Object.freeze({
  LEFT: 1 << 0,
  MIDDLE: 1 << 1,
  RIGHT: 1 << 2,
} as const);

export type MouseButton = (typeof MouseButton)[keyof typeof MouseButton];

const BUTTONS: readonly MouseButton[] = Object.freeze([
  MouseButton.LEFT,
  MouseButton.MIDDLE,
  MouseButton.RIGHT,
]);

/**
 * Mouse snapshot for one frame. `pos` is null when the pointer is outside
 * the window; `buttons` and `prevButtons` are MouseButton bitmasks for this
 * frame and the one before it.
 */
export type Mouse = Readonly<{
  pos: Pos | null;
  buttons: number;
  prevButtons: number;
}>;

export const IDLE_MOUSE: Mouse = Object.freeze({ pos: null, buttons: 0, prevButtons: 0 });

/** Next snapshot; the previous frame's buttons become `prevButtons`. */
export function nextMouse(prev: Mouse, pos: Pos | null, buttons: number): Mouse {
  return { pos, buttons, prevButtons: prev.buttons };
}

export function pressedEdge(mouse: Mouse, button: MouseButton): boolean {
  return (mouse.buttons & button) !== 0 && (mouse.prevButtons & button) === 0;
}

export function releasedEdge(mouse: Mouse, button: MouseButton): boolean {
  return (mouse.buttons & button) === 0 && (mouse.prevButtons & button) !== 0;
}

/** Public per-widget view of interaction state. */
export type WidgetReaction = Readonly<{
  id: WidgetId;
  hovered: boolean;
  /** Left button pressed on this widget and still held. */
  pressed: boolean;
  /** Left button released this frame after pressing this widget. */
  clicked: boolean;
  focused: boolean;
  pressedButtons: number;
  clickedButtons: number;
}>;

export function reactionOf(w: Widget): WidgetReaction {
  const s = w.interaction;
  return {
    id: w.id,
    hovered: s.hovered,
    pressed: (s.pressedButtons & MouseButton.LEFT) !== 0,
    clicked: (s.clickedButtons & MouseButton.LEFT) !== 0,
    focused: s.focused,
    pressedButtons: s.pressedButtons,
    clickedButtons: s.clickedButtons,
  };
}

/** Reaction state carried between passes. */
export type ReactionState = {
  hoveredId: WidgetId | null;
  /** Widget holding each captured button, keyed by MouseButton bit. */
  captured: Map<MouseButton, WidgetId>;
  /** Widgets whose `clicked` pulse must be cleared next pass. */
  pulsed: WidgetId[];
  focus: FocusState;
};

export function createReactionState(): ReactionState {
  return { hoveredId: null, captured: new Map(), pulsed: [], focus: createFocusState() };
}

function clearPulses(state: ReactionState, store: WidgetStore): void {
  for (const id of state.pulsed) {
    const w = store.get(id);
    if (w) w.interaction.clickedButtons = 0;
  }
  state.pulsed = [];
}

function updateHover(state: ReactionState, store: WidgetStore, target: Widget | null): void {
  if (state.hoveredId !== null) {
    const prev = store.get(state.hoveredId);
    if (prev) prev.interaction.hovered = false;
  }
  if (target && hasFlag(target.props.flags, WidgetFlags.CAN_HOVER)) {
    target.interaction.hovered = true;
    state.hoveredId = target.id;
  } else {
    state.hoveredId = null;
  }
}

function releaseCapture(
  state: ReactionState,
  store: WidgetStore,
  button: MouseButton,
  click: boolean,
): Widget | null {
  const id = state.captured.get(button);
  if (id === undefined) return null;
  state.captured.delete(button);
  const w = store.get(id);
  if (!w) return null;
  w.interaction.pressedButtons &= ~button;
  if (!click) return null;
  w.interaction.clickedButtons |= button;
  state.pulsed.push(w.id);
  return w;
}

/** Run one reaction pass for `mouse` over the live tree. */
export function react(state: ReactionState, store: WidgetStore, mouse: Mouse): void {
  clearPulses(state, store);

  const prevFocus = state.focus;
  let focus = validateFocus(applyPendingFocusChange(state.focus), store);

  const target = mouse.pos ? hitTest(store, mouse.pos.x, mouse.pos.y) : null;
  updateHover(state, store, target);

  for (const button of BUTTONS) {
    if (pressedEdge(mouse, button)) {
      // A press without a matching release frame drops the stale capture.
      releaseCapture(state, store, button, false);
      if (target && hasFlag(target.props.flags, WidgetFlags.CAN_CLICK)) {
        state.captured.set(button, target.id);
        target.interaction.pressedButtons |= button;
      }
    } else if (releasedEdge(mouse, button)) {
      const clicked = releaseCapture(state, store, button, true);
      if (
        clicked &&
        button === MouseButton.LEFT &&
        hasFlag(clicked.props.flags, WidgetFlags.CAN_FOCUS)
      ) {
        focus = Object.freeze({ focusedId: clicked.id });
      }
    } else if ((mouse.buttons & button) === 0) {
      releaseCapture(state, store, button, false);
    }
  }

  syncFocusFlags(prevFocus, focus, store);
  state.focus = focus;
}

/** Forget every reference to freed widgets. */
export function forgetWidgets(state: ReactionState, freed: ReadonlySet<WidgetId>): void {
  if (state.hoveredId !== null && freed.has(state.hoveredId)) state.hoveredId = null;
  for (const [button, id] of state.captured) {
    if (freed.has(id)) state.captured.delete(button);
  }
  state.pulsed = state.pulsed.filter((id) => !freed.has(id));
  const focus = state.focus;
  if (focus.focusedId !== null && freed.has(focus.focusedId)) {
    state.focus = Object.freeze({ focusedId: null, pendingFocusedId: focus.pendingFocusedId });
  } else if (
    focus.pendingFocusedId !== undefined &&
    focus.pendingFocusedId !== null &&
    freed.has(focus.pendingFocusedId)
  ) {
    state.focus = Object.freeze({ focusedId: focus.focusedId });
  }
}
