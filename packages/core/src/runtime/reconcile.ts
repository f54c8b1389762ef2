/**
 * packages/core/src/runtime/reconcile.ts — Frame-to-frame key reconciliation.
 *
 * Each frame the application re-declares its widgets by key. Keys seen in
 * the previous frame map back to their existing widget ids; unseen keys get
 * fresh ids; keys that were not declared again are reported as freed when the
 * frame is committed.
 *
 * Reconciliation rules:
 *   - A key maps to the same id for as long as it is declared every frame
 *   - Ids are allocated monotonically and never reused
 *   - Declaring one key twice in a frame is a duplicate-key fatal
 */

import type { PxUiFatal } from "../errors.js";
import type { WidgetId } from "../widgets/props.js";
import type { WidgetKey } from "./widgetKey.js";

export type WidgetIdAllocator = Readonly<{
  allocate: () => WidgetId;
  /** Number of ids handed out so far. */
  allocated: () => number;
}>;

export function createWidgetIdAllocator(firstId: WidgetId = 1): WidgetIdAllocator {
  let next = firstId;
  let count = 0;
  return Object.freeze({
    allocate(): WidgetId {
      count++;
      return next++;
    },
    allocated(): number {
      return count;
    },
  });
}

export type ClaimedKey = Readonly<{ id: WidgetId; kind: "reused" | "new" }>;

/**
 * A duplicate claim still reports the id the key already holds, so callers
 * that only warn can fall back to "last declaration wins".
 */
export type ClaimKeyResult =
  | Readonly<{ ok: true; value: ClaimedKey }>
  | Readonly<{ ok: false; fatal: PxUiFatal; id: WidgetId }>;

/** Outcome of one committed frame. */
export type FrameDiff = Readonly<{
  created: readonly WidgetId[];
  reused: readonly WidgetId[];
  freed: readonly WidgetId[];
}>;

export type KeyReconciler = Readonly<{
  claim: (key: WidgetKey) => ClaimKeyResult;
  /** Id currently bound to `key`, declared this frame or the previous one. */
  lookup: (key: WidgetKey) => WidgetId | undefined;
  /** Number of keys declared so far in the open frame. */
  claimedCount: () => number;
  commit: () => FrameDiff;
}>;

function duplicateKeyDetail(key: WidgetKey, id: WidgetId): string {
  return `widget key "${key}" declared twice in one frame (widget id=${String(id)})`;
}

export function createKeyReconciler(allocator: WidgetIdAllocator): KeyReconciler {
  let prevKeys = new Map<WidgetKey, WidgetId>();
  let nextKeys = new Map<WidgetKey, WidgetId>();
  let created: WidgetId[] = [];
  let reused: WidgetId[] = [];

  return Object.freeze({
    claim(key: WidgetKey): ClaimKeyResult {
      const existing = nextKeys.get(key);
      if (existing !== undefined) {
        return {
          ok: false,
          fatal: { code: "PXUI_DUPLICATE_KEY", detail: duplicateKeyDetail(key, existing) },
          id: existing,
        };
      }
      const prevId = prevKeys.get(key);
      if (prevId !== undefined) {
        nextKeys.set(key, prevId);
        reused.push(prevId);
        return { ok: true, value: { id: prevId, kind: "reused" } };
      }
      const id = allocator.allocate();
      nextKeys.set(key, id);
      created.push(id);
      return { ok: true, value: { id, kind: "new" } };
    },

    lookup(key: WidgetKey): WidgetId | undefined {
      return nextKeys.get(key) ?? prevKeys.get(key);
    },

    claimedCount(): number {
      return nextKeys.size;
    },

    commit(): FrameDiff {
      const freed: WidgetId[] = [];
      for (const [key, id] of prevKeys) {
        if (!nextKeys.has(key)) freed.push(id);
      }
      const diff: FrameDiff = { created, reused, freed };
      prevKeys = nextKeys;
      nextKeys = new Map<WidgetKey, WidgetId>();
      created = [];
      reused = [];
      return diff;
    },
  });
}
