/**
 * packages/core/src/runtime/widgetKey.ts — Durable widget identity.
 *
 * A key is built from a call-site segment, optional integer disambiguators
 * (list items, grid cells, digits) and optionally the key of an enclosing
 * widget, so the same call-site under two parents never collides.
 *
 * Encoding: `<parent>/<site>#<i>#<j>`, with the site URI-encoded so caller
 * text can never forge a separator.
 */

import { invalidProps } from "../errors.js";

export type WidgetKey = string;

function encodeSegment(value: string): string {
  return encodeURIComponent(value);
}

function encodeIndices(indices: readonly number[]): string {
  let out = "";
  for (const i of indices) {
    if (!Number.isSafeInteger(i)) invalidProps(`widget key index must be an integer (got ${String(i)})`);
    out += `#${String(i)}`;
  }
  return out;
}

/** Key from an explicit site label plus disambiguators. */
export function widgetKey(site: string, ...indices: readonly number[]): WidgetKey {
  if (site.length === 0) invalidProps("widget key site must be a non-empty string");
  return `${encodeSegment(site)}${encodeIndices(indices)}`;
}

/** Key scoped under `parent`. */
export function childKey(parent: WidgetKey, site: string, ...indices: readonly number[]): WidgetKey {
  return `${parent}/${widgetKey(site, ...indices)}`;
}

function parseStackFrameSite(line: string): string | null {
  const trimmed = line.trim();
  const fromParen = trimmed.match(/\((.+:\d+:\d+)\)$/u);
  const fromBare = trimmed.match(/at (.+:\d+:\d+)$/u);
  const raw = fromParen?.[1] ?? fromBare?.[1];
  if (!raw) return null;
  return raw.startsWith("file://") ? raw.slice("file://".length) : raw;
}

function callerSite(below: (...args: never[]) => unknown): string {
  const holder: { stack?: string } = {};
  if (Error.captureStackTrace) {
    Error.captureStackTrace(holder, below);
  }
  const lines = (holder.stack ?? "").split("\n");
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (!line) continue;
    const site = parseStackFrameSite(line);
    if (site !== null) return site;
  }
  return invalidProps("wk(): call site unavailable in this runtime; use widgetKey(site, ...)");
}

/**
 * Key derived from the caller's source position (file:line:column).
 * Calls on different lines get different keys; a call inside a loop needs
 * indices to tell iterations apart.
 */
export function wk(...indices: readonly number[]): WidgetKey {
  return widgetKey(callerSite(wk), ...indices);
}

/** `wk` scoped under `parent`. */
export function wkIn(parent: WidgetKey, ...indices: readonly number[]): WidgetKey {
  return `${parent}/${widgetKey(callerSite(wkIn), ...indices)}`;
}
