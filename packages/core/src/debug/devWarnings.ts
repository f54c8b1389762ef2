import { PxUiError, type PxUiFatal } from "../errors.js";

/** Area tag used in warning prefixes. */
export type WarningArea = "tree" | "layout" | "render" | "react";

export type WarnFn = (message: string) => void;

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

/** Dev mode unless the host runs with NODE_ENV=production. */
export const DEFAULT_DEV_MODE = NODE_ENV !== "production";

export function warnDev(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

export type ContractGuard = Readonly<{
  devMode: boolean;
  /**
   * Report a caller-contract violation.
   *
   * Dev mode throws a PxUiError. Otherwise the violation is logged once per
   * `dedupeKey` and the caller takes its fallback path.
   */
  violation: (area: WarningArea, fatal: PxUiFatal, dedupeKey?: string) => void;
  /** Log a dev-only warning once per key. */
  warnOnce: (area: WarningArea, key: string, detail: string) => void;
}>;

export function createContractGuard(devMode: boolean, warn: WarnFn): ContractGuard {
  const warned = new Set<string>();

  function emit(area: WarningArea, key: string, detail: string): void {
    const dedupe = `${area}:${key}`;
    if (warned.has(dedupe)) return;
    warned.add(dedupe);
    warn(`[pxui][${area}] ${detail}`);
  }

  return Object.freeze({
    devMode,
    violation(area: WarningArea, fatal: PxUiFatal, dedupeKey?: string): void {
      if (devMode) throw new PxUiError(fatal.code, fatal.detail);
      emit(area, dedupeKey ?? `${fatal.code}:${fatal.detail}`, `${fatal.code}: ${fatal.detail}`);
    },
    warnOnce(area: WarningArea, key: string, detail: string): void {
      if (!devMode) return;
      emit(area, key, detail);
    },
  });
}
