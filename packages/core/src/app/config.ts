import { DEFAULT_DEV_MODE, type WarnFn, warnDev } from "../debug/devWarnings.js";
import { invalidProps, requirePositiveInt } from "../errors.js";
import type { Rect, Size } from "../layout/types.js";

/** Summary handed to `onLayout` after every layout pass. */
export type LayoutSnapshot = Readonly<{
  frame: number;
  solvedWidgets: number;
  roots: readonly Rect[];
}>;

export type UiConfig = Readonly<{
  /** Size of the area roots are laid out in. */
  viewport: Size;
  /** Throw on contract violations instead of warning. Defaults to NODE_ENV !== "production". */
  devMode?: boolean;
  warn?: WarnFn;
  onLayout?: ((snapshot: LayoutSnapshot) => void) | undefined;
}>;

export type ResolvedUiConfig = Readonly<{
  viewport: Size;
  devMode: boolean;
  warn: WarnFn;
  onLayout: ((snapshot: LayoutSnapshot) => void) | undefined;
}>;

export function resolveViewport(viewport: Size | undefined): Size {
  if (!viewport) invalidProps("viewport is required");
  return Object.freeze({
    w: requirePositiveInt("viewport.w", viewport.w),
    h: requirePositiveInt("viewport.h", viewport.h),
  });
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveUiConfig(config: UiConfig): ResolvedUiConfig {
  return Object.freeze({
    viewport: resolveViewport(config.viewport),
    devMode: config.devMode ?? DEFAULT_DEV_MODE,
    warn: typeof config.warn === "function" ? config.warn : warnDev,
    onLayout: typeof config.onLayout === "function" ? config.onLayout : undefined,
  });
}
