import { DEFAULT_DEV_MODE, type WarnFn, warnDev } from "../debug/devWarnings.js";
import { invalidProps, requireNonNegativeInt, requirePositiveInt } from "../errors.js";
import { type Color, TRANSPARENT } from "../pixel/color.js";
import { type BitmapFontLayout, DEFAULT_FONT_LAYOUT } from "./text.js";

export type RendererConfig = Readonly<{
  /** Color used by `clear` commands without their own color. */
  clearColor?: Color;
  /** Font sheet metrics; missing fields fall back to the defaults. */
  font?: Partial<BitmapFontLayout>;
  devMode?: boolean;
  warn?: WarnFn;
}>;

/** Resolved configuration with defaults applied. */
export type ResolvedRendererConfig = Readonly<{
  clearColor: Color;
  font: BitmapFontLayout;
  devMode: boolean;
  warn: WarnFn;
}>;

const DEFAULT_CONFIG: ResolvedRendererConfig = Object.freeze({
  clearColor: TRANSPARENT,
  font: DEFAULT_FONT_LAYOUT,
  devMode: DEFAULT_DEV_MODE,
  warn: warnDev,
});

function resolveFont(font: Partial<BitmapFontLayout> | undefined): BitmapFontLayout {
  if (!font) return DEFAULT_FONT_LAYOUT;
  const merged = { ...DEFAULT_FONT_LAYOUT, ...font };
  if ([...merged.fallbackChar].length !== 1) {
    invalidProps("font.fallbackChar must be a single character");
  }
  return Object.freeze({
    glyphWidth: requirePositiveInt("font.glyphWidth", merged.glyphWidth),
    glyphHeight: requirePositiveInt("font.glyphHeight", merged.glyphHeight),
    columns: requirePositiveInt("font.columns", merged.columns),
    firstCode: requireNonNegativeInt("font.firstCode", merged.firstCode),
    letterSpacing: requireNonNegativeInt("font.letterSpacing", merged.letterSpacing),
    lineSpacing: requireNonNegativeInt("font.lineSpacing", merged.lineSpacing),
    fallbackChar: merged.fallbackChar,
  });
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveRendererConfig(config: RendererConfig | undefined): ResolvedRendererConfig {
  if (!config) return DEFAULT_CONFIG;
  return Object.freeze({
    clearColor: config.clearColor === undefined ? DEFAULT_CONFIG.clearColor : config.clearColor >>> 0,
    font: resolveFont(config.font),
    devMode: config.devMode ?? DEFAULT_CONFIG.devMode,
    warn: typeof config.warn === "function" ? config.warn : DEFAULT_CONFIG.warn,
  });
}
