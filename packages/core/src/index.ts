/**
 * @pxui/core — public API.
 *
 * Retained widget tree declared immediate-mode style each frame, a two-pass
 * layout solver, pointer reactions, and a software compositor that turns draw
 * commands into pixels.
 */

// =============================================================================
// Errors and diagnostics
// =============================================================================

export { PxUiError, type PxUiErrorCode, type PxUiFatal } from "./errors.js";
export {
  type ContractGuard,
  type WarnFn,
  type WarningArea,
  createContractGuard,
  DEFAULT_DEV_MODE,
  warnDev,
} from "./debug/devWarnings.js";

// =============================================================================
// Geometry
// =============================================================================

export {
  type Insets,
  type Pos,
  type Rect,
  type Size,
  contains,
  insetRect,
  intersectRect,
  pos,
  rect,
  size,
  ZERO_INSETS,
  ZERO_POS,
  ZERO_RECT,
  ZERO_SIZE,
} from "./layout/types.js";
export { Anchor, anchorFractions, anchorOffset, type AnchorFractions } from "./layout/anchor.js";

// =============================================================================
// Pixels and bitmaps
// =============================================================================

export {
  argb,
  type Color,
  colorA,
  colorAdd,
  colorB,
  colorDiv,
  colorFromHex,
  colorG,
  colorMul,
  colorR,
  colorSub,
  colorToArray,
  colorToHexString,
  rgbA,
  TRANSPARENT,
} from "./pixel/color.js";
export { type AlphaCompFn, add, alphaComp, dst, dstOver, over, src, xor } from "./pixel/alphaComp.js";
export { Bitmap, BitmapView, type PixelSource, rectFits } from "./bitmap/bitmap.js";

// =============================================================================
// Renderer
// =============================================================================

export {
  type NineSliceFill,
  type NineSlicingSprite,
  nineSlice,
  nineSliceWidgetSprite,
  type Rotate,
  rotatedSize,
  type Sprite,
  type SpritesheetId,
  simpleWidgetSprite,
  sprite,
  type WidgetSprite,
} from "./renderer/sprite.js";
export {
  type BitmapFontLayout,
  DEFAULT_FONT_LAYOUT,
  type GlyphPlacement,
  lookupGlyph,
  shapeText,
  type Text,
} from "./renderer/text.js";
export type {
  ClearCommand,
  DrawCommand,
  DrawCommandKind,
  FillRectCommand,
  NineSliceCommand,
  SpriteCommand,
  StrokeRectCommand,
  TextCommand,
} from "./renderer/drawCommands.js";
export { blitNineSlice, blitSprite, fillRect, strokeRect } from "./renderer/primitives.js";
export {
  type RendererConfig,
  type ResolvedRendererConfig,
  resolveRendererConfig,
} from "./renderer/config.js";
export { Renderer } from "./renderer/renderer.js";
export { drawWidgets } from "./renderer/drawWidgets.js";

// =============================================================================
// Widget tree
// =============================================================================

export { childKey, type WidgetKey, widgetKey, wk, wkIn } from "./runtime/widgetKey.js";
export {
  type ClaimedKey,
  type ClaimKeyResult,
  createKeyReconciler,
  createWidgetIdAllocator,
  type FrameDiff,
  type KeyReconciler,
  type WidgetIdAllocator,
} from "./runtime/reconcile.js";
export {
  type Widget,
  type WidgetInteraction,
  WidgetStore,
  type WidgetView,
} from "./runtime/widgetStore.js";
export {
  IDLE_MOUSE,
  type Mouse,
  MouseButton,
  nextMouse,
  pressedEdge,
  releasedEdge,
  type WidgetReaction,
} from "./runtime/reaction.js";
export { type FocusState } from "./runtime/focus.js";
export {
  FILL_SIZE,
  fillSize,
  fixedSize,
  type FlexDirection,
  HUG_SIZE,
  hasFlag,
  hflex,
  hugSize,
  mergeProps,
  NO_LAYOUT,
  padAll,
  padHV,
  padTRBL,
  vflex,
  type WidgetDim,
  WidgetFlags,
  type WidgetId,
  type WidgetLayout,
  type WidgetProps,
  type WidgetPropsInit,
  type WidgetSize,
  widgetProps,
} from "./widgets/props.js";
export {
  bigDigitsDisplay,
  btnBox,
  btnIcon,
  type DigitsDisplayOptions,
  nineSliceSpriteProps,
  simpleSpriteProps,
  spriteProps,
  textProps,
  TIME_BRIGHT,
  TIME_DIMMED,
  type TimeDisplayOptions,
  timeDisplay,
} from "./widgets/components.js";

// =============================================================================
// Layout
// =============================================================================

export { distributeEvenly, type LayoutResult, solveLayout } from "./layout/solver.js";
export { hitTest } from "./layout/hitTest.js";

// =============================================================================
// Frame driver
// =============================================================================

export {
  type LayoutSnapshot,
  type ResolvedUiConfig,
  resolveUiConfig,
  type UiConfig,
} from "./app/config.js";
export { UiContext } from "./app/uiContext.js";
