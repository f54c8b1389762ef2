import { UiContext } from "../../app/uiContext.js";
import type { UiConfig } from "../../app/config.js";
import type { Rect } from "../types.js";
import type { WidgetId } from "../../widgets/props.js";

export function createUi(w = 100, h = 100, extra?: Partial<UiConfig>): UiContext {
  return new UiContext({ viewport: { w, h }, devMode: true, ...extra });
}

export function rectOf(ui: UiContext, id: WidgetId): Rect | undefined {
  return ui.getWidget(id)?.rect;
}
