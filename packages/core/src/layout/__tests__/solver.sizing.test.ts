import { assert, describe, test } from "@pxui/testkit";
import type { LayoutSnapshot } from "../../app/config.js";
import { nineSlice, nineSliceWidgetSprite, simpleWidgetSprite } from "../../renderer/sprite.js";
import { DEFAULT_FONT_LAYOUT, shapeText } from "../../renderer/text.js";
import { widgetKey } from "../../runtime/widgetKey.js";
import {
  WidgetFlags,
  fillSize,
  fixedSize,
  padAll,
  padTRBL,
  widgetProps,
} from "../../widgets/props.js";
import { createUi, rectOf } from "./helpers.js";

describe("hug sizing", () => {
  test("hug parent with padding 2 around a 10x10 child is 14x14", () => {
    const ui = createUi();
    const root = ui.buildWidget(widgetProps(widgetKey("root"), { padding: padAll(2) }));
    const child = ui.buildWidget(widgetProps(widgetKey("child"), { size: fixedSize(10, 10) }));
    ui.addChild(root.id, child.id);
    ui.solveLayout();
    assert.deepEqual(rectOf(ui, root.id), { x: 0, y: 0, w: 14, h: 14 });
    assert.deepEqual(rectOf(ui, child.id), { x: 2, y: 2, w: 10, h: 10 });
  });

  test("without flex the content extent includes child offsets", () => {
    const ui = createUi();
    const root = ui.buildWidget(widgetProps(widgetKey("root"), { padding: padTRBL(1, 2, 3, 4) }));
    const a = ui.buildWidget(widgetProps(widgetKey("a"), { size: fixedSize(5, 5), offset: { x: 10, y: 0 } }));
    const b = ui.buildWidget(widgetProps(widgetKey("b"), { size: fixedSize(3, 8) }));
    ui.addChild(root.id, a.id);
    ui.addChild(root.id, b.id);
    ui.solveLayout();
    assert.deepEqual(rectOf(ui, root.id), { x: 0, y: 0, w: 21, h: 12 });
    assert.deepEqual(rectOf(ui, a.id), { x: 14, y: 1, w: 5, h: 5 });
    assert.deepEqual(rectOf(ui, b.id), { x: 4, y: 1, w: 3, h: 8 });
  });

  test("a simple sprite sets the hug size, rotated", () => {
    const ui = createUi();
    const w = ui.buildWidget(
      widgetProps(widgetKey("sprite"), {
        flags: WidgetFlags.DRAW_SPRITE,
        sprite: simpleWidgetSprite(0, { x: 0, y: 0, w: 4, h: 2 }),
        rotate: 90,
        padding: padAll(1),
      }),
    );
    ui.solveLayout();
    assert.deepEqual(rectOf(ui, w.id), { x: 0, y: 0, w: 4, h: 6 });
  });

  test("text sets the hug size", () => {
    const ui = createUi();
    const text = shapeText(DEFAULT_FONT_LAYOUT, { w: 64, h: 36 }, "AB");
    const w = ui.buildWidget(widgetProps(widgetKey("label"), { flags: WidgetFlags.DRAW_TEXT, text }));
    ui.solveLayout();
    assert.deepEqual(rectOf(ui, w.id), { x: 0, y: 0, w: 9, h: 6 });
  });

  test("a drawable without its draw flag does not count", () => {
    const ui = createUi();
    const text = shapeText(DEFAULT_FONT_LAYOUT, { w: 64, h: 36 }, "AB");
    const w = ui.buildWidget(widgetProps(widgetKey("label"), { text }));
    ui.solveLayout();
    assert.deepEqual(rectOf(ui, w.id), { x: 0, y: 0, w: 0, h: 0 });
  });

  test("nine-slice sprites stretch and add no size of their own", () => {
    const ui = createUi();
    const w = ui.buildWidget(
      widgetProps(widgetKey("panel"), {
        flags: WidgetFlags.DRAW_SPRITE,
        sprite: nineSliceWidgetSprite(0, nineSlice({ x: 0, y: 0, w: 9, h: 9 }, 3)),
        padding: padAll(3),
      }),
    );
    ui.solveLayout();
    assert.deepEqual(rectOf(ui, w.id), { x: 0, y: 0, w: 6, h: 6 });
  });

  test("fill root takes the viewport", () => {
    const ui = createUi(64, 48);
    const w = ui.buildWidget(widgetProps(widgetKey("screen"), { size: fillSize() }));
    ui.solveLayout();
    assert.deepEqual(rectOf(ui, w.id), { x: 0, y: 0, w: 64, h: 48 });
  });

  test("children overflow their parent without clipping", () => {
    const ui = createUi();
    const root = ui.buildWidget(widgetProps(widgetKey("root"), { size: fixedSize(10, 10) }));
    const big = ui.buildWidget(widgetProps(widgetKey("big"), { size: fixedSize(20, 30) }));
    ui.addChild(root.id, big.id);
    ui.solveLayout();
    assert.deepEqual(rectOf(ui, big.id), { x: 0, y: 0, w: 20, h: 30 });
  });

  test("fill inside a hugging parent gets its content size and warns once", () => {
    const warnings: string[] = [];
    const ui = createUi(100, 100, { warn: (m) => warnings.push(m) });
    const root = ui.buildWidget(widgetProps(widgetKey("root")));
    const inner = ui.buildWidget(
      widgetProps(widgetKey("inner"), { size: { w: "fill", h: 4 }, padding: padAll(2) }),
    );
    ui.addChild(root.id, inner.id);
    ui.solveLayout();
    ui.solveLayout();
    assert.deepEqual(rectOf(ui, inner.id), { x: 0, y: 0, w: 4, h: 4 });
    assert.deepEqual(warnings, [
      '[pxui][layout] widget "inner" fills along x inside hugging parent "root"; it gets its content size',
    ]);
  });
});

describe("onLayout", () => {
  test("reports solved count and root rects per pass", () => {
    const snapshots: LayoutSnapshot[] = [];
    const ui = createUi(50, 50, { onLayout: (s) => snapshots.push(s) });
    const a = ui.buildWidget(widgetProps(widgetKey("a"), { size: fixedSize(5, 5) }));
    const b = ui.buildWidget(
      widgetProps(widgetKey("b"), {
        size: fixedSize(3, 3),
        anchor: "bottom-right",
        origin: "bottom-right",
      }),
    );
    const c = ui.buildWidget(widgetProps(widgetKey("c"), { size: fixedSize(1, 1) }));
    ui.addChild(a.id, c.id);
    const result = ui.solveLayout();
    assert.equal(result.solved, 3);
    assert.deepEqual(snapshots, [
      {
        frame: 1,
        solvedWidgets: 3,
        roots: [
          { x: 0, y: 0, w: 5, h: 5 },
          { x: 47, y: 47, w: 3, h: 3 },
        ],
      },
    ]);
    assert.deepEqual(ui.roots(), [a.id, b.id]);
  });
});
