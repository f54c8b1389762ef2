import { assert, describe, test } from "@pxui/testkit";
import { widgetKey } from "../../runtime/widgetKey.js";
import { fillSize, fixedSize, hflex, padAll, vflex, widgetProps } from "../../widgets/props.js";
import { distributeEvenly } from "../solver.js";
import { createUi, rectOf } from "./helpers.js";

describe("distributeEvenly", () => {
  test("leftover pixels go to the lower indices", () => {
    assert.deepEqual(distributeEvenly(101, 3), [34, 34, 33]);
    assert.deepEqual(distributeEvenly(100, 2), [50, 50]);
  });

  test("degenerate inputs", () => {
    assert.deepEqual(distributeEvenly(10, 0), []);
    assert.deepEqual(distributeEvenly(-5, 2), [0, 0]);
    assert.deepEqual(distributeEvenly(Number.NaN, 2), [0, 0]);
  });
});

describe("flex layout", () => {
  test("two fill children split a 100x100 horizontal parent", () => {
    const ui = createUi();
    const root = ui.buildWidget(widgetProps(widgetKey("root"), { size: fixedSize(100, 100), layout: hflex() }));
    const a = ui.buildWidget(widgetProps(widgetKey("a"), { size: fillSize() }));
    const b = ui.buildWidget(widgetProps(widgetKey("b"), { size: fillSize() }));
    ui.addChild(root.id, a.id);
    ui.addChild(root.id, b.id);
    ui.solveLayout();
    assert.deepEqual(rectOf(ui, a.id), { x: 0, y: 0, w: 50, h: 100 });
    assert.deepEqual(rectOf(ui, b.id), { x: 50, y: 0, w: 50, h: 100 });
  });

  test("fill children share what fixed children and gaps leave", () => {
    const ui = createUi();
    const root = ui.buildWidget(
      widgetProps(widgetKey("root"), { size: fixedSize(101, 10), layout: hflex(2), padding: padAll(1) }),
    );
    const fixed = ui.buildWidget(widgetProps(widgetKey("fixed"), { size: fixedSize(20, 4) }));
    const f1 = ui.buildWidget(widgetProps(widgetKey("f1"), { size: fillSize() }));
    const f2 = ui.buildWidget(widgetProps(widgetKey("f2"), { size: fillSize() }));
    for (const c of [fixed, f1, f2]) ui.addChild(root.id, c.id);
    ui.solveLayout();
    // content 99 wide: 99 - 20 - 2 * 2 = 75 -> 38 + 37
    assert.deepEqual(rectOf(ui, fixed.id), { x: 1, y: 1, w: 20, h: 4 });
    assert.deepEqual(rectOf(ui, f1.id), { x: 23, y: 1, w: 38, h: 8 });
    assert.deepEqual(rectOf(ui, f2.id), { x: 63, y: 1, w: 37, h: 8 });
  });

  test("vertical stacking with gap inside a hugging parent", () => {
    const ui = createUi();
    const root = ui.buildWidget(widgetProps(widgetKey("root"), { layout: vflex(2), padding: padAll(1) }));
    const a = ui.buildWidget(widgetProps(widgetKey("a"), { size: fixedSize(10, 5) }));
    const b = ui.buildWidget(widgetProps(widgetKey("b"), { size: fixedSize(6, 7) }));
    ui.addChild(root.id, a.id);
    ui.addChild(root.id, b.id);
    ui.solveLayout();
    assert.deepEqual(rectOf(ui, root.id), { x: 0, y: 0, w: 12, h: 16 });
    assert.deepEqual(rectOf(ui, a.id), { x: 1, y: 1, w: 10, h: 5 });
    assert.deepEqual(rectOf(ui, b.id), { x: 1, y: 8, w: 6, h: 7 });
  });

  test("anchors act on the cross axis only", () => {
    const ui = createUi();
    const root = ui.buildWidget(widgetProps(widgetKey("root"), { size: fixedSize(100, 20), layout: hflex() }));
    const a = ui.buildWidget(
      widgetProps(widgetKey("a"), { size: fixedSize(10, 10), anchor: "center", origin: "center" }),
    );
    ui.addChild(root.id, a.id);
    ui.solveLayout();
    assert.deepEqual(rectOf(ui, a.id), { x: 0, y: 5, w: 10, h: 10 });
  });

  test("fill on the cross axis takes the content height", () => {
    const ui = createUi();
    const root = ui.buildWidget(
      widgetProps(widgetKey("root"), { size: fixedSize(30, 20), layout: hflex(), padding: padAll(3) }),
    );
    const a = ui.buildWidget(widgetProps(widgetKey("a"), { size: { w: 5, h: "fill" } }));
    ui.addChild(root.id, a.id);
    ui.solveLayout();
    assert.deepEqual(rectOf(ui, a.id), { x: 3, y: 3, w: 5, h: 14 });
  });

  test("fill children get nothing when fixed content overflows", () => {
    const ui = createUi();
    const root = ui.buildWidget(widgetProps(widgetKey("root"), { size: fixedSize(10, 10), layout: hflex() }));
    const big = ui.buildWidget(widgetProps(widgetKey("big"), { size: fixedSize(15, 10) }));
    const f = ui.buildWidget(widgetProps(widgetKey("f"), { size: fillSize() }));
    ui.addChild(root.id, big.id);
    ui.addChild(root.id, f.id);
    ui.solveLayout();
    assert.deepEqual(rectOf(ui, big.id), { x: 0, y: 0, w: 15, h: 10 });
    assert.deepEqual(rectOf(ui, f.id), { x: 15, y: 0, w: 0, h: 10 });
  });
});
