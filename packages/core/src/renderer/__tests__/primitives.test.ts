import { assert, assertRegionColor, describe, test } from "@pxui/testkit";
import { Bitmap } from "../../bitmap/bitmap.js";
import { add, src } from "../../pixel/alphaComp.js";
import { blitNineSlice, blitSprite, fillRect, strokeRect } from "../primitives.js";
import { nineSlice } from "../sprite.js";

const A = 0xff0000aa;
const B = 0xff0000bb;

/** Opaque sheet where pixel (x, y) encodes its own coordinates. */
function coordSheet(w: number, h: number): Bitmap {
  const bmp = new Bitmap({ w, h });
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) bmp.set(x, y, 0xff000000 | (x << 8) | y);
  }
  return bmp;
}

function row(bmp: Bitmap, y: number): number[] {
  const out: number[] = [];
  for (let x = 0; x < bmp.width; x++) out.push(bmp.get(x, y));
  return out;
}

describe("fillRect / strokeRect", () => {
  test("fillRect clips to the target", () => {
    const out = new Bitmap({ w: 4, h: 4 });
    fillRect(out, { x: -2, y: -2, w: 4, h: 4 }, A);
    assertRegionColor(out, { x: 0, y: 0, w: 2, h: 2 }, A);
    assert.equal(out.get(2, 0), 0);
    assert.equal(out.get(0, 2), 0);
  });

  test("fillRect off the target writes nothing", () => {
    const out = new Bitmap({ w: 2, h: 2 });
    fillRect(out, { x: 5, y: 5, w: 2, h: 2 }, A);
    fillRect(out, { x: 0, y: 0, w: 0, h: 2 }, A);
    assert.deepEqual(Array.from(out.pixels), [0, 0, 0, 0]);
  });

  test("strokeRect composites each outline pixel once", () => {
    const out = new Bitmap({ w: 4, h: 4 });
    strokeRect(out, { x: 0, y: 0, w: 4, h: 4 }, 0x10000001, 1, add);
    assert.deepEqual(row(out, 0), [0x10000001, 0x10000001, 0x10000001, 0x10000001]);
    assert.deepEqual(row(out, 1), [0x10000001, 0, 0, 0x10000001]);
    assert.deepEqual(row(out, 3), [0x10000001, 0x10000001, 0x10000001, 0x10000001]);
  });

  test("strokeRect wider than half the rect fills it", () => {
    const out = new Bitmap({ w: 3, h: 3 });
    strokeRect(out, { x: 0, y: 0, w: 3, h: 3 }, A, 2);
    assertRegionColor(out, { x: 0, y: 0, w: 3, h: 3 }, A);
  });
});

describe("blitSprite", () => {
  test("8x8 sprite at (4,4) touches exactly [4..12) x [4..12)", () => {
    const sheet = coordSheet(16, 16);
    const out = new Bitmap({ w: 16, h: 16 });
    blitSprite(out, sheet, { x: 0, y: 0, w: 8, h: 8 }, 4, 4);
    for (let y = 0; y < 16; y++) {
      for (let x = 0; x < 16; x++) {
        const inside = x >= 4 && x < 12 && y >= 4 && y < 12;
        assert.equal(out.get(x, y), inside ? sheet.get(x - 4, y - 4) : 0, `pixel ${x},${y}`);
      }
    }
  });

  test("sprites are read from their sub-rectangle", () => {
    const sheet = coordSheet(4, 4);
    const out = new Bitmap({ w: 2, h: 1 });
    blitSprite(out, sheet, { x: 2, y: 3, w: 2, h: 1 }, 0, 0);
    assert.deepEqual(row(out, 0), [0xff000203, 0xff000303]);
  });

  test("rotation is clockwise", () => {
    const sheet = new Bitmap({ w: 2, h: 1 });
    sheet.set(0, 0, A);
    sheet.set(1, 0, B);
    const s = { x: 0, y: 0, w: 2, h: 1 };

    const r90 = new Bitmap({ w: 1, h: 2 });
    blitSprite(r90, sheet, s, 0, 0, 90);
    assert.deepEqual(Array.from(r90.pixels), [A, B]);

    const r180 = new Bitmap({ w: 2, h: 1 });
    blitSprite(r180, sheet, s, 0, 0, 180);
    assert.deepEqual(Array.from(r180.pixels), [B, A]);

    const r270 = new Bitmap({ w: 1, h: 2 });
    blitSprite(r270, sheet, s, 0, 0, 270);
    assert.deepEqual(Array.from(r270.pixels), [B, A]);
  });

  test("90 degrees maps the left column to the top row", () => {
    // 2x2 sheet: a b / c d  ->  c a / d b
    const sheet = new Bitmap({ w: 2, h: 2 });
    sheet.pixels.set([0xff00000a, 0xff00000b, 0xff00000c, 0xff00000d]);
    const out = new Bitmap({ w: 2, h: 2 });
    blitSprite(out, sheet, { x: 0, y: 0, w: 2, h: 2 }, 0, 0, 90);
    assert.deepEqual(Array.from(out.pixels), [0xff00000c, 0xff00000a, 0xff00000d, 0xff00000b]);
  });

  test("mask replaces rgb and keeps sprite alpha", () => {
    const sheet = new Bitmap({ w: 1, h: 1 });
    sheet.set(0, 0, 0x80ffffff);
    const out = new Bitmap({ w: 1, h: 1 });
    blitSprite(out, sheet, { x: 0, y: 0, w: 1, h: 1 }, 0, 0, 0, 0xff00ff00);
    assert.equal(out.get(0, 0), 0x8000ff00);
  });

  test("partially off-target sprites are clipped", () => {
    const sheet = coordSheet(4, 4);
    const out = new Bitmap({ w: 2, h: 2 });
    blitSprite(out, sheet, { x: 0, y: 0, w: 4, h: 4 }, -3, -3);
    assert.deepEqual(Array.from(out.pixels), [0xff000303, 0, 0, 0]);
  });

  test("src operator overwrites with transparent pixels", () => {
    const sheet = new Bitmap({ w: 1, h: 1 });
    const out = new Bitmap({ w: 1, h: 1 });
    out.set(0, 0, A);
    blitSprite(out, sheet, { x: 0, y: 0, w: 1, h: 1 }, 0, 0, 0, undefined, src);
    assert.equal(out.get(0, 0), 0);
  });
});

describe("blitNineSlice", () => {
  /** 9x9 sheet of 3x3 solid cells; cell (col, row) has color 0xff000000 + row * 3 + col + 1. */
  function cellSheet(): Bitmap {
    const sheet = new Bitmap({ w: 9, h: 9 });
    for (let y = 0; y < 9; y++) {
      for (let x = 0; x < 9; x++) {
        sheet.set(x, y, 0xff000000 + Math.floor(y / 3) * 3 + Math.floor(x / 3) + 1);
      }
    }
    return sheet;
  }

  function cellColor(col: number, rowIndex: number): number {
    return 0xff000000 + rowIndex * 3 + col + 1;
  }

  test("3x3 corners stay 3x3 on a 10x10 target", () => {
    const out = new Bitmap({ w: 10, h: 10 });
    blitNineSlice(out, cellSheet(), nineSlice({ x: 0, y: 0, w: 9, h: 9 }, 3), { x: 0, y: 0, w: 10, h: 10 });
    const band = (v: number): number => (v < 3 ? 0 : v < 7 ? 1 : 2);
    for (let y = 0; y < 10; y++) {
      for (let x = 0; x < 10; x++) {
        assert.equal(out.get(x, y), cellColor(band(x), band(y)), `pixel ${x},${y}`);
      }
    }
  });

  test("corners shrink when the target is smaller than both corners", () => {
    const out = new Bitmap({ w: 4, h: 4 });
    blitNineSlice(out, cellSheet(), nineSlice({ x: 0, y: 0, w: 9, h: 9 }, 3), { x: 0, y: 0, w: 4, h: 4 });
    assert.deepEqual(row(out, 0), [cellColor(0, 0), cellColor(0, 0), cellColor(0, 0), cellColor(2, 0)]);
    assert.deepEqual(row(out, 3), [cellColor(0, 2), cellColor(0, 2), cellColor(0, 2), cellColor(2, 2)]);
  });

  test("edges tile by default and stretch on request", () => {
    const L = 0xff000001;
    const M1 = 0xff000002;
    const M2 = 0xff000003;
    const R = 0xff000004;
    const sheet = new Bitmap({ w: 4, h: 1 });
    sheet.pixels.set([L, M1, M2, R]);
    const insets = { top: 0, right: 1, bottom: 0, left: 1 };
    const dest = { x: 0, y: 0, w: 6, h: 1 };

    const tiled = new Bitmap({ w: 6, h: 1 });
    blitNineSlice(tiled, sheet, nineSlice({ x: 0, y: 0, w: 4, h: 1 }, insets), dest);
    assert.deepEqual(row(tiled, 0), [L, M1, M2, M1, M2, R]);

    const stretched = new Bitmap({ w: 6, h: 1 });
    blitNineSlice(stretched, sheet, nineSlice({ x: 0, y: 0, w: 4, h: 1 }, insets, "stretch"), dest);
    assert.deepEqual(row(stretched, 0), [L, M1, M1, M2, M2, R]);
  });

  test("zero-sized target draws nothing", () => {
    const out = new Bitmap({ w: 2, h: 2 });
    blitNineSlice(out, cellSheet(), nineSlice({ x: 0, y: 0, w: 9, h: 9 }, 3), { x: 0, y: 0, w: 0, h: 2 });
    assert.deepEqual(Array.from(out.pixels), [0, 0, 0, 0]);
  });
});
