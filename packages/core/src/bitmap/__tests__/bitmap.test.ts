import { assert, describe, test } from "@pxui/testkit";
import { PxUiError } from "../../errors.js";
import { add } from "../../pixel/alphaComp.js";
import { Bitmap } from "../bitmap.js";

function isPxUiError(code: string): (err: unknown) => boolean {
  return (err: unknown) => err instanceof PxUiError && err.code === code;
}

describe("Bitmap", () => {
  test("starts transparent and reads back what was set", () => {
    const bmp = new Bitmap({ w: 3, h: 2 });
    assert.equal(bmp.pixels.length, 6);
    assert.equal(bmp.get(2, 1), 0);
    bmp.set(2, 1, 0xff112233);
    assert.equal(bmp.get(2, 1), 0xff112233);
    assert.equal(bmp.pixels[5], 0xff112233);
  });

  test("rejects invalid dimensions and mismatched buffers", () => {
    assert.throws(() => new Bitmap({ w: 1.5, h: 2 }), isPxUiError("PXUI_INVALID_PROPS"));
    assert.throws(() => new Bitmap({ w: -1, h: 2 }), isPxUiError("PXUI_INVALID_PROPS"));
    assert.throws(
      () => Bitmap.fromBuffer(new Uint32Array(3), { w: 2, h: 2 }),
      isPxUiError("PXUI_INVALID_PROPS"),
    );
  });

  test("coordinate access outside the buffer throws", () => {
    const bmp = new Bitmap({ w: 2, h: 2 });
    assert.throws(() => bmp.get(2, 0), isPxUiError("PXUI_OUT_OF_BOUNDS"));
    assert.throws(() => bmp.set(0, -1, 0), isPxUiError("PXUI_OUT_OF_BOUNDS"));
  });

  test("fromRgba reorders bytes into ARGB", () => {
    const bytes = new Uint8Array([0x11, 0x22, 0x33, 0x44, 0xaa, 0xbb, 0xcc, 0xff]);
    const bmp = Bitmap.fromRgba(bytes, { w: 2, h: 1 });
    assert.equal(bmp.get(0, 0), 0x44112233);
    assert.equal(bmp.get(1, 0), 0xffaabbcc);
  });

  test("fromRgba checks the byte count", () => {
    assert.throws(
      () => Bitmap.fromRgba(new Uint8Array(7), { w: 2, h: 1 }),
      isPxUiError("PXUI_INVALID_PROPS"),
    );
  });

  test("fill sets every pixel", () => {
    const bmp = new Bitmap({ w: 2, h: 2 });
    bmp.fill(0xff00ff00);
    assert.deepEqual(Array.from(bmp.pixels), [0xff00ff00, 0xff00ff00, 0xff00ff00, 0xff00ff00]);
  });
});

describe("views and copies", () => {
  function numbered(): Bitmap {
    const bmp = new Bitmap({ w: 4, h: 3 });
    for (let i = 0; i < bmp.pixels.length; i++) bmp.pixels[i] = 0xff000000 + i;
    return bmp;
  }

  test("view reads through to the parent without copying", () => {
    const bmp = numbered();
    const v = bmp.view({ x: 1, y: 1, w: 2, h: 2 });
    assert.equal(v.width, 2);
    assert.equal(v.height, 2);
    assert.equal(v.get(0, 0), 0xff000005);
    bmp.set(2, 2, 0xff0000aa);
    assert.equal(v.get(1, 1), 0xff0000aa);
    assert.throws(() => v.get(2, 0), isPxUiError("PXUI_OUT_OF_BOUNDS"));
  });

  test("view and crop reject rects outside the bitmap", () => {
    const bmp = numbered();
    assert.throws(() => bmp.view({ x: 3, y: 0, w: 2, h: 1 }), isPxUiError("PXUI_OUT_OF_BOUNDS"));
    assert.throws(() => bmp.crop({ x: 0, y: 2, w: 1, h: 2 }), isPxUiError("PXUI_OUT_OF_BOUNDS"));
  });

  test("crop copies a sub-rectangle", () => {
    const bmp = numbered();
    const c = bmp.crop({ x: 2, y: 1, w: 2, h: 2 });
    assert.deepEqual(Array.from(c.pixels), [0xff000006, 0xff000007, 0xff00000a, 0xff00000b]);
    bmp.set(2, 1, 0);
    assert.equal(c.get(0, 0), 0xff000006);
  });

  test("blit clips against the target", () => {
    const target = new Bitmap({ w: 3, h: 3 });
    const source = new Bitmap({ w: 2, h: 2 });
    source.fill(0xff0000ff);
    target.blit(source, 2, 2);
    assert.deepEqual(Array.from(target.pixels), [0, 0, 0, 0, 0, 0, 0, 0, 0xff0000ff]);
    target.blit(source, -2, 0);
    assert.equal(target.get(0, 0), 0);
  });

  test("blit composites with the given operator", () => {
    const target = new Bitmap({ w: 1, h: 1 });
    target.set(0, 0, 0x10101010);
    const source = new Bitmap({ w: 1, h: 1 });
    source.set(0, 0, 0x01020304);
    target.blit(source, 0, 0, add);
    assert.equal(target.get(0, 0), 0x11121314);
  });
});
