import { assert, test } from "../nodeTest.js";
import { type PixelGridSource, assertPixelsEqual, assertRegionColor, pixelArt, pixelDump } from "../pixels.js";

function grid(width: number, height: number, values: readonly number[]): PixelGridSource {
  return { width, height, get: (x, y) => values[y * width + x] ?? 0 };
}

test("pixelDump prints rows of 8-digit hex", () => {
  const g = grid(2, 2, [0xff000000, 0x1, 0xffffffff, 0x80ff0000]);
  assert.equal(pixelDump(g), "ff000000 00000001\nffffffff 80ff0000");
});

test("pixelArt maps colors through the legend", () => {
  const g = grid(3, 1, [0, 0xffffffff, 0x12345678]);
  const legend = new Map<number, string>([
    [0, "."],
    [0xffffffff, "#"],
  ]);
  assert.equal(pixelArt(g, legend), ".#?");
});

test("assertPixelsEqual reports the first differing pixel", () => {
  const a = grid(2, 1, [0xff000000, 0xff000000]);
  const b = grid(2, 1, [0xff000000, 0xff0000ff]);
  assert.doesNotThrow(() => assertPixelsEqual(a, a));
  assert.throws(
    () => assertPixelsEqual(a, b),
    (err: unknown) => err instanceof Error && err.message.startsWith("pixel mismatch at (1,0)"),
  );
});

test("assertPixelsEqual rejects mismatched sizes", () => {
  assert.throws(() => assertPixelsEqual(grid(1, 1, [0]), grid(2, 1, [0, 0])));
});

test("assertRegionColor checks only the given rect", () => {
  const g = grid(3, 2, [1, 2, 2, 1, 2, 2]);
  assert.doesNotThrow(() => assertRegionColor(g, { x: 1, y: 0, w: 2, h: 2 }, 2));
  assert.throws(() => assertRegionColor(g, { x: 0, y: 0, w: 2, h: 1 }, 2));
});
