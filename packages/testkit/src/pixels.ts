import { strict as assert } from "node:assert";

/** Anything that can be read pixel by pixel as packed 0xAARRGGBB numbers. */
export type PixelGridSource = Readonly<{
  width: number;
  height: number;
  get: (x: number, y: number) => number;
}>;

function hex8(v: number): string {
  return (v >>> 0).toString(16).padStart(8, "0");
}

/**
 * One line per row, pixels as 8-digit hex separated by spaces.
 * Meant for assertion messages and small fixtures.
 */
export function pixelDump(src: PixelGridSource): string {
  const rows: string[] = [];
  for (let y = 0; y < src.height; y++) {
    const cells: string[] = [];
    for (let x = 0; x < src.width; x++) cells.push(hex8(src.get(x, y)));
    rows.push(cells.join(" "));
  }
  return rows.join("\n");
}

/**
 * Render a grid as characters using `legend` (color → char); colors missing
 * from the legend print as `?`.
 */
export function pixelArt(src: PixelGridSource, legend: ReadonlyMap<number, string>): string {
  const rows: string[] = [];
  for (let y = 0; y < src.height; y++) {
    let row = "";
    for (let x = 0; x < src.width; x++) row += legend.get(src.get(x, y) >>> 0) ?? "?";
    rows.push(row);
  }
  return rows.join("\n");
}

/** Assert two grids match exactly, reporting the first differing pixel. */
export function assertPixelsEqual(actual: PixelGridSource, expected: PixelGridSource): void {
  assert.equal(actual.width, expected.width, "width mismatch");
  assert.equal(actual.height, expected.height, "height mismatch");
  for (let y = 0; y < actual.height; y++) {
    for (let x = 0; x < actual.width; x++) {
      const a = actual.get(x, y) >>> 0;
      const e = expected.get(x, y) >>> 0;
      if (a !== e) {
        assert.fail(
          `pixel mismatch at (${String(x)},${String(y)}): actual ${hex8(a)}, expected ${hex8(e)}\n` +
            `actual:\n${pixelDump(actual)}\nexpected:\n${pixelDump(expected)}`,
        );
      }
    }
  }
}

/** Assert every pixel inside the rect equals `color`. */
export function assertRegionColor(
  src: PixelGridSource,
  region: Readonly<{ x: number; y: number; w: number; h: number }>,
  color: number,
): void {
  for (let y = region.y; y < region.y + region.h; y++) {
    for (let x = region.x; x < region.x + region.w; x++) {
      const v = src.get(x, y) >>> 0;
      if (v !== color >>> 0) {
        assert.fail(
          `pixel (${String(x)},${String(y)}) is ${hex8(v)}, expected ${hex8(color)} across ${String(region.w)}x${String(region.h)} at ${String(region.x)},${String(region.y)}`,
        );
      }
    }
  }
}
