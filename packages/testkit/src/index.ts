export { assert, beforeEach, describe, test } from "./nodeTest.js";
export {
  assertPixelsEqual,
  assertRegionColor,
  pixelArt,
  pixelDump,
  type PixelGridSource,
} from "./pixels.js";
