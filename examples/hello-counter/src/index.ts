/**
 * Headless counter: a "+" button and a three-digit readout, driven by a
 * scripted pointer. Each frame is composited into a bitmap and the last one
 * is printed as characters.
 */

import {
  Bitmap,
  type Color,
  type DrawCommand,
  fixedSize,
  IDLE_MOUSE,
  type Mouse,
  MouseButton,
  nextMouse,
  type Pos,
  Renderer,
  type Sprite,
  UiContext,
  bigDigitsDisplay,
  btnIcon,
  nineSlice,
  simpleSpriteProps,
  sprite,
  widgetKey,
  widgetProps,
} from "@pxui/core";

const WIDTH = 40;
const HEIGHT = 16;

const BG: Color = 0xff181425;
const BUTTON: Color = 0xff3a4466;
const BUTTON_HOVER: Color = 0xff5a6988;
const INK: Color = 0xffffffff;
const BOX_EDGE: Color = 0xff8b9bb4;
const BOX_FILL: Color = 0xff262b44;
const SLOT: Color = 0xff2f3450;

/** 3x5 digit glyphs, one string per row, "#" lit. */
const DIGIT_ROWS: readonly (readonly string[])[] = [
  ["###", "#.#", "#.#", "#.#", "###"],
  [".#.", "##.", ".#.", ".#.", "###"],
  ["###", "..#", "###", "#..", "###"],
  ["###", "..#", "###", "..#", "###"],
  ["#.#", "#.#", "###", "..#", "..#"],
  ["###", "#..", "###", "..#", "###"],
  ["###", "#..", "###", "#.#", "###"],
  ["###", "..#", "..#", "..#", "..#"],
  ["###", "#.#", "###", "#.#", "###"],
  ["###", "#.#", "###", "..#", "###"],
];
const PLUS_ROWS: readonly string[] = [".#.", "###", ".#."];

function paintGlyph(sheet: Bitmap, at: Pos, rows: readonly string[], color: Color): void {
  rows.forEach((row, y) => {
    [...row].forEach((ch, x) => {
      if (ch === "#") sheet.set(at.x + x, at.y + y, color);
    });
  });
}

type Atlas = Readonly<{
  bitmap: Bitmap;
  digits: readonly Sprite[];
  plus: Sprite;
  placeholder: Sprite;
  box: Sprite;
}>;

/** Spritesheet drawn in code: ten digits, a plus, a digit slot and a box. */
function buildAtlas(): Atlas {
  const bitmap = new Bitmap({ w: 48, h: 16 });
  const digits = DIGIT_ROWS.map((rows, i) => {
    paintGlyph(bitmap, { x: i * 4, y: 0 }, rows, INK);
    return sprite(i * 4, 0, 3, 5);
  });
  paintGlyph(bitmap, { x: 40, y: 0 }, PLUS_ROWS, INK);
  for (let y = 8; y < 13; y++) for (let x = 0; x < 3; x++) bitmap.set(x, y, SLOT);
  for (let y = 8; y < 14; y++) {
    for (let x = 4; x < 10; x++) {
      const edge = x === 4 || x === 9 || y === 8 || y === 13;
      bitmap.set(x, y, edge ? BOX_EDGE : BOX_FILL);
    }
  }
  return {
    bitmap,
    digits,
    plus: sprite(40, 0, 3, 3),
    placeholder: sprite(0, 8, 3, 5),
    box: sprite(4, 8, 6, 6),
  };
}

const LEGEND = new Map<Color, string>([
  [BG, " "],
  [BUTTON, "."],
  [BUTTON_HOVER, ":"],
  [INK, "#"],
  [BOX_EDGE, "+"],
  [BOX_FILL, "-"],
  [SLOT, "_"],
]);

function toAscii(out: Bitmap): string {
  const rows: string[] = [];
  for (let y = 0; y < out.height; y++) {
    let row = "";
    for (let x = 0; x < out.width; x++) row += LEGEND.get(out.get(x, y)) ?? "?";
    rows.push(row);
  }
  return rows.join("\n");
}

const atlas = buildAtlas();
const output = new Bitmap({ w: WIDTH, h: HEIGHT });
const renderer = new Renderer(output, new Bitmap({ w: 64, h: 36 }), { clearColor: BG });
const sheet = renderer.registerSpritesheet(atlas.bitmap);
const ui = new UiContext({ viewport: { w: WIDTH, h: HEIGHT } });

let count = 98;
let mouse: Mouse = IDLE_MOUSE;

function frame(pos: Pos | null, buttons: number): void {
  const plus = btnIcon(
    ui,
    widgetProps(widgetKey("plus"), { size: fixedSize(9, 9), offset: { x: 2, y: 3 }, color: BUTTON }),
    simpleSpriteProps(widgetKey("plus-icon"), sheet, atlas.plus),
    BUTTON_HOVER,
  );
  if (plus.clicked) count++;

  const display = bigDigitsDisplay(ui, widgetKey("count"), count, {
    sheet,
    box: nineSlice(atlas.box, 2),
    placeholder: atlas.placeholder,
    digits: atlas.digits,
  });
  ui.patchProps(display.id, { offset: { x: 14, y: 3 } });

  ui.solveLayout();
  const commands: DrawCommand[] = [{ kind: "clear" }];
  ui.drawWidgets(commands);
  renderer.draw(commands);
  ui.freeUntouchedWidgets();

  mouse = nextMouse(mouse, pos, buttons);
  ui.react(mouse);
}

const OVER_PLUS: Pos = { x: 6, y: 7 };
const script: ReadonlyArray<readonly [Pos | null, number]> = [
  [null, 0],
  [OVER_PLUS, 0],
  [OVER_PLUS, MouseButton.LEFT],
  [OVER_PLUS, 0],
  [OVER_PLUS, MouseButton.LEFT],
  [OVER_PLUS, 0],
  [OVER_PLUS, 0],
];
for (const [pos, buttons] of script) frame(pos, buttons);

console.log(`count=${String(count)} widgets=${String(ui.widgetCount)}`);
console.log(toAscii(output));
