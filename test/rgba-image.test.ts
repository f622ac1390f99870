import { describe, expect, it } from "vitest";

import {
  blitCentered,
  createImage,
  fillRect,
  rotateQuarterTurns,
} from "../src/dungeon/render/rgbaImage.js";
import type { Rgba, RgbaImage } from "../src/dungeon/render/rgbaImage.js";

const A: Rgba = [255, 0, 0, 255];
const B: Rgba = [0, 0, 255, 255];

function pixel(img: RgbaImage, x: number, y: number): number[] {
  const o = (y * img.width + x) * 4;
  return Array.from(img.data.subarray(o, o + 4));
}

describe("rgbaImage", () => {
  const strip = createImage(2, 1);
  fillRect(strip, 0, 0, 1, 1, A);
  fillRect(strip, 1, 0, 1, 1, B);

  it("rotates clockwise a quarter turn at a time", () => {
    const once = rotateQuarterTurns(strip, 1);
    expect([once.width, once.height]).toEqual([1, 2]);
    expect(pixel(once, 0, 0)).toEqual([...A]);
    expect(pixel(once, 0, 1)).toEqual([...B]);

    const half = rotateQuarterTurns(strip, 2);
    expect(pixel(half, 0, 0)).toEqual([...B]);

    const back = rotateQuarterTurns(strip, 3);
    expect(pixel(back, 0, 0)).toEqual([...B]);
    expect(pixel(back, 0, 1)).toEqual([...A]);

    expect(rotateQuarterTurns(strip, 4)).toBe(strip);
  });

  it("centres an overlay inside a cell", () => {
    const dst = createImage(8, 8, [0, 0, 0, 255]);
    blitCentered(dst, createImage(2, 2, A), 0, 0, 8);
    expect(pixel(dst, 3, 3)).toEqual([...A]);
    expect(pixel(dst, 4, 4)).toEqual([...A]);
    expect(pixel(dst, 2, 3)).toEqual([0, 0, 0, 255]);
  });

  it("skips fully transparent source pixels", () => {
    const dst = createImage(2, 2, B);
    blitCentered(dst, createImage(2, 2), 0, 0, 2);
    expect(pixel(dst, 1, 1)).toEqual([...B]);
  });
});
