import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import path from "node:path";
import os from "node:os";
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";

import { decodeDungeon } from "../src/dungeon/decode.js";
import { parseLegendJsonV1 } from "../src/dungeon/dungeonJsonV1.js";
import { runExportTool } from "../src/dungeon/exportTool.js";
import { PC_FORMAT, PC_NIBBLE_FORMAT } from "../src/dungeon/format.js";
import { decodePngRgba, writePngRgba } from "../src/dungeon/render/png.js";
import { runRenderTool } from "../src/dungeon/render/renderTool.js";
import { createImage } from "../src/dungeon/render/rgbaImage.js";
import { loadTileArt } from "../src/dungeon/render/tileArt.js";
import { resolveFormat } from "../src/dungeon/worldFile.js";
import type { Rgba, RgbaImage } from "../src/dungeon/render/rgbaImage.js";

import { sampleWorld } from "./support/worldBuilder.js";

const TILE_NAMES = ["wall", "floor", "pit", "stairs", "door", "teleporter", "trick_wall", "empty"];

function pixel(img: RgbaImage, x: number, y: number): number[] {
  const o = (y * img.width + x) * 4;
  return Array.from(img.data.subarray(o, o + 4));
}

async function readPng(p: string): Promise<RgbaImage> {
  return decodePngRgba(await readFile(p));
}

let tmpDir = "";

beforeEach(async () => {
  tmpDir = await mkdtemp(path.join(os.tmpdir(), "dungeontools_"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(tmpDir, { recursive: true, force: true });
});

describe("runExportTool", () => {
  it("writes one document per map plus the legend, and skips them on a second run", async () => {
    const world = decodeDungeon(sampleWorld().bytes);
    const out = path.join(tmpDir, "export");

    expect(await runExportTool(world, { out })).toEqual({ written: 3, skipped: 0 });
    expect((await readdir(out)).sort()).toEqual(["legend.json", "level_00.json", "level_01.json"]);

    const legendText = await readFile(path.join(out, "legend.json"), "utf8");
    const legend = parseLegendJsonV1(JSON.parse(legendText));
    expect(legend.startingPosition).toEqual({ map: 1, x: 3, y: 4, direction: "east" });

    expect(await runExportTool(world, { out })).toEqual({ written: 0, skipped: 3 });
    expect(console.warn).toHaveBeenCalledWith(`Skip (exists): ${path.join(out, "legend.json")}`);

    expect(await runExportTool(world, { out, overwrite: true })).toEqual({ written: 3, skipped: 0 });
  });

  it("writes nothing on a dry run", async () => {
    const world = decodeDungeon(sampleWorld().bytes);
    const out = path.join(tmpDir, "dry");

    expect(await runExportTool(world, { out, dryRun: true })).toEqual({ written: 0, skipped: 0 });
    expect(console.log).toHaveBeenCalledWith(`[dry-run] ${path.join(out, "level_00.json")}`);
    await expect(readdir(out)).rejects.toThrow();
  });
});

describe("runRenderTool", () => {
  it("renders an export directory with the built-in palette", async () => {
    const exported = path.join(tmpDir, "export");
    await runExportTool(decodeDungeon(sampleWorld().bytes), { out: exported });

    const out = path.join(tmpDir, "png");
    const summary = await runRenderTool(exported, { format: PC_FORMAT, out, tileSize: 8 });
    expect(summary).toEqual({ rendered: 2, skipped: 0 });
    expect((await readdir(out)).sort()).toEqual(["level_00.png", "level_01.png"]);

    const img = await readPng(path.join(out, "level_00.png"));
    expect([img.width, img.height]).toEqual([256, 256]);
    expect(pixel(img, 0, 0)).toEqual([196, 192, 176, 255]); // floor
    expect(pixel(img, 44, 84)).toEqual([208, 168, 40, 255]); // plate at (5,10)
    expect(pixel(img, 7 * 8, 7 * 8)).toEqual([64, 64, 72, 255]); // wall at (7,7)
  });

  it("renders straight from a world file", async () => {
    const input = path.join(tmpDir, "DUNGEON.DAT");
    await writeFile(input, sampleWorld().bytes);

    const summary = await runRenderTool(input, { format: PC_FORMAT });
    expect(summary).toEqual({ rendered: 2, skipped: 0 });

    const img = await readPng(path.join(tmpDir, "DUNGEON__png", "level_01.png"));
    expect([img.width, img.height]).toEqual([512, 512]);
  });

  it("draws tiles from an assets directory", async () => {
    const assets = path.join(tmpDir, "assets");
    await mkdir(assets);
    const colors: Record<string, Rgba> = { floor: [10, 200, 10, 255], wall: [90, 90, 90, 255] };
    for (const name of TILE_NAMES) {
      const img = createImage(4, 4, colors[name] ?? [0, 0, 128, 255]);
      await writeFile(path.join(assets, `${name}.png`), writePngRgba(img));
    }

    const input = path.join(tmpDir, "world.dat");
    await writeFile(input, sampleWorld().bytes);
    const out = path.join(tmpDir, "art");

    await runRenderTool(input, { format: PC_FORMAT, out, assets, tileSize: 8 });
    expect(console.warn).toHaveBeenCalledWith(
      `Ignoring tile size 8: tiles from ${assets} are 4px`,
    );
    const img = await readPng(path.join(out, "level_00.png"));
    expect([img.width, img.height]).toEqual([128, 128]);
    expect(pixel(img, 0, 0)).toEqual([10, 200, 10, 255]);
    expect(pixel(img, 7 * 4, 7 * 4)).toEqual([90, 90, 90, 255]);
  });

  it("fails when a base tile image is missing", async () => {
    const assets = path.join(tmpDir, "assets");
    await mkdir(assets);
    for (const name of TILE_NAMES.filter((n) => n !== "pit")) {
      await writeFile(path.join(assets, `${name}.png`), writePngRgba(createImage(4, 4)));
    }
    const input = path.join(tmpDir, "world.dat");
    await writeFile(input, sampleWorld().bytes);

    await expect(runRenderTool(input, { format: PC_FORMAT, assets })).rejects.toThrow(
      `Expected base tile asset 'pit.png' not found in ${assets}`,
    );
  });

  it("rejects base tiles of different sizes", async () => {
    const assets = path.join(tmpDir, "assets");
    await mkdir(assets);
    await writeFile(path.join(assets, "wall.png"), writePngRgba(createImage(4, 4)));
    await writeFile(path.join(assets, "floor.png"), writePngRgba(createImage(4, 5)));

    await expect(loadTileArt(assets, ["wall", "floor"])).rejects.toThrow(
      "All base tile images must have the same dimensions; 'floor.png' is 4x5, expected 4x4",
    );
  });
});

describe("resolveFormat", () => {
  it("defaults to pc and looks up built-ins by name", async () => {
    expect(await resolveFormat({})).toBe(PC_FORMAT);
    expect(await resolveFormat({ format: "pc-nibble" })).toBe(PC_NIBBLE_FORMAT);
  });

  it("reads a format description from a JSON file", async () => {
    const file = path.join(tmpDir, "format.json");
    await writeFile(file, JSON.stringify(PC_NIBBLE_FORMAT), "utf8");
    expect(await resolveFormat({ formatFile: file })).toEqual(PC_NIBBLE_FORMAT);
  });

  it("prefixes a bad description's error with its path", async () => {
    const file = path.join(tmpDir, "bad.json");
    await writeFile(file, JSON.stringify({ name: "broken" }), "utf8");
    await expect(resolveFormat({ formatFile: file })).rejects.toThrow(
      `${file}: Invalid header: expected object`,
    );
  });

  it("refuses --format together with --format-file", async () => {
    await expect(resolveFormat({ format: "pc", formatFile: "x.json" })).rejects.toThrow(
      "Use either --format or --format-file, not both",
    );
  });
});
