// src/dungeon/render/tileArt.ts
import path from "node:path";

import { existsPath } from "../worldFile.js";
import { loadPngRgba } from "./png.js";
import { createImage, fillRect } from "./rgbaImage.js";
import type { Rgba, RgbaImage } from "./rgbaImage.js";

export type TileArt = Readonly<{
  tileSize: number;
  tiles: ReadonlyMap<string, RgbaImage>;
  fallback: RgbaImage; // names with no image of their own
  pressurePlate?: RgbaImage;
  button?: RgbaImage; // drawn facing north, rotated per wall side
  party?: RgbaImage; // drawn facing north
}>;

export const DEFAULT_TILE_SIZE = 16;

const PALETTE: Readonly<Record<string, Rgba>> = {
  wall: [64, 64, 72, 255],
  floor: [196, 192, 176, 255],
  pit: [24, 20, 20, 255],
  stairs: [150, 110, 60, 255],
  door: [140, 72, 32, 255],
  teleporter: [80, 120, 220, 255],
  trick_wall: [104, 88, 128, 255],
  empty: [236, 236, 236, 255],
};

const UNKNOWN_COLOR: Rgba = [255, 0, 255, 255];
const GRID_LINE: Rgba = [0, 0, 0, 64];
const PLATE_COLOR: Rgba = [208, 168, 40, 255];
const BUTTON_COLOR: Rgba = [220, 40, 40, 255];
const PARTY_COLOR: Rgba = [40, 190, 80, 255];

function solidTile(size: number, color: Rgba): RgbaImage {
  const img = createImage(size, size, color);
  fillRect(img, 0, size - 1, size, 1, GRID_LINE);
  fillRect(img, size - 1, 0, 1, size, GRID_LINE);
  return img;
}

function plateIcon(size: number): RgbaImage {
  const img = createImage(size, size);
  const q = Math.max(1, Math.floor(size / 4));
  fillRect(img, q, q, size - 2 * q, size - 2 * q, PLATE_COLOR);
  return img;
}

function buttonIcon(size: number): RgbaImage {
  // A notch against the north edge.
  const img = createImage(size, size);
  const q = Math.max(1, Math.floor(size / 4));
  fillRect(img, q, 0, size - 2 * q, q, BUTTON_COLOR);
  return img;
}

function partyIcon(size: number): RgbaImage {
  // Body plus a nose pointing north.
  const img = createImage(size, size);
  const q = Math.max(1, Math.floor(size / 4));
  fillRect(img, q, 2 * q, size - 2 * q, size - 3 * q, PARTY_COLOR);
  fillRect(img, Math.floor(size / 2) - Math.floor(q / 2), q, Math.max(1, q), q, PARTY_COLOR);
  return img;
}

export function paletteTileArt(
  tileNames: ReadonlyArray<string>,
  tileSize: number = DEFAULT_TILE_SIZE,
): TileArt {
  if (!Number.isInteger(tileSize) || tileSize < 4) {
    throw new Error(`Invalid tile size: ${tileSize} (expected an integer >= 4)`);
  }
  const tiles = new Map<string, RgbaImage>();
  for (const name of tileNames) {
    tiles.set(name, solidTile(tileSize, PALETTE[name] ?? UNKNOWN_COLOR));
  }
  return {
    tileSize,
    tiles,
    fallback: solidTile(tileSize, UNKNOWN_COLOR),
    pressurePlate: plateIcon(tileSize),
    button: buttonIcon(tileSize),
    party: partyIcon(tileSize),
  };
}

async function loadOptional(assetsDir: string, name: string): Promise<RgbaImage | undefined> {
  const p = path.join(assetsDir, `${name}.png`);
  if (!(await existsPath(p))) return undefined;
  return loadPngRgba(p);
}

// <name>.png for every tile name, all one size; overlays are optional.
export async function loadTileArt(
  assetsDir: string,
  tileNames: ReadonlyArray<string>,
): Promise<TileArt> {
  const tiles = new Map<string, RgbaImage>();
  let first: { name: string; img: RgbaImage } | undefined;

  for (const name of tileNames) {
    const img = await loadOptional(assetsDir, name);
    if (!img) throw new Error(`Expected base tile asset '${name}.png' not found in ${assetsDir}`);

    if (!first) first = { name, img };
    else if (img.width !== first.img.width || img.height !== first.img.height) {
      throw new Error(
        `All base tile images must have the same dimensions; '${name}.png' is ` +
          `${img.width}x${img.height}, expected ${first.img.width}x${first.img.height}`,
      );
    }
    tiles.set(name, img);
  }

  if (!first) throw new Error("No base tiles to load (legend is empty)");

  const out: {
    tileSize: number;
    tiles: Map<string, RgbaImage>;
    fallback: RgbaImage;
    pressurePlate?: RgbaImage;
    button?: RgbaImage;
    party?: RgbaImage;
  } = {
    tileSize: first.img.width,
    tiles,
    fallback: tiles.get("wall") ?? first.img,
  };

  const plate = await loadOptional(assetsDir, "pressure_plate");
  if (plate) out.pressurePlate = plate;
  const button = await loadOptional(assetsDir, "button");
  if (button) out.button = button;
  const party = await loadOptional(assetsDir, "party");
  if (party) out.party = party;

  return out;
}
