import type { ByteSource } from "./binary.js";
import { DungeonDecodeError } from "./errors.js";
import { CELLS_PER_MAP, MAP_SIZE, extractBits } from "./format.js";
import type { BitField, DungeonFormat, LegendEntry } from "./format.js";

export const UNKNOWN_TILE_NAME = "unknown";

export type Orientation = "horizontal" | "vertical";
export type StairsDirection = "up" | "down";

export type Tile = Readonly<{
  code: number;
  name: string; // UNKNOWN_TILE_NAME when the legend has no entry for code
  known: boolean;
  hasObjects: boolean;
  doorOrientation?: Orientation;
  stairsOrientation?: Orientation;
  stairsDirection?: StairsDirection;
}>;

export type TileGrid = Readonly<{
  mapIndex: number;
  width: number;
  height: number;
  cells: ReadonlyArray<Tile>; // row-major, cells[y * width + x]
}>;

export function gridBlockSize(format: DungeonFormat): number {
  return format.grid.cell.kind === "nibble" ? CELLS_PER_MAP / 2 : CELLS_PER_MAP;
}

export function legendLookup(legend: ReadonlyArray<LegendEntry>): ReadonlyMap<number, string> {
  return new Map(legend.map((e) => [e.code, e.name]));
}

export function tileAt(grid: TileGrid, x: number, y: number): Tile | undefined {
  if (!Number.isInteger(x) || !Number.isInteger(y)) return undefined;
  if (x < 0 || y < 0 || x >= grid.width || y >= grid.height) return undefined;
  return grid.cells[y * grid.width + x];
}

// Raw values, storage order
function readCells(src: ByteSource, offset: number, format: DungeonFormat): number[] {
  const cell = format.grid.cell;
  const out: number[] = [];

  if (cell.kind === "byte") {
    for (let i = 0; i < CELLS_PER_MAP; i++) out.push(src.readU8(offset + i));
    return out;
  }

  for (let i = 0; i < CELLS_PER_MAP / 2; i++) {
    const b = src.readU8(offset + i);
    const lo = b & 0x0f;
    const hi = b >>> 4;
    if (cell.lowFirst) out.push(lo, hi);
    else out.push(hi, lo);
  }
  return out;
}

function decodeTile(raw: number, format: DungeonFormat, names: ReadonlyMap<number, string>): Tile {
  const cell = format.grid.cell;
  const code = extractBits(raw, cell.code);
  const name = names.get(code);

  if (cell.kind === "nibble") {
    return { code, name: name ?? UNKNOWN_TILE_NAME, known: name !== undefined, hasObjects: false };
  }

  const tile: {
    code: number;
    name: string;
    known: boolean;
    hasObjects: boolean;
    doorOrientation?: Orientation;
    stairsOrientation?: Orientation;
    stairsDirection?: StairsDirection;
  } = {
    code,
    name: name ?? UNKNOWN_TILE_NAME,
    known: name !== undefined,
    hasObjects: cell.objects !== undefined && extractBits(raw, cell.objects) !== 0,
  };

  const orientation = (f: BitField): Orientation =>
    extractBits(raw, f) !== 0 ? "vertical" : "horizontal";

  if (format.grid.doorCode === code && cell.orientation) {
    tile.doorOrientation = orientation(cell.orientation);
  }
  if (format.grid.stairsCode === code) {
    if (cell.orientation) tile.stairsOrientation = orientation(cell.orientation);
    if (cell.stairsDirection) {
      tile.stairsDirection = extractBits(raw, cell.stairsDirection) !== 0 ? "up" : "down";
    }
  }

  return tile;
}

export function decodeTileGrid(
  src: ByteSource,
  offset: number,
  mapIndex: number,
  format: DungeonFormat,
): TileGrid {
  const size = gridBlockSize(format);
  if (!src.contains(offset, size)) {
    throw new DungeonDecodeError(
      "TruncatedGrid",
      offset,
      `map ${mapIndex} tile block needs ${size} bytes, buffer length is ${src.length}`,
    );
  }

  const names = legendLookup(format.grid.legend);
  const raw = readCells(src, offset, format);
  const cells: Tile[] = new Array<Tile>(CELLS_PER_MAP);

  for (let i = 0; i < CELLS_PER_MAP; i++) {
    // Storage index -> (x, y)
    const a = Math.floor(i / MAP_SIZE);
    const b = i % MAP_SIZE;
    const x = format.grid.order === "row-major" ? b : a;
    const y = format.grid.order === "row-major" ? a : b;
    cells[y * MAP_SIZE + x] = decodeTile(raw[i]!, format, names);
  }

  return { mapIndex, width: MAP_SIZE, height: MAP_SIZE, cells };
}
