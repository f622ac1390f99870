import type { ByteSource } from "./binary.js";
import { readField } from "./binary.js";
import type { DungeonFormat, Facing } from "./format.js";
import type { Sensor } from "./sensors.js";
import { tileAt } from "./tileGrid.js";
import type { TileGrid } from "./tileGrid.js";

export type Fountain = Readonly<{
  map: number;
  x: number;
  y: number;
  direction: Facing;
  sensorIndex: number;
}>;

export function wallDecorationsOffset(
  src: ByteSource,
  sensorListOffset: number,
  format: DungeonFormat,
): number {
  const layout = format.sensors;
  const count = readField(src, sensorListOffset, layout.count);
  return sensorListOffset + layout.firstRecord + count * layout.recordSize;
}

// Decoration graphic ids in list order; empty when the format has no list.
export function readWallDecorations(
  src: ByteSource,
  sensorListOffset: number,
  format: DungeonFormat,
): number[] {
  const d = format.decorations;
  if (!d) return [];

  const base = wallDecorationsOffset(src, sensorListOffset, format);
  const count = readField(src, base, d.count);
  const out: number[] = [];
  for (let i = 0; i < count; i++) {
    const entry = { offset: d.firstEntry + i * d.entryWidth, width: d.entryWidth };
    out.push(readField(src, base, entry));
  }
  return out;
}

// A fountain is a decoration sensor on a wall whose ordinal resolves to a fountain graphic.
export function findFountains(
  sensors: ReadonlyArray<Sensor>,
  grid: TileGrid,
  wallDecorations: ReadonlyArray<number>,
  format: DungeonFormat,
): Fountain[] {
  const d = format.decorations;
  if (!d) return [];

  const out: Fountain[] = [];
  for (const s of sensors) {
    if (!s.valid || s.decoration === 0 || !d.sensorTypes.includes(s.type)) continue;

    const tile = tileAt(grid, s.x, s.y);
    if (!tile || !format.sensors.wallTileCodes.includes(tile.code)) continue;

    const id = wallDecorations[s.decoration - 1];
    if (id === undefined || !d.fountainIds.includes(id)) continue;

    out.push({ map: s.map, x: s.x, y: s.y, direction: s.side, sensorIndex: s.index });
  }
  return out;
}
