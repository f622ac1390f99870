import type { ByteSource } from "./binary.js";
import { readField } from "./binary.js";
import { FACINGS, MAP_SIZE, extractBits } from "./format.js";
import type { DungeonFormat, Facing, SensorLayout } from "./format.js";
import { tileAt } from "./tileGrid.js";
import type { TileGrid } from "./tileGrid.js";

export type SensorKind = "PressurePlate" | "WallButton" | "Other";

export type Sensor = Readonly<{
  map: number;
  index: number; // record index within the map's sensor list
  x: number;
  y: number;
  kind: SensorKind;
  type: number;
  data: number;
  side: Facing; // the wall face a button sits on
  decoration: number; // wall decoration ordinal, 0 = none
  valid: boolean; // false when (x, y) is outside the map
}>;

export function isInsideMap(x: number, y: number): boolean {
  return x >= 0 && y >= 0 && x < MAP_SIZE && y < MAP_SIZE;
}

// With a tile, walls carry buttons and everything else carries plates.
export function classifySensor(
  type: number,
  layout: SensorLayout,
  tileCode: number | undefined,
): SensorKind {
  const plate = layout.pressurePlateTypes.includes(type);
  const button = layout.wallButtonTypes.includes(type);

  if (tileCode === undefined) {
    if (plate && !button) return "PressurePlate";
    if (button && !plate) return "WallButton";
    return "Other";
  }

  const isWall = layout.wallTileCodes.includes(tileCode);
  if (isWall && button) return "WallButton";
  if (!isWall && plate) return "PressurePlate";
  return "Other";
}

export function scanSensors(
  src: ByteSource,
  offset: number,
  mapIndex: number,
  format: DungeonFormat,
  grid?: TileGrid,
): Sensor[] {
  const layout = format.sensors;
  const count = readField(src, offset, layout.count);
  const out: Sensor[] = [];

  for (let i = 0; i < count; i++) {
    const rec = offset + layout.firstRecord + i * layout.recordSize;

    const typeWord = readField(src, rec, layout.typeWord);
    const type = extractBits(typeWord, layout.type);
    const data = extractBits(typeWord, layout.data);
    const x = readField(src, rec, layout.x);
    const y = readField(src, rec, layout.y);
    const sideWord = readField(src, rec, layout.sideWord);
    const side = FACINGS[extractBits(sideWord, layout.side) & 3]!;
    const decoration = extractBits(sideWord, layout.decoration);

    const valid = isInsideMap(x, y);
    const tile = valid && grid ? tileAt(grid, x, y) : undefined;

    out.push({
      map: mapIndex,
      index: i,
      x,
      y,
      kind: classifySensor(type, layout, tile?.code),
      type,
      data,
      side,
      decoration,
      valid,
    });
  }

  return out;
}
