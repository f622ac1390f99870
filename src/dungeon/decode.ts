// src/dungeon/decode.ts
import { ByteSource, readField } from "./binary.js";
import { PC_FORMAT } from "./format.js";
import type { DungeonFormat, LegendEntry } from "./format.js";
import { readOffsetTable } from "./offsetTable.js";
import { decodeTileGrid } from "./tileGrid.js";
import type { TileGrid } from "./tileGrid.js";
import { scanSensors } from "./sensors.js";
import type { Sensor } from "./sensors.js";
import { findFountains, readWallDecorations } from "./decorations.js";
import type { Fountain } from "./decorations.js";
import { locateParty } from "./party.js";
import type { PartyStart } from "./party.js";

export type DecodeAnomaly =
  | Readonly<{ kind: "unknown-tile"; map: number; x: number; y: number; code: number }>
  | Readonly<{ kind: "sensor-out-of-bounds"; map: number; index: number; x: number; y: number }>;

export type DecodedMap = Readonly<{
  index: number;
  tileGridOffset: number;
  sensorListOffset: number;
  grid: TileGrid;
  sensors: ReadonlyArray<Sensor>;
  wallDecorations: ReadonlyArray<number>;
  fountains: ReadonlyArray<Fountain>;
}>;

export type DecodedWorld = Readonly<{
  format: string;
  randomSeed?: number;
  maps: ReadonlyArray<DecodedMap>;
  sensors: ReadonlyArray<Sensor>; // every map's sensors, in map order
  fountains: ReadonlyArray<Fountain>;
  party: PartyStart;
  legend: ReadonlyArray<LegendEntry>;
  anomalies: ReadonlyArray<DecodeAnomaly>;
}>;

export type DecodeOptions = Readonly<{
  format?: DungeonFormat;
}>;

export function describeAnomaly(a: DecodeAnomaly): string {
  switch (a.kind) {
    case "unknown-tile":
      return `map ${a.map}: unknown tile code ${a.code} at (${a.x},${a.y})`;
    case "sensor-out-of-bounds":
      return `map ${a.map}: sensor #${a.index} at (${a.x},${a.y}) is outside the map`;
  }
}

function collectAnomalies(grid: TileGrid, sensors: ReadonlyArray<Sensor>): DecodeAnomaly[] {
  const out: DecodeAnomaly[] = [];

  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      const t = grid.cells[y * grid.width + x]!;
      if (!t.known) out.push({ kind: "unknown-tile", map: grid.mapIndex, x, y, code: t.code });
    }
  }

  for (const s of sensors) {
    if (!s.valid) {
      out.push({ kind: "sensor-out-of-bounds", map: s.map, index: s.index, x: s.x, y: s.y });
    }
  }

  return out;
}

/**
 * Decodes a whole world file held in memory. Structural failures throw a
 * DungeonDecodeError and nothing is returned; per-cell and per-sensor oddities
 * come back in `anomalies`.
 */
export function decodeDungeon(bytes: Uint8Array, options: DecodeOptions = {}): DecodedWorld {
  const format = options.format ?? PC_FORMAT;
  const src = new ByteSource(bytes);

  const table = readOffsetTable(src, format);

  const maps: DecodedMap[] = [];
  const sensors: Sensor[] = [];
  const fountains: Fountain[] = [];
  const anomalies: DecodeAnomaly[] = [];

  table.entries.forEach((entry, index) => {
    const grid = decodeTileGrid(src, entry.tileGridOffset, index, format);
    const mapSensors = scanSensors(src, entry.sensorListOffset, index, format, grid);
    const wallDecorations = readWallDecorations(src, entry.sensorListOffset, format);
    const mapFountains = findFountains(mapSensors, grid, wallDecorations, format);

    maps.push({
      index,
      tileGridOffset: entry.tileGridOffset,
      sensorListOffset: entry.sensorListOffset,
      grid,
      sensors: mapSensors,
      wallDecorations,
      fountains: mapFountains,
    });
    sensors.push(...mapSensors);
    fountains.push(...mapFountains);
    anomalies.push(...collectAnomalies(grid, mapSensors));
  });

  const party = locateParty(src, format, table.mapCount);

  const world: DecodedWorld = {
    format: format.name,
    maps,
    sensors,
    fountains,
    party,
    legend: format.grid.legend,
    anomalies,
  };

  if (format.header.randomSeed) {
    return { ...world, randomSeed: readField(src, 0, format.header.randomSeed) };
  }
  return world;
}
