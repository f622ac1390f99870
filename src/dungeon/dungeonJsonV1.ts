// src/dungeon/dungeonJsonV1.ts
//
// Text form of a decoded world: one level document per map and one shared
// legend document. Grids are 32 rows of 32 entries, indexed [y][x].

import type { DecodedMap, DecodedWorld } from "./decode.js";
import { FACINGS } from "./format.js";
import type { Facing } from "./format.js";
import type { SensorKind } from "./sensors.js";
import type { Orientation, StairsDirection, Tile } from "./tileGrid.js";
import {
  expectArray,
  expectBoolean,
  expectInt,
  expectObject,
  expectOneOf,
  expectString,
} from "./jsonParse.js";

export const LEVEL_SCHEMA = "dungeontools.level.json.v1";
export const LEGEND_SCHEMA = "dungeontools.legend.json.v1";

const ORIENTATIONS: ReadonlyArray<Orientation> = ["horizontal", "vertical"];
const STAIRS_DIRECTIONS: ReadonlyArray<StairsDirection> = ["up", "down"];
const SENSOR_KINDS: ReadonlyArray<SensorKind> = ["PressurePlate", "WallButton", "Other"];

export type SensorJson = {
  index: number;
  x: number;
  y: number;
  kind: SensorKind;
  type: number;
  data: number;
  side: Facing;
  decoration: number;
  valid: boolean;
};

export type LevelJsonV1 = {
  schema: typeof LEVEL_SCHEMA;
  map: number;
  width: number;
  height: number;
  codes: number[][];
  grid: string[][];
  objects: boolean[][];
  doorOrientation: Array<Array<Orientation | null>>;
  stairsOrientation: Array<Array<Orientation | null>>;
  stairsDirection: Array<Array<StairsDirection | null>>;
  sensors: SensorJson[];
};

export type PlateJson = { map: number; x: number; y: number; type: number };
export type ButtonJson = { map: number; x: number; y: number; direction: Facing; type: number };
export type FountainJson = { map: number; x: number; y: number; direction: Facing };

export type LegendJsonV1 = {
  schema: typeof LEGEND_SCHEMA;
  format: string;
  randomSeed?: number;
  maps: number;
  tiles: Record<string, string>;
  startingPosition: { map: number; x: number; y: number; direction: Facing };
  pressurePlates: PlateJson[];
  buttons: ButtonJson[];
  fountains: FountainJson[];
  unknownTiles: number;
};

function rows<T>(m: DecodedMap, f: (t: Tile) => T): T[][] {
  const out: T[][] = [];
  for (let y = 0; y < m.grid.height; y++) {
    const row: T[] = [];
    for (let x = 0; x < m.grid.width; x++) row.push(f(m.grid.cells[y * m.grid.width + x]!));
    out.push(row);
  }
  return out;
}

export function levelToJsonV1(m: DecodedMap): LevelJsonV1 {
  return {
    schema: LEVEL_SCHEMA,
    map: m.index,
    width: m.grid.width,
    height: m.grid.height,
    codes: rows(m, (t) => t.code),
    grid: rows(m, (t) => t.name),
    objects: rows(m, (t) => t.hasObjects),
    doorOrientation: rows(m, (t) => t.doorOrientation ?? null),
    stairsOrientation: rows(m, (t) => t.stairsOrientation ?? null),
    stairsDirection: rows(m, (t) => t.stairsDirection ?? null),
    sensors: m.sensors.map((s) => ({
      index: s.index,
      x: s.x,
      y: s.y,
      kind: s.kind,
      type: s.type,
      data: s.data,
      side: s.side,
      decoration: s.decoration,
      valid: s.valid,
    })),
  };
}

export function legendToJsonV1(world: DecodedWorld): LegendJsonV1 {
  const tiles: Record<string, string> = {};
  for (const e of world.legend) tiles[String(e.code)] = e.name;

  const placed = world.sensors.filter((s) => s.valid);

  const out: LegendJsonV1 = {
    schema: LEGEND_SCHEMA,
    format: world.format,
    maps: world.maps.length,
    tiles,
    startingPosition: {
      map: world.party.mapIndex,
      x: world.party.x,
      y: world.party.y,
      direction: world.party.facing,
    },
    pressurePlates: placed
      .filter((s) => s.kind === "PressurePlate")
      .map((s) => ({ map: s.map, x: s.x, y: s.y, type: s.type })),
    buttons: placed
      .filter((s) => s.kind === "WallButton")
      .map((s) => ({ map: s.map, x: s.x, y: s.y, direction: s.side, type: s.type })),
    fountains: world.fountains.map((f) => ({
      map: f.map,
      x: f.x,
      y: f.y,
      direction: f.direction,
    })),
    unknownTiles: world.anomalies.filter((a) => a.kind === "unknown-tile").length,
  };
  if (world.randomSeed !== undefined) out.randomSeed = world.randomSeed;
  return out;
}

export function levelFileName(map: number): string {
  return `level_${String(map).padStart(2, "0")}`;
}

export function stringifyLevelJsonV1(doc: LevelJsonV1): string {
  return JSON.stringify(doc, null, 2) + "\n";
}

export function stringifyLegendJsonV1(doc: LegendJsonV1): string {
  return JSON.stringify(doc, null, 2) + "\n";
}

/* ---------------- parsing ---------------- */

function parseGridRows<T>(
  v: unknown,
  name: string,
  width: number,
  height: number,
  cell: (c: unknown, at: string) => T,
): T[][] {
  const rs = expectArray(v, name);
  if (rs.length !== height) throw new Error(`Invalid ${name}: expected ${height} rows`);
  return rs.map((r, y) => {
    const row = expectArray(r, `${name}[${y}]`);
    if (row.length !== width) throw new Error(`Invalid ${name}[${y}]: expected ${width} cells`);
    return row.map((c, x) => cell(c, `${name}[${y}][${x}]`));
  });
}

function nullOr<T>(f: (c: unknown, at: string) => T): (c: unknown, at: string) => T | null {
  return (c, at) => (c === null ? null : f(c, at));
}

function parseSensorJson(v: unknown, name: string): SensorJson {
  const o = expectObject(v, name);
  return {
    index: expectInt(o.index, `${name}.index`, 0, 0xffff),
    x: expectInt(o.x, `${name}.x`, 0, 0xff),
    y: expectInt(o.y, `${name}.y`, 0, 0xff),
    kind: expectOneOf(o.kind, `${name}.kind`, SENSOR_KINDS),
    type: expectInt(o.type, `${name}.type`, 0, 0xffff),
    data: expectInt(o.data, `${name}.data`, 0, 0xffff),
    side: expectOneOf(o.side, `${name}.side`, FACINGS),
    decoration: expectInt(o.decoration, `${name}.decoration`, 0, 0xffff),
    valid: expectBoolean(o.valid, `${name}.valid`),
  };
}

export function parseLevelJsonV1(input: unknown): LevelJsonV1 {
  const o = expectObject(input, "level");
  if (o.schema !== LEVEL_SCHEMA) throw new Error("Invalid schema");

  const width = expectInt(o.width, "width", 1, 0xff);
  const height = expectInt(o.height, "height", 1, 0xff);
  const orientation = nullOr((c, at) => expectOneOf(c, at, ORIENTATIONS));

  return {
    schema: LEVEL_SCHEMA,
    map: expectInt(o.map, "map", 0, 0xffff),
    width,
    height,
    codes: parseGridRows(o.codes, "codes", width, height, (c, at) => expectInt(c, at, 0, 0xffff)),
    grid: parseGridRows(o.grid, "grid", width, height, expectString),
    objects: parseGridRows(o.objects, "objects", width, height, expectBoolean),
    doorOrientation: parseGridRows(o.doorOrientation, "doorOrientation", width, height, orientation),
    stairsOrientation: parseGridRows(
      o.stairsOrientation,
      "stairsOrientation",
      width,
      height,
      orientation,
    ),
    stairsDirection: parseGridRows(
      o.stairsDirection,
      "stairsDirection",
      width,
      height,
      nullOr((c, at) => expectOneOf(c, at, STAIRS_DIRECTIONS)),
    ),
    sensors: expectArray(o.sensors, "sensors").map((s, i) => parseSensorJson(s, `sensors[${i}]`)),
  };
}

type Coords = { map: number; x: number; y: number };

function parseCoords(o: Record<string, unknown>, name: string): Coords {
  return {
    map: expectInt(o.map, `${name}.map`, 0, 0xffff),
    x: expectInt(o.x, `${name}.x`, 0, 31),
    y: expectInt(o.y, `${name}.y`, 0, 31),
  };
}

export function parseLegendJsonV1(input: unknown): LegendJsonV1 {
  const o = expectObject(input, "legend");
  if (o.schema !== LEGEND_SCHEMA) throw new Error("Invalid schema");

  const tilesIn = expectObject(o.tiles, "tiles");
  const tiles: Record<string, string> = {};
  for (const [k, v] of Object.entries(tilesIn)) {
    if (!/^\d+$/.test(k)) throw new Error(`Invalid tiles key '${k}': expected a numeric code`);
    tiles[k] = expectString(v, `tiles.${k}`);
  }

  const sp = expectObject(o.startingPosition, "startingPosition");

  const out: LegendJsonV1 = {
    schema: LEGEND_SCHEMA,
    format: expectString(o.format, "format"),
    maps: expectInt(o.maps, "maps", 0, 0xffff),
    tiles,
    startingPosition: {
      ...parseCoords(sp, "startingPosition"),
      direction: expectOneOf(sp.direction, "startingPosition.direction", FACINGS),
    },
    pressurePlates: expectArray(o.pressurePlates, "pressurePlates").map((p, i) => {
      const name = `pressurePlates[${i}]`;
      const po = expectObject(p, name);
      return { ...parseCoords(po, name), type: expectInt(po.type, `${name}.type`, 0, 0xffff) };
    }),
    buttons: expectArray(o.buttons, "buttons").map((b, i) => {
      const name = `buttons[${i}]`;
      const bo = expectObject(b, name);
      return {
        ...parseCoords(bo, name),
        direction: expectOneOf(bo.direction, `${name}.direction`, FACINGS),
        type: expectInt(bo.type, `${name}.type`, 0, 0xffff),
      };
    }),
    fountains: expectArray(o.fountains, "fountains").map((f, i) => {
      const name = `fountains[${i}]`;
      const fo = expectObject(f, name);
      return {
        ...parseCoords(fo, name),
        direction: expectOneOf(fo.direction, `${name}.direction`, FACINGS),
      };
    }),
    unknownTiles: expectInt(o.unknownTiles, "unknownTiles", 0, Number.MAX_SAFE_INTEGER),
  };
  if (o.randomSeed !== undefined) {
    out.randomSeed = expectInt(o.randomSeed, "randomSeed", 0, 0xffffffff);
  }
  return out;
}
