// src/dungeon/format.ts
//
// Every byte offset, field width and bit mask the decoder relies on lives here.
// Format variants differ only in the DungeonFormat value they pass around.

import type { FieldSpec, FieldWidth } from "./binary.js";
import {
  expectArray,
  expectBoolean,
  expectInt,
  expectObject,
  expectString,
} from "./jsonParse.js";

export type Facing = "north" | "east" | "south" | "west";

export const FACINGS: ReadonlyArray<Facing> = ["north", "east", "south", "west"];

export const MAP_SIZE = 32;
export const CELLS_PER_MAP = MAP_SIZE * MAP_SIZE;

export type BitField = Readonly<{
  shift: number;
  mask: number;
}>;

export type CellOrder = "row-major" | "column-major";

export type CellEncoding =
  | Readonly<{
      kind: "byte";
      code: BitField;
      objects?: BitField;
      orientation?: BitField; // doors and stairs: 0 = horizontal, 1 = vertical
      stairsDirection?: BitField; // stairs: 0 = down, 1 = up
    }>
  | Readonly<{
      kind: "nibble";
      lowFirst: boolean;
      code: BitField;
    }>;

export type LegendEntry = Readonly<{
  code: number;
  name: string;
}>;

export type HeaderLayout = Readonly<{
  randomSeed?: FieldSpec;
  mapCount: FieldSpec;
  mapTableOffset: number;
  mapTableStride: number;
  tileGridOffset: FieldSpec; // relative to the table entry
  sensorListOffset: FieldSpec; // relative to the table entry
  maxMaps: number;
}>;

export type GridLayout = Readonly<{
  order: CellOrder;
  cell: CellEncoding;
  legend: ReadonlyArray<LegendEntry>;
  doorCode?: number;
  stairsCode?: number;
}>;

export type SensorLayout = Readonly<{
  count: FieldSpec; // relative to the sensor list
  firstRecord: number; // relative to the sensor list
  recordSize: number;
  typeWord: FieldSpec; // relative to the record
  type: BitField;
  data: BitField;
  x: FieldSpec;
  y: FieldSpec;
  sideWord: FieldSpec;
  side: BitField;
  decoration: BitField; // in sideWord; 1-based index into the map's wall decorations
  pressurePlateTypes: ReadonlyArray<number>;
  wallButtonTypes: ReadonlyArray<number>;
  wallTileCodes: ReadonlyArray<number>;
}>;

// The wall decoration list sits right after a map's sensor records.
export type DecorationLayout = Readonly<{
  count: FieldSpec; // relative to the end of the sensor records
  firstEntry: number; // relative to the end of the sensor records
  entryWidth: FieldWidth;
  sensorTypes: ReadonlyArray<number>; // sensor types that show a decoration
  fountainIds: ReadonlyArray<number>;
}>;

export type PartyLayout = Readonly<{
  offset: number;
  position: FieldSpec; // relative to the party record
  x: BitField;
  y: BitField;
  facingShift: number; // two bits, see FACINGS
  mapIndex: FieldSpec; // relative to the party record
}>;

export type DungeonFormat = Readonly<{
  name: string;
  description: string;
  header: HeaderLayout;
  grid: GridLayout;
  sensors: SensorLayout;
  decorations?: DecorationLayout;
  party: PartyLayout;
}>;

export function extractBits(value: number, field: BitField): number {
  return (value >>> field.shift) & field.mask;
}

const PC_LEGEND: ReadonlyArray<LegendEntry> = [
  { code: 0, name: "wall" },
  { code: 1, name: "floor" },
  { code: 2, name: "pit" },
  { code: 3, name: "stairs" },
  { code: 4, name: "door" },
  { code: 5, name: "teleporter" },
  { code: 6, name: "trick_wall" },
  { code: 7, name: "empty" },
];

const PC_HEADER: HeaderLayout = {
  randomSeed: { offset: 0x00, width: 2 },
  mapCount: { offset: 0x06, width: 2 },
  mapTableOffset: 0x08,
  mapTableStride: 8,
  tileGridOffset: { offset: 0, width: 4 },
  sensorListOffset: { offset: 4, width: 4 },
  maxMaps: 64,
};

const PC_SENSORS: SensorLayout = {
  count: { offset: 0, width: 2 },
  firstRecord: 2,
  recordSize: 8,
  typeWord: { offset: 2, width: 2 },
  type: { shift: 0, mask: 0x7f },
  data: { shift: 7, mask: 0x1ff },
  x: { offset: 4, width: 1 },
  y: { offset: 5, width: 1 },
  sideWord: { offset: 6, width: 2 },
  side: { shift: 0, mask: 0x3 },
  decoration: { shift: 12, mask: 0xf },
  pressurePlateTypes: [1, 2, 3, 4, 7],
  wallButtonTypes: [1, 2, 3, 4],
  wallTileCodes: [0],
};

const PC_DECORATIONS: DecorationLayout = {
  count: { offset: 0, width: 1 },
  firstEntry: 1,
  entryWidth: 1,
  sensorTypes: [0],
  fountainIds: [35],
};

const PC_PARTY: PartyLayout = {
  offset: 0x02,
  position: { offset: 0, width: 2 },
  x: { shift: 0, mask: 0x1f },
  y: { shift: 5, mask: 0x1f },
  facingShift: 10,
  mapIndex: { offset: 2, width: 1 },
};

export const PC_FORMAT: DungeonFormat = {
  name: "pc",
  description: "PC little-endian, one byte per cell, row-major",
  header: PC_HEADER,
  grid: {
    order: "row-major",
    cell: {
      kind: "byte",
      code: { shift: 5, mask: 0x7 },
      objects: { shift: 4, mask: 0x1 },
      orientation: { shift: 3, mask: 0x1 },
      stairsDirection: { shift: 2, mask: 0x1 },
    },
    legend: PC_LEGEND,
    doorCode: 4,
    stairsCode: 3,
  },
  sensors: PC_SENSORS,
  decorations: PC_DECORATIONS,
  party: PC_PARTY,
};

export const PC_NIBBLE_FORMAT: DungeonFormat = {
  name: "pc-nibble",
  description: "PC little-endian, two cells per byte (low nibble first), row-major",
  header: PC_HEADER,
  grid: {
    order: "row-major",
    cell: { kind: "nibble", lowFirst: true, code: { shift: 0, mask: 0xf } },
    legend: PC_LEGEND,
  },
  sensors: PC_SENSORS,
  decorations: PC_DECORATIONS,
  party: PC_PARTY,
};

export const DUNGEON_FORMATS: ReadonlyArray<DungeonFormat> = [PC_FORMAT, PC_NIBBLE_FORMAT];

export function getDungeonFormat(name: string): DungeonFormat {
  const f = DUNGEON_FORMATS.find((x) => x.name === name.trim().toLowerCase());
  if (!f) {
    const known = DUNGEON_FORMATS.map((x) => x.name).join("|");
    throw new Error(`Unknown format '${name}'. Expected: ${known}`);
  }
  return f;
}

/* ---------------- JSON format descriptions ---------------- */

function parseFieldSpec(v: unknown, name: string): FieldSpec {
  const o = expectObject(v, name);
  const offset = expectInt(o.offset, `${name}.offset`, 0, 0xffff);
  const width = o.width;
  if (width !== 1 && width !== 2 && width !== 4) {
    throw new Error(`Invalid ${name}.width: expected 1, 2 or 4`);
  }
  const w: FieldWidth = width;
  return { offset, width: w };
}

function parseBitField(v: unknown, name: string): BitField {
  const o = expectObject(v, name);
  return {
    shift: expectInt(o.shift, `${name}.shift`, 0, 31),
    mask: expectInt(o.mask, `${name}.mask`, 1, 0xffff),
  };
}

function parseOptionalBitField(
  o: Record<string, unknown>,
  key: string,
  name: string,
): BitField | undefined {
  if (o[key] === undefined) return undefined;
  return parseBitField(o[key], `${name}.${key}`);
}

function parseIntList(v: unknown, name: string): number[] {
  return expectArray(v, name).map((x, i) => expectInt(x, `${name}[${i}]`, 0, 0xffff));
}

function parseLegend(v: unknown, name: string): LegendEntry[] {
  const seen = new Set<number>();
  return expectArray(v, name).map((item, i) => {
    const o = expectObject(item, `${name}[${i}]`);
    const code = expectInt(o.code, `${name}[${i}].code`, 0, 0xffff);
    if (seen.has(code)) throw new Error(`Invalid ${name}[${i}].code: duplicate code ${code}`);
    seen.add(code);
    return { code, name: expectString(o.name, `${name}[${i}].name`) };
  });
}

function parseCellEncoding(v: unknown, name: string): CellEncoding {
  const o = expectObject(v, name);
  const code = parseBitField(o.code, `${name}.code`);

  if (o.kind === "nibble") {
    return { kind: "nibble", lowFirst: expectBoolean(o.lowFirst, `${name}.lowFirst`), code };
  }

  if (o.kind !== "byte") throw new Error(`Invalid ${name}.kind: expected "byte" or "nibble"`);

  const out: {
    kind: "byte";
    code: BitField;
    objects?: BitField;
    orientation?: BitField;
    stairsDirection?: BitField;
  } = { kind: "byte", code };

  const objects = parseOptionalBitField(o, "objects", name);
  if (objects !== undefined) out.objects = objects;
  const orientation = parseOptionalBitField(o, "orientation", name);
  if (orientation !== undefined) out.orientation = orientation;
  const stairsDirection = parseOptionalBitField(o, "stairsDirection", name);
  if (stairsDirection !== undefined) out.stairsDirection = stairsDirection;

  return out;
}

function parseHeader(v: unknown): HeaderLayout {
  const o = expectObject(v, "header");
  return {
    ...(o.randomSeed !== undefined
      ? { randomSeed: parseFieldSpec(o.randomSeed, "header.randomSeed") }
      : {}),
    mapCount: parseFieldSpec(o.mapCount, "header.mapCount"),
    mapTableOffset: expectInt(o.mapTableOffset, "header.mapTableOffset", 0, 0xffff),
    mapTableStride: expectInt(o.mapTableStride, "header.mapTableStride", 1, 0xff),
    tileGridOffset: parseFieldSpec(o.tileGridOffset, "header.tileGridOffset"),
    sensorListOffset: parseFieldSpec(o.sensorListOffset, "header.sensorListOffset"),
    maxMaps: expectInt(o.maxMaps, "header.maxMaps", 0, 0xffff),
  };
}

function parseGrid(v: unknown): GridLayout {
  const o = expectObject(v, "grid");
  if (o.order !== "row-major" && o.order !== "column-major") {
    throw new Error(`Invalid grid.order: expected "row-major" or "column-major"`);
  }
  return {
    order: o.order,
    cell: parseCellEncoding(o.cell, "grid.cell"),
    legend: parseLegend(o.legend, "grid.legend"),
    ...(o.doorCode !== undefined
      ? { doorCode: expectInt(o.doorCode, "grid.doorCode", 0, 0xffff) }
      : {}),
    ...(o.stairsCode !== undefined
      ? { stairsCode: expectInt(o.stairsCode, "grid.stairsCode", 0, 0xffff) }
      : {}),
  };
}

function parseSensors(v: unknown): SensorLayout {
  const o = expectObject(v, "sensors");
  return {
    count: parseFieldSpec(o.count, "sensors.count"),
    firstRecord: expectInt(o.firstRecord, "sensors.firstRecord", 0, 0xff),
    recordSize: expectInt(o.recordSize, "sensors.recordSize", 1, 0xff),
    typeWord: parseFieldSpec(o.typeWord, "sensors.typeWord"),
    type: parseBitField(o.type, "sensors.type"),
    data: parseBitField(o.data, "sensors.data"),
    x: parseFieldSpec(o.x, "sensors.x"),
    y: parseFieldSpec(o.y, "sensors.y"),
    sideWord: parseFieldSpec(o.sideWord, "sensors.sideWord"),
    side: parseBitField(o.side, "sensors.side"),
    decoration: parseBitField(o.decoration, "sensors.decoration"),
    pressurePlateTypes: parseIntList(o.pressurePlateTypes, "sensors.pressurePlateTypes"),
    wallButtonTypes: parseIntList(o.wallButtonTypes, "sensors.wallButtonTypes"),
    wallTileCodes: parseIntList(o.wallTileCodes, "sensors.wallTileCodes"),
  };
}

function parseDecorations(v: unknown): DecorationLayout {
  const o = expectObject(v, "decorations");
  const width = o.entryWidth;
  if (width !== 1 && width !== 2 && width !== 4) {
    throw new Error("Invalid decorations.entryWidth: expected 1, 2 or 4");
  }
  return {
    count: parseFieldSpec(o.count, "decorations.count"),
    firstEntry: expectInt(o.firstEntry, "decorations.firstEntry", 0, 0xff),
    entryWidth: width,
    sensorTypes: parseIntList(o.sensorTypes, "decorations.sensorTypes"),
    fountainIds: parseIntList(o.fountainIds, "decorations.fountainIds"),
  };
}

function parseParty(v: unknown): PartyLayout {
  const o = expectObject(v, "party");
  return {
    offset: expectInt(o.offset, "party.offset", 0, 0xffff),
    position: parseFieldSpec(o.position, "party.position"),
    x: parseBitField(o.x, "party.x"),
    y: parseBitField(o.y, "party.y"),
    facingShift: expectInt(o.facingShift, "party.facingShift", 0, 30),
    mapIndex: parseFieldSpec(o.mapIndex, "party.mapIndex"),
  };
}

export function parseDungeonFormatJson(input: unknown): DungeonFormat {
  const o = expectObject(input, "format");
  return {
    name: expectString(o.name, "name"),
    description: o.description === undefined ? "" : expectString(o.description, "description"),
    header: parseHeader(o.header),
    grid: parseGrid(o.grid),
    sensors: parseSensors(o.sensors),
    ...(o.decorations !== undefined ? { decorations: parseDecorations(o.decorations) } : {}),
    party: parseParty(o.party),
  };
}
