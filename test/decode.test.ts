import { describe, expect, it } from "vitest";

import { decodeDungeon, describeAnomaly } from "../src/dungeon/decode.js";
import { PC_NIBBLE_FORMAT } from "../src/dungeon/format.js";

import { catchDecodeError } from "./support/catchDecodeError.js";
import {
  FLOOR,
  buildWorld,
  fountainWorld,
  rowMajorCells,
  sampleWorld,
} from "./support/worldBuilder.js";

describe("decodeDungeon", () => {
  const built = sampleWorld();
  const world = decodeDungeon(built.bytes);

  it("reads the header, every map and the party", () => {
    expect(world.format).toBe("pc");
    expect(world.randomSeed).toBe(0x1234);
    expect(world.party).toEqual({ mapIndex: 1, x: 3, y: 4, facing: "east" });
    expect(world.maps.map((m) => [m.index, m.tileGridOffset, m.sensorListOffset])).toEqual([
      [0, 64, 1088],
      [1, 1099, 2123],
    ]);
  });

  it("gives every map a full 32x32 grid", () => {
    for (const m of world.maps) {
      expect(m.grid.mapIndex).toBe(m.index);
      expect(m.grid.cells).toHaveLength(1024);
    }
  });

  it("collects sensors across maps in map order, classified against their own map", () => {
    expect(world.sensors.map((s) => [s.map, s.index, s.kind, s.valid])).toEqual([
      [0, 0, "PressurePlate", true],
      [1, 0, "WallButton", true],
      [1, 1, "Other", false],
    ]);
    expect(world.sensors[1]?.side).toBe("south");
  });

  it("reports soft anomalies as data", () => {
    expect(world.anomalies).toEqual([
      { kind: "sensor-out-of-bounds", map: 1, index: 1, x: 33, y: 0 },
    ]);
    expect(world.anomalies.map(describeAnomaly)).toEqual([
      "map 1: sensor #1 at (33,0) is outside the map",
    ]);
  });

  it("collects fountains from each map's wall decorations", () => {
    expect(world.fountains).toEqual([]);

    const decoded = decodeDungeon(fountainWorld().bytes);
    expect(decoded.maps[0]?.wallDecorations).toEqual([12, 35]);
    expect(decoded.fountains).toEqual([{ map: 0, x: 7, y: 7, direction: "west", sensorIndex: 0 }]);
    expect(decoded.maps[0]?.fountains).toEqual(decoded.fountains);
  });

  it("returns an equal result for the same bytes", () => {
    expect(decodeDungeon(built.bytes)).toEqual(world);
  });

  it("records unknown tile codes without failing the map", () => {
    const cells = new Array<number>(512).fill(0x11);
    cells[5] = 0x19; // (10,0) = 9, (11,0) = 1
    const nibble = buildWorld({ maps: [{ cells, sensors: [] }] });

    const decoded = decodeDungeon(nibble.bytes, { format: PC_NIBBLE_FORMAT });
    expect(decoded.format).toBe("pc-nibble");
    expect(decoded.anomalies).toEqual([{ kind: "unknown-tile", map: 0, x: 10, y: 0, code: 9 }]);
    expect(decoded.anomalies.map(describeAnomaly)).toEqual(["map 0: unknown tile code 9 at (10,0)"]);
  });
});

describe("decodeDungeon failures", () => {
  it("fails with TruncatedGrid when the file ends inside a tile block", () => {
    const built = buildWorld({
      sensorsFirst: true,
      maps: [{ cells: rowMajorCells(FLOOR), sensors: [{ type: 1, x: 0, y: 0 }] }],
    });
    expect(built.sensorOffsets).toEqual([64]);
    expect(built.tileOffsets).toEqual([75]);

    const e = catchDecodeError(() => decodeDungeon(built.bytes.subarray(0, 574)));
    expect(e.code).toBe("TruncatedGrid");
    expect(e.offset).toBe(75);
  });

  it("rejects a party start on a map the file does not declare", () => {
    const built = buildWorld({
      party: { map: 2, x: 0, y: 0, facing: 0 },
      maps: [
        { cells: rowMajorCells(FLOOR), sensors: [] },
        { cells: rowMajorCells(FLOOR), sensors: [] },
      ],
    });
    const e = catchDecodeError(() => decodeDungeon(built.bytes));
    expect(e.code).toBe("MalformedHeader");
    expect(e.offset).toBe(0x04);
    expect(e.message).toBe(
      "MalformedHeader at 0x0004: party start map index 2 but the file declares 2 map(s)",
    );
  });

  it("rejects a file with no maps", () => {
    const e = catchDecodeError(() => decodeDungeon(buildWorld({ maps: [] }).bytes));
    expect(e.code).toBe("MalformedHeader");
    expect(e.offset).toBe(0x04);
  });

  it("fails with OutOfBounds on a buffer too short for the header", () => {
    const e = catchDecodeError(() => decodeDungeon(new Uint8Array(3)));
    expect(e.code).toBe("OutOfBounds");
    expect(e.offset).toBe(0x06);
  });
});
