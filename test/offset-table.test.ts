import { describe, expect, it } from "vitest";

import { ByteSource } from "../src/dungeon/binary.js";
import { PC_FORMAT } from "../src/dungeon/format.js";
import { readOffsetTable } from "../src/dungeon/offsetTable.js";

import { catchDecodeError } from "./support/catchDecodeError.js";

function header(length: number, count: number, entries: Array<[number, number]> = []): ByteSource {
  const buf = Buffer.alloc(length);
  buf.writeUInt16LE(count, 0x06);
  entries.forEach(([tile, sensor], i) => {
    buf.writeUInt32LE(tile, 0x08 + i * 8);
    buf.writeUInt32LE(sensor, 0x0c + i * 8);
  });
  return new ByteSource(buf);
}

describe("readOffsetTable", () => {
  it("returns the declared entries in table order", () => {
    const src = header(8300, 2, [
      [64, 4160],
      [4192, 8288],
    ]);

    expect(readOffsetTable(src, PC_FORMAT)).toEqual({
      mapCount: 2,
      entries: [
        { tileGridOffset: 64, sensorListOffset: 4160 },
        { tileGridOffset: 4192, sensorListOffset: 8288 },
      ],
    });
  });

  it("accepts a world without maps", () => {
    expect(readOffsetTable(header(16, 0), PC_FORMAT)).toEqual({ mapCount: 0, entries: [] });
  });

  it("rejects a map count above the format limit", () => {
    const e = catchDecodeError(() => readOffsetTable(header(4096, 65), PC_FORMAT));
    expect(e.code).toBe("MalformedHeader");
    expect(e.offset).toBe(0x06);
  });

  it("rejects a map count whose table would not fit in the file", () => {
    const e = catchDecodeError(() => readOffsetTable(header(100, 40), PC_FORMAT));
    expect(e.code).toBe("MalformedHeader");
    expect(e.offset).toBe(0x06);
  });

  it("rejects offsets at or past the end of the buffer, naming the field offset", () => {
    const tile = catchDecodeError(() => readOffsetTable(header(300, 1, [[5000, 100]]), PC_FORMAT));
    expect(tile.code).toBe("MalformedHeader");
    expect(tile.offset).toBe(0x08);

    const sensor = catchDecodeError(() => readOffsetTable(header(300, 2, [[64, 100], [120, 300]]), PC_FORMAT));
    expect(sensor.code).toBe("MalformedHeader");
    expect(sensor.offset).toBe(0x14);
  });

  it("fails with OutOfBounds when the header itself is cut short", () => {
    const e = catchDecodeError(() => readOffsetTable(new ByteSource(Buffer.alloc(4)), PC_FORMAT));
    expect(e.code).toBe("OutOfBounds");
    expect(e.offset).toBe(0x06);
  });
});
