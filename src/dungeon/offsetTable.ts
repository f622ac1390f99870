import type { ByteSource } from "./binary.js";
import { readField } from "./binary.js";
import { DungeonDecodeError } from "./errors.js";
import type { DungeonFormat } from "./format.js";

export type MapOffsets = Readonly<{
  tileGridOffset: number;
  sensorListOffset: number;
}>;

export type OffsetTable = Readonly<{
  mapCount: number;
  entries: ReadonlyArray<MapOffsets>;
}>;

export function readOffsetTable(src: ByteSource, format: DungeonFormat): OffsetTable {
  const h = format.header;
  const mapCount = readField(src, 0, h.mapCount);

  if (mapCount > h.maxMaps) {
    throw new DungeonDecodeError(
      "MalformedHeader",
      h.mapCount.offset,
      `map count ${mapCount} exceeds the format limit of ${h.maxMaps}`,
    );
  }

  const tableEnd = h.mapTableOffset + mapCount * h.mapTableStride;
  if (tableEnd > src.length) {
    throw new DungeonDecodeError(
      "MalformedHeader",
      h.mapCount.offset,
      `map count ${mapCount} needs a table ending at ${tableEnd}, buffer length is ${src.length}`,
    );
  }

  const entries: MapOffsets[] = [];
  for (let i = 0; i < mapCount; i++) {
    const entry = h.mapTableOffset + i * h.mapTableStride;
    const tileGridOffset = readField(src, entry, h.tileGridOffset);
    const sensorListOffset = readField(src, entry, h.sensorListOffset);

    if (tileGridOffset >= src.length) {
      throw new DungeonDecodeError(
        "MalformedHeader",
        entry + h.tileGridOffset.offset,
        `map ${i} tile grid offset ${tileGridOffset} is past the end of the buffer (${src.length})`,
      );
    }
    if (sensorListOffset >= src.length) {
      throw new DungeonDecodeError(
        "MalformedHeader",
        entry + h.sensorListOffset.offset,
        `map ${i} sensor list offset ${sensorListOffset} is past the end of the buffer (${src.length})`,
      );
    }

    entries.push({ tileGridOffset, sensorListOffset });
  }

  return { mapCount, entries };
}
