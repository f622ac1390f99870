import type { ByteSource } from "./binary.js";
import { readField } from "./binary.js";
import { DungeonDecodeError } from "./errors.js";
import { FACINGS, extractBits } from "./format.js";
import type { DungeonFormat, Facing } from "./format.js";

export type PartyStart = Readonly<{
  mapIndex: number;
  x: number;
  y: number;
  facing: Facing;
}>;

// With mapCount, the map index must name one of the declared maps.
export function locateParty(src: ByteSource, format: DungeonFormat, mapCount?: number): PartyStart {
  const p = format.party;
  const word = readField(src, p.offset, p.position);
  const mapIndex = readField(src, p.offset, p.mapIndex);

  if (mapCount !== undefined && mapIndex >= mapCount) {
    throw new DungeonDecodeError(
      "MalformedHeader",
      p.offset + p.mapIndex.offset,
      `party start map index ${mapIndex} but the file declares ${mapCount} map(s)`,
    );
  }

  return {
    mapIndex,
    x: extractBits(word, p.x),
    y: extractBits(word, p.y),
    facing: FACINGS[(word >>> p.facingShift) & 3]!,
  };
}
