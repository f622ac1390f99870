import { describe, expect, it } from "vitest";

import { decodeDungeon } from "../src/dungeon/decode.js";
import { summarizeWorld } from "../src/dungeon/summary.js";

import { sampleWorld } from "./support/worldBuilder.js";

describe("summarizeWorld", () => {
  it("lists the header facts and one line per map", () => {
    const world = decodeDungeon(sampleWorld().bytes);
    expect(summarizeWorld(world)).toEqual([
      "format: pc",
      "random seed: 4660",
      "maps: 2",
      "party: map 1 at (3,4) facing east",
      "map 00: tiles@0x0040 sensors@0x0440 plates=1 buttons=0 other=0 fountains=0 " +
        "unknownTiles=0 invalidSensors=0",
      "map 01: tiles@0x044B sensors@0x084B plates=0 buttons=1 other=1 fountains=0 " +
        "unknownTiles=0 invalidSensors=1",
    ]);
  });
});
