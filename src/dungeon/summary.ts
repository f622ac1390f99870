import type { DecodedWorld } from "./decode.js";

function hex(n: number): string {
  return "0x" + n.toString(16).toUpperCase().padStart(4, "0");
}

export function summarizeWorld(world: DecodedWorld): string[] {
  const lines: string[] = [];
  lines.push(`format: ${world.format}`);
  if (world.randomSeed !== undefined) lines.push(`random seed: ${world.randomSeed}`);
  lines.push(`maps: ${world.maps.length}`);

  const p = world.party;
  lines.push(`party: map ${p.mapIndex} at (${p.x},${p.y}) facing ${p.facing}`);

  for (const m of world.maps) {
    const count = (kind: string): number => m.sensors.filter((s) => s.kind === kind).length;
    const unknown = m.grid.cells.filter((c) => !c.known).length;
    const invalid = m.sensors.filter((s) => !s.valid).length;
    lines.push(
      `map ${String(m.index).padStart(2, "0")}: tiles@${hex(m.tileGridOffset)} ` +
        `sensors@${hex(m.sensorListOffset)} plates=${count("PressurePlate")} ` +
        `buttons=${count("WallButton")} other=${count("Other")} ` +
        `fountains=${m.fountains.length} ` +
        `unknownTiles=${unknown} invalidSensors=${invalid}`,
    );
  }

  return lines;
}
