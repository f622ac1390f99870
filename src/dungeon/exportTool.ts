// src/dungeon/exportTool.ts
import path from "node:path";
import { mkdir, writeFile } from "node:fs/promises";

import type { DecodedWorld } from "./decode.js";
import {
  legendToJsonV1,
  levelFileName,
  levelToJsonV1,
  stringifyLegendJsonV1,
  stringifyLevelJsonV1,
} from "./dungeonJsonV1.js";
import { existsPath } from "./worldFile.js";

export type ExportToolOptions = Readonly<{
  out: string;
  overwrite?: boolean;
  dryRun?: boolean;
}>;

export type ExportSummary = Readonly<{
  written: number;
  skipped: number;
}>;

export const LEGEND_FILE = "legend.json";

export async function runExportTool(
  world: DecodedWorld,
  opts: ExportToolOptions,
): Promise<ExportSummary> {
  const overwrite = opts.overwrite === true;
  const dryRun = opts.dryRun === true;

  const files: Array<{ name: string; text: string }> = world.maps.map((m) => ({
    name: `${levelFileName(m.index)}.json`,
    text: stringifyLevelJsonV1(levelToJsonV1(m)),
  }));
  files.push({ name: LEGEND_FILE, text: stringifyLegendJsonV1(legendToJsonV1(world)) });

  if (!dryRun) await mkdir(opts.out, { recursive: true });

  let written = 0;
  let skipped = 0;

  for (const f of files) {
    const dest = path.join(opts.out, f.name);

    if (!overwrite && (await existsPath(dest))) {
      console.warn(`Skip (exists): ${dest}`);
      skipped++;
      continue;
    }

    if (dryRun) {
      console.log(`[dry-run] ${dest}`);
      continue;
    }

    await writeFile(dest, f.text, "utf8");
    written++;
  }

  console.log(`Done. maps=${world.maps.length} written=${written} skipped=${skipped} out=${opts.out}`);
  return { written, skipped };
}
