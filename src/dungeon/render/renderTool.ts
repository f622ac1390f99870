// src/dungeon/render/renderTool.ts
import path from "node:path";
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";

import {
  legendToJsonV1,
  levelFileName,
  levelToJsonV1,
  parseLegendJsonV1,
  parseLevelJsonV1,
} from "../dungeonJsonV1.js";
import type { LegendJsonV1, LevelJsonV1 } from "../dungeonJsonV1.js";
import { LEGEND_FILE } from "../exportTool.js";
import type { DungeonFormat } from "../format.js";
import { existsPath, isDirectory, readWorldFile } from "../worldFile.js";
import { DungeonRenderer, levelViews } from "./dungeonRenderer.js";
import { loadTileArt, paletteTileArt } from "./tileArt.js";

export type RenderToolOptions = Readonly<{
  format: DungeonFormat;
  out?: string;
  assets?: string;
  tileSize?: number;
  overwrite?: boolean;
  dryRun?: boolean;
}>;

export type RenderSummary = Readonly<{
  rendered: number;
  skipped: number;
}>;

type Docs = { levels: LevelJsonV1[]; legend: LegendJsonV1 };

async function readJson(p: string): Promise<unknown> {
  const text = await readFile(p, "utf8");
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

async function readExportDir(dir: string): Promise<Docs> {
  const legendPath = path.join(dir, LEGEND_FILE);
  if (!(await existsPath(legendPath))) {
    throw new Error(`No ${LEGEND_FILE} found in directory ${dir}`);
  }
  const legend = parseLegendJsonV1(await readJson(legendPath));

  const names = (await readdir(dir))
    .filter((n) => n.startsWith("level_") && n.toLowerCase().endsWith(".json"))
    .sort();
  if (names.length === 0) throw new Error(`No level JSON files found in directory ${dir}`);

  const levels: LevelJsonV1[] = [];
  for (const n of names) {
    try {
      levels.push(parseLevelJsonV1(await readJson(path.join(dir, n))));
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new Error(`${n}: ${msg}`);
    }
  }
  return { levels, legend };
}

function defaultOutDir(inputPath: string, inIsDir: boolean): string {
  if (inIsDir) return `${inputPath.replace(/[\\/]+$/, "")}__png`;
  const ext = path.extname(inputPath);
  return `${inputPath.slice(0, inputPath.length - ext.length)}__png`;
}

// Input: a world file or a directory written by the export tool.
export async function runRenderTool(
  inputPath: string,
  opts: RenderToolOptions,
): Promise<RenderSummary> {
  const overwrite = opts.overwrite === true;
  const dryRun = opts.dryRun === true;

  const inIsDir = await isDirectory(inputPath);

  let docs: Docs;
  if (inIsDir) {
    docs = await readExportDir(inputPath);
  } else {
    const world = await readWorldFile(inputPath, opts.format);
    docs = { levels: world.maps.map(levelToJsonV1), legend: legendToJsonV1(world) };
  }

  const tileNames = Object.keys(docs.legend.tiles)
    .sort((a, b) => Number(a) - Number(b))
    .map((k) => docs.legend.tiles[k]!);
  const art = opts.assets
    ? await loadTileArt(opts.assets, tileNames)
    : paletteTileArt(tileNames, opts.tileSize);
  if (opts.assets && opts.tileSize !== undefined && opts.tileSize !== art.tileSize) {
    console.warn(
      `Ignoring tile size ${opts.tileSize}: tiles from ${opts.assets} are ${art.tileSize}px`,
    );
  }
  const renderer = new DungeonRenderer(art);

  const outDir = opts.out ?? defaultOutDir(inputPath, inIsDir);
  if (!dryRun) await mkdir(outDir, { recursive: true });

  let rendered = 0;
  let skipped = 0;

  for (const view of levelViews(docs.levels, docs.legend)) {
    const dest = path.join(outDir, `${levelFileName(view.map)}.png`);

    if (!overwrite && (await existsPath(dest))) {
      console.warn(`Skip (exists): ${dest}`);
      skipped++;
      continue;
    }

    if (dryRun) {
      console.log(`[dry-run] level ${view.map} -> ${dest}`);
      continue;
    }

    await writeFile(dest, renderer.renderLevelToPng(view));
    rendered++;
    console.log(`Rendered level ${view.map} -> ${dest}`);
  }

  console.log(`Done. rendered=${rendered} skipped=${skipped} out=${outDir}`);
  return { rendered, skipped };
}
