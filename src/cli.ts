#!/usr/bin/env node
// src/cli.ts
import { Command } from "commander";

import { describeAnomaly } from "./dungeon/decode.js";
import type { DecodedWorld } from "./dungeon/decode.js";
import { runExportTool } from "./dungeon/exportTool.js";
import { DUNGEON_FORMATS } from "./dungeon/format.js";
import type { DungeonFormat } from "./dungeon/format.js";
import { runRenderTool } from "./dungeon/render/renderTool.js";
import { summarizeWorld } from "./dungeon/summary.js";
import { readWorldFile, resolveFormat } from "./dungeon/worldFile.js";
import type { FormatSelection } from "./dungeon/worldFile.js";

type FormatOpts = { format?: string; formatFile?: string };

function formatSelection(opts: FormatOpts): FormatSelection {
  const sel: { format?: string; formatFile?: string } = {};
  if (opts.format !== undefined) sel.format = opts.format;
  if (opts.formatFile !== undefined) sel.formatFile = opts.formatFile;
  return sel;
}

async function loadWorld(
  input: string,
  opts: FormatOpts & { quiet: boolean },
): Promise<DecodedWorld> {
  const format = await resolveFormat(formatSelection(opts));
  const world = await readWorldFile(input, format);
  if (!opts.quiet) {
    for (const a of world.anomalies) console.warn(describeAnomaly(a));
  }
  return world;
}

function parseTileSize(v: string): number {
  const n = Number(v);
  if (!Number.isInteger(n) || n < 4) throw new Error(`Invalid --tile-size '${v}'`);
  return n;
}

const program = new Command();

program
  .name("dungeontools")
  .description("Dungeon world file tools (decode, export to JSON, render maps)")
  .version("0.3.0");

program
  .command("inspect")
  .description("Decode a world file and print a summary of its maps")
  .argument("<input>", "Path to the world file (e.g. DUNGEON.DAT)")
  .option("--format <name>", "Built-in format (see `formats`)")
  .option("--format-file <path>", "JSON format description")
  .option("--quiet", "Do not print decode anomalies", false)
  .action(async (input: string, opts: FormatOpts & { quiet: boolean }) => {
    const world = await loadWorld(input, opts);
    for (const line of summarizeWorld(world)) console.log(line);
  });

program
  .command("export")
  .description("Write level_XX.json for every map plus legend.json")
  .argument("<input>", "Path to the world file")
  .requiredOption("-o, --out <dir>", "Output directory")
  .option("--format <name>", "Built-in format (see `formats`)")
  .option("--format-file <path>", "JSON format description")
  .option("--overwrite", "Replace existing files", false)
  .option("--dry-run", "Print planned writes but do not write anything", false)
  .option("--quiet", "Do not print decode anomalies", false)
  .action(
    async (
      input: string,
      opts: FormatOpts & { out: string; overwrite: boolean; dryRun: boolean; quiet: boolean },
    ) => {
      const world = await loadWorld(input, opts);
      await runExportTool(world, { out: opts.out, overwrite: opts.overwrite, dryRun: opts.dryRun });
    },
  );

program
  .command("render")
  .description("Render every map to a PNG, from a world file or an export directory")
  .argument("<input>", "Path to the world file OR a directory written by `export`")
  .option("-o, --out <dir>", "Output directory (default: <input>__png)")
  .option("--assets <dir>", "Directory with <tile>.png, pressure_plate.png, button.png, party.png")
  .option("--tile-size <px>", "Tile size for the built-in palette", parseTileSize)
  .option("--format <name>", "Built-in format (see `formats`)")
  .option("--format-file <path>", "JSON format description")
  .option("--overwrite", "Replace existing PNGs", false)
  .option("--dry-run", "Print planned writes but do not write anything", false)
  .action(
    async (
      input: string,
      opts: FormatOpts & {
        out?: string;
        assets?: string;
        tileSize?: number;
        overwrite: boolean;
        dryRun: boolean;
      },
    ) => {
      const params: {
        format: DungeonFormat;
        out?: string;
        assets?: string;
        tileSize?: number;
        overwrite: boolean;
        dryRun: boolean;
      } = {
        format: await resolveFormat(formatSelection(opts)),
        overwrite: opts.overwrite,
        dryRun: opts.dryRun,
      };
      if (opts.out !== undefined) params.out = opts.out;
      if (opts.assets !== undefined) params.assets = opts.assets;
      if (opts.tileSize !== undefined) params.tileSize = opts.tileSize;
      await runRenderTool(input, params);
    },
  );

program
  .command("formats")
  .description("List the built-in world file formats")
  .action(() => {
    for (const f of DUNGEON_FORMATS) console.log(`${f.name}\t${f.description}`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});
