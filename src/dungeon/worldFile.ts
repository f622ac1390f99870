// src/dungeon/worldFile.ts
import { readFile, stat } from "node:fs/promises";

import { decodeDungeon } from "./decode.js";
import type { DecodedWorld } from "./decode.js";
import { PC_FORMAT, getDungeonFormat, parseDungeonFormatJson } from "./format.js";
import type { DungeonFormat } from "./format.js";

export type FormatSelection = Readonly<{
  format?: string;
  formatFile?: string;
}>;

export async function resolveFormat(sel: FormatSelection): Promise<DungeonFormat> {
  if (sel.format !== undefined && sel.formatFile !== undefined) {
    throw new Error("Use either --format or --format-file, not both");
  }
  if (sel.formatFile !== undefined) {
    const text = await readFile(sel.formatFile, "utf8");
    try {
      const parsed: unknown = JSON.parse(text);
      return parseDungeonFormatJson(parsed);
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new Error(`${sel.formatFile}: ${msg}`);
    }
  }
  if (sel.format !== undefined) return getDungeonFormat(sel.format);
  return PC_FORMAT;
}

export async function readWorldFile(inputPath: string, format: DungeonFormat): Promise<DecodedWorld> {
  const bytes = await readFile(inputPath);
  return decodeDungeon(bytes, { format });
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    const st = await stat(p);
    return st.isDirectory();
  } catch {
    return false;
  }
}

export async function existsPath(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}
