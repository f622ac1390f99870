// src/dungeon/render/dungeonRenderer.ts
import type { LegendJsonV1, LevelJsonV1 } from "../dungeonJsonV1.js";
import { FACINGS } from "../format.js";
import type { Facing } from "../format.js";
import type { Orientation } from "../tileGrid.js";
import { blit, blitCentered, createImage, rotateQuarterTurns } from "./rgbaImage.js";
import type { RgbaImage } from "./rgbaImage.js";
import type { TileArt } from "./tileArt.js";
import { writePngRgba } from "./png.js";

type Spot = Readonly<{ x: number; y: number }>;
type FacingSpot = Readonly<{ x: number; y: number; direction: Facing }>;

export type LevelView = Readonly<{
  map: number;
  grid: ReadonlyArray<ReadonlyArray<string>>; // [y][x] tile names
  doorOrientation: ReadonlyArray<ReadonlyArray<Orientation | null>>;
  plates: ReadonlyArray<Spot>;
  buttons: ReadonlyArray<FacingSpot>;
  party?: FacingSpot;
}>;

export function levelViews(
  levels: ReadonlyArray<LevelJsonV1>,
  legend: LegendJsonV1,
): LevelView[] {
  return [...levels]
    .sort((a, b) => a.map - b.map)
    .map((lvl) => {
      const view: LevelView = {
        map: lvl.map,
        grid: lvl.grid,
        doorOrientation: lvl.doorOrientation,
        plates: legend.pressurePlates.filter((p) => p.map === lvl.map),
        buttons: legend.buttons.filter((b) => b.map === lvl.map),
      };
      const sp = legend.startingPosition;
      return sp.map === lvl.map ? { ...view, party: sp } : view;
    });
}

function quarterTurns(direction: Facing): number {
  return FACINGS.indexOf(direction);
}

export class DungeonRenderer {
  public constructor(private readonly art: TileArt) {}

  public renderLevel(view: LevelView): RgbaImage {
    const T = this.art.tileSize;
    const height = view.grid.length;
    const width = height > 0 ? view.grid[0]!.length : 0;
    const img = createImage(width * T, height * T, [0, 0, 0, 255]);

    for (let y = 0; y < height; y++) {
      const row = view.grid[y]!;
      for (let x = 0; x < row.length; x++) {
        const base = this.art.tiles.get(row[x]!) ?? this.art.fallback;
        const vertical = view.doorOrientation[y]?.[x] === "vertical";
        blit(img, vertical ? rotateQuarterTurns(base, 1) : base, x * T, y * T);
      }
    }

    const plate = this.art.pressurePlate;
    if (plate) {
      for (const p of view.plates) blitCentered(img, plate, p.x * T, p.y * T, T);
    }

    const button = this.art.button;
    if (button) {
      for (const b of view.buttons) {
        const icon = rotateQuarterTurns(button, quarterTurns(b.direction));
        blitCentered(img, icon, b.x * T, b.y * T, T);
      }
    }

    if (this.art.party && view.party) {
      const icon = rotateQuarterTurns(this.art.party, quarterTurns(view.party.direction));
      blitCentered(img, icon, view.party.x * T, view.party.y * T, T);
    }

    return img;
  }

  public renderLevelToPng(view: LevelView): Buffer {
    return writePngRgba(this.renderLevel(view));
  }
}
