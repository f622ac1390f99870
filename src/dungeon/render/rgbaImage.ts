// src/dungeon/render/rgbaImage.ts
export type Rgba = readonly [number, number, number, number];

export type RgbaImage = {
  width: number;
  height: number;
  data: Uint8Array; // length = width*height*4 (RGBA)
};

export function createImage(width: number, height: number, fill: Rgba = [0, 0, 0, 0]): RgbaImage {
  const [r, g, b, a] = fill;
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    const o = i * 4;
    data[o + 0] = r;
    data[o + 1] = g;
    data[o + 2] = b;
    data[o + 3] = a;
  }
  return { width, height, data };
}

export function fillRect(
  img: RgbaImage,
  left: number,
  top: number,
  w: number,
  h: number,
  color: Rgba,
): void {
  const x0 = Math.max(0, left);
  const y0 = Math.max(0, top);
  const x1 = Math.min(img.width, left + w);
  const y1 = Math.min(img.height, top + h);
  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) img.data.set(color, (y * img.width + x) * 4);
  }
}

// Clockwise; odd turns swap width and height.
export function rotateQuarterTurns(src: RgbaImage, turns: number): RgbaImage {
  const t = ((turns % 4) + 4) % 4;
  if (t === 0) return src;

  const odd = t % 2 === 1;
  const out = createImage(odd ? src.height : src.width, odd ? src.width : src.height);

  for (let y = 0; y < src.height; y++) {
    for (let x = 0; x < src.width; x++) {
      let dx: number;
      let dy: number;
      if (t === 1) {
        dx = src.height - 1 - y;
        dy = x;
      } else if (t === 2) {
        dx = src.width - 1 - x;
        dy = src.height - 1 - y;
      } else {
        dx = y;
        dy = src.width - 1 - x;
      }
      const si = (y * src.width + x) * 4;
      out.data.set(src.data.subarray(si, si + 4), (dy * out.width + dx) * 4);
    }
  }
  return out;
}

export function blit(dst: RgbaImage, src: RgbaImage, dx: number, dy: number): void {
  // Alpha composite src over dst at (dx,dy)
  const x0 = Math.max(0, dx);
  const y0 = Math.max(0, dy);
  const x1 = Math.min(dst.width, dx + src.width);
  const y1 = Math.min(dst.height, dy + src.height);

  if (x1 <= x0 || y1 <= y0) return;

  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const sx = x - dx;
      const sy = y - dy;

      const si = (sy * src.width + sx) * 4;
      const di = (y * dst.width + x) * 4;

      const sr = src.data[si + 0]!;
      const sg = src.data[si + 1]!;
      const sb = src.data[si + 2]!;
      const sa = src.data[si + 3]! / 255;

      if (sa <= 0) continue;

      const dr = dst.data[di + 0]!;
      const dg = dst.data[di + 1]!;
      const db = dst.data[di + 2]!;
      const da = dst.data[di + 3]! / 255;

      const outA = sa + da * (1 - sa);
      if (outA <= 0) {
        dst.data.fill(0, di, di + 4);
        continue;
      }

      const outR = (sr * sa + dr * da * (1 - sa)) / outA;
      const outG = (sg * sa + dg * da * (1 - sa)) / outA;
      const outB = (sb * sa + db * da * (1 - sa)) / outA;

      dst.data[di + 0] = Math.max(0, Math.min(255, Math.round(outR)));
      dst.data[di + 1] = Math.max(0, Math.min(255, Math.round(outG)));
      dst.data[di + 2] = Math.max(0, Math.min(255, Math.round(outB)));
      dst.data[di + 3] = Math.max(0, Math.min(255, Math.round(outA * 255)));
    }
  }
}

export function blitCentered(
  dst: RgbaImage,
  src: RgbaImage,
  left: number,
  top: number,
  cellSize: number,
): void {
  const dx = left + Math.floor((cellSize - src.width) / 2);
  const dy = top + Math.floor((cellSize - src.height) / 2);
  blit(dst, src, dx, dy);
}
