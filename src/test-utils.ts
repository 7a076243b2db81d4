import type { Raster } from "./types";
import { mulberry32 } from "./utils";

/** Noise in [60, 190) on every colour channel, opaque. Never clips when marked. */
export function texturedRaster(width: number, height: number, seed = 1): Raster {
  const rnd = mulberry32(seed);
  const data = Buffer.alloc(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = 60 + Math.floor(rnd() * 130);
    data[i + 1] = 60 + Math.floor(rnd() * 130);
    data[i + 2] = 60 + Math.floor(rnd() * 130);
    data[i + 3] = 255;
  }
  return { width, height, data };
}

export function pixel(raster: Raster, x: number, y: number): number[] {
  const i = (y * raster.width + x) * 4;
  return Array.from(raster.data.subarray(i, i + 4));
}

/** Low-frequency pattern that survives resampling, for scaled-crop tests. */
export function smoothRaster(width: number, height: number): Raster {
  const data = Buffer.alloc(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 4;
      const v = 128 + 40 * Math.sin(x / 7) + 40 * Math.cos(y / 9) + 20 * Math.sin((x + y) / 13);
      data[i] = Math.round(v);
      data[i + 1] = Math.round(255 - v);
      data[i + 2] = Math.round(v / 2 + 40);
      data[i + 3] = 255;
    }
  }
  return { width, height, data };
}
