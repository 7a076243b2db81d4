import type { AttackParams, AttackSimulator, Raster } from "./types";
import { cropRaster, decodeImage, encodePng, fromJimp, toJimp } from "./raster";
import { clampByte, mulberry32 } from "./utils";

/**
 * Degrades an image the way a robustness test would. Random attacks are
 * seeded, so the same params give the same image.
 */
export class RasterAttackSimulator implements AttackSimulator {
  async apply(image: Buffer, params: AttackParams, signal?: AbortSignal): Promise<Buffer> {
    signal?.throwIfAborted();
    const raster = await decodeImage(image);
    signal?.throwIfAborted();
    const attacked = applyAttack(raster, params);
    signal?.throwIfAborted();
    return encodePng(attacked);
  }
}

export function applyAttack(img: Raster, params: AttackParams): Raster {
  switch (params.type) {
    case "cut": {
      const { box } = params;
      const x1 = Math.round(box.x1 * img.width), x2 = Math.max(x1 + 1, Math.round(box.x2 * img.width));
      const y1 = Math.round(box.y1 * img.height), y2 = Math.max(y1 + 1, Math.round(box.y2 * img.height));
      const cut = cropRaster(img, { x1, y1, x2: Math.min(x2, img.width), y2: Math.min(y2, img.height) });
      if (params.scale === undefined || params.scale === 1) return cut;
      return resized(cut, Math.round(cut.width * params.scale), Math.round(cut.height * params.scale));
    }
    case "resize":
      return resized(img, params.width, params.height);
    case "bright":
      return mapColour(img, (v) => clampByte(v * params.ratio));
    case "shelter":
      return shelter(img, params.ratio, params.n, params.seed ?? 1);
    case "salt_pepper":
      return saltPepper(img, params.ratio, params.seed ?? 1);
    case "rot":
      return fromJimp(toJimp(img).rotate(params.angle));
  }
}

function resized(img: Raster, w: number, h: number): Raster {
  return fromJimp(toJimp(img).resize({ w: Math.max(1, w), h: Math.max(1, h) }));
}

function mapColour(img: Raster, fn: (v: number) => number): Raster {
  const data = Buffer.from(img.data);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = fn(data[i]!);
    data[i + 1] = fn(data[i + 1]!);
    data[i + 2] = fn(data[i + 2]!);
  }
  return { width: img.width, height: img.height, data };
}

// n white rectangles, each ratio * width by ratio * height
function shelter(img: Raster, ratio: number, n: number, seed: number): Raster {
  const data = Buffer.from(img.data);
  const rnd = mulberry32(seed);
  const w = Math.max(1, Math.floor(img.width * ratio));
  const h = Math.max(1, Math.floor(img.height * ratio));
  for (let k = 0; k < n; k++) {
    const x0 = Math.floor(rnd() * (img.width - w + 1));
    const y0 = Math.floor(rnd() * (img.height - h + 1));
    for (let y = y0; y < y0 + h; y++) {
      for (let x = x0; x < x0 + w; x++) {
        const i = (y * img.width + x) * 4;
        data[i] = 255; data[i + 1] = 255; data[i + 2] = 255;
      }
    }
  }
  return { width: img.width, height: img.height, data };
}

function saltPepper(img: Raster, ratio: number, seed: number): Raster {
  const data = Buffer.from(img.data);
  const rnd = mulberry32(seed);
  for (let i = 0; i < data.length; i += 4) {
    if (rnd() >= ratio) continue;
    const v = rnd() < 0.5 ? 0 : 255;
    data[i] = v; data[i + 1] = v; data[i + 2] = v;
  }
  return { width: img.width, height: img.height, data };
}
