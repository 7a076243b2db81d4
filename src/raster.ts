import { Jimp } from "jimp";
import { PNG } from "pngjs";
import * as jpeg from "jpeg-js";

import type { CanvasShape, CropBox, Raster, Rgba } from "./types";

export type JimpImage = ReturnType<typeof Jimp.fromBitmap>;

interface HasBitmap {
  bitmap: { width: number; height: number; data: Uint8Array };
}

export async function decodeImage(imageBuffer: Buffer): Promise<Raster> {
  const img = await Jimp.read(imageBuffer);
  return fromJimp(img);
}

export function fromJimp(img: HasBitmap): Raster {
  const { width, height, data } = img.bitmap; // RGBA
  return { width, height, data: Buffer.from(data) };
}

export function toJimp(raster: Raster): JimpImage {
  return Jimp.fromBitmap({ width: raster.width, height: raster.height, data: Buffer.from(raster.data) });
}

export function encodePng(raster: Raster): Buffer {
  const png = new PNG({ width: raster.width, height: raster.height });
  png.data = Buffer.from(raster.data);
  return PNG.sync.write(png);
}

export function encodeJpeg(raster: Raster, quality = 90): Buffer {
  const { width, height, data } = raster;
  return jpeg.encode({ data: Buffer.from(data), width, height }, quality).data;
}

export function createRaster(shape: CanvasShape, fill: Rgba): Raster {
  const data = Buffer.alloc(shape.width * shape.height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = fill[0];
    data[i + 1] = fill[1];
    data[i + 2] = fill[2];
    data[i + 3] = fill[3];
  }
  return { width: shape.width, height: shape.height, data };
}

/** Copies the box out of `raster`. The box must lie inside it. */
export function cropRaster(raster: Raster, box: CropBox): Raster {
  const w = box.x2 - box.x1;
  const h = box.y2 - box.y1;
  const data = Buffer.alloc(w * h * 4);
  for (let y = 0; y < h; y++) {
    const from = ((box.y1 + y) * raster.width + box.x1) * 4;
    raster.data.copy(data, y * w * 4, from, from + w * 4);
  }
  return { width: w, height: h, data };
}

/** Writes `src` into `dst` with its top-left corner at (x, y). */
export function blit(dst: Raster, src: Raster, x: number, y: number): void {
  for (let row = 0; row < src.height; row++) {
    const from = row * src.width * 4;
    src.data.copy(dst.data, ((y + row) * dst.width + x) * 4, from, from + src.width * 4);
  }
}

/** Rec. 601 luma, one value per pixel. */
export function luma(raster: Raster): Float32Array {
  const out = new Float32Array(raster.width * raster.height);
  for (let i = 0, p = 0; p < out.length; i += 4, p++) {
    out[p] = 0.299 * raster.data[i]! + 0.587 * raster.data[i + 1]! + 0.114 * raster.data[i + 2]!;
  }
  return out;
}

const SIGNATURES: ReadonlyArray<{ format: ImageFormat; bytes: readonly number[] }> = [
  { format: "png", bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { format: "jpeg", bytes: [0xff, 0xd8, 0xff] },
  { format: "gif", bytes: [0x47, 0x49, 0x46, 0x38] },
  { format: "bmp", bytes: [0x42, 0x4d] },
];

export type ImageFormat = "png" | "jpeg" | "gif" | "bmp";

export function sniffFormat(buffer: Uint8Array): ImageFormat | undefined {
  return SIGNATURES.find(({ bytes }) => bytes.every((b, i) => buffer[i] === b))?.format;
}
