import type { EmbedResult, MarkOptions, MarkTransform, Raster } from "./types";
import { decodeImage, encodeJpeg, encodePng } from "./raster";
import { clampByte, fromBits, makePermutation, posMod, toBits } from "./utils";
import { haarDWT, haarIDWT, type Matrix } from "./dwt";
import { silentLogger, type Logger } from "./logger";
import { checkpoint } from "./async";

export interface MarkRunOptions extends MarkOptions {
  /** Checked once per row of HL coefficients. */
  signal?: AbortSignal;
}

/*
 * Keyed DWT + QIM mark.
 *
 * keyImage shuffles the HL coefficients, keyWatermark scrambles the payload
 * bits. Coefficient p (in shuffled order) carries scrambled bit p % bitLength,
 * so the mark is tiled over the whole image and survives losing part of it.
 * Nothing in the image records bitLength: the caller keeps it.
 */

function qimEncode(c: number, q: number, bit: number): number {
  const base = Math.floor(c / q) * q;
  return bit === 1 ? base + 0.75 * q : base + 0.25 * q;
}
function qimDecode(c: number, q: number): 0 | 1 {
  const r = posMod(c, q);
  return r >= q / 2 ? 1 : 0;
}

function readChannel(img: Raster, channel: number, width: number, height: number): Matrix {
  const mat: Matrix = [];
  for (let y = 0; y < height; y++) {
    const row: number[] = [];
    for (let x = 0; x < width; x++) {
      row.push(img.data[(y * img.width + x) * 4 + channel]!);
    }
    mat.push(row);
  }
  return mat;
}

// Odd trailing row/column is left untouched
function evenArea(img: Raster): { width: number; height: number } {
  return { width: img.width & ~1, height: img.height & ~1 };
}

export function markCapacity(img: Raster): number {
  const { width, height } = evenArea(img);
  return (width / 2) * (height / 2);
}

export async function addWatermark(
  imageBuffer: Buffer,
  payload: Uint8Array,
  keyImage: number,
  keyWatermark: number,
  options: MarkRunOptions = {},
  logger: Logger = silentLogger,
): Promise<EmbedResult> {
  const channel = options.channel ?? 0;
  const q = options.q ?? 12;

  const img = await decodeImage(imageBuffer);
  const { width, height } = evenArea(img);
  const capacity = markCapacity(img);

  const bits = toBits(payload);
  const bitLength = bits.length;
  if (bitLength === 0) throw new Error("payload is empty");
  if (bitLength > capacity) {
    throw new Error(`payload too long: ${bitLength} bits, capacity ${capacity} bits (${img.width}x${img.height})`);
  }
  logger.debug("embedding mark", { bitLength, capacity, copies: Math.floor(capacity / bitLength) });

  const [LL, HL, LH, HH] = haarDWT(readChannel(img, channel, width, height));
  const w = width / 2;

  const scramble = makePermutation(bitLength, keyWatermark);
  const order = makePermutation(capacity, keyImage);
  for (let p = 0; p < capacity; p++) {
    if (p % w === 0) await checkpoint(options.signal);
    const idx = order[p]!;
    const i = Math.floor(idx / w), j = idx % w;
    const bit = bits[scramble[p % bitLength]!]!;
    HL[i]![j] = qimEncode(HL[i]![j]!, q, bit);
  }

  const newMat = haarIDWT(LL, HL, LH, HH);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      img.data[(y * img.width + x) * 4 + channel] = clampByte(newMat[y]![x]!);
    }
  }

  const image = options.output === "jpeg" ? encodeJpeg(img, options.jpegQuality ?? 95) : encodePng(img);
  return { image, bitLength };
}

/**
 * Reads `bitLength` bits back. A wrong length still yields that many bits,
 * they are just meaningless. A trailing partial byte is dropped.
 */
export async function extractWatermark(
  imageBuffer: Buffer,
  bitLength: number,
  keyImage: number,
  keyWatermark: number,
  options: MarkRunOptions = {},
): Promise<Uint8Array> {
  const channel = options.channel ?? 0;
  const q = options.q ?? 12;

  const img = await decodeImage(imageBuffer);
  const { width, height } = evenArea(img);
  const capacity = markCapacity(img);

  const [, HL, LH, HH] = haarDWT(readChannel(img, channel, width, height));
  const w = width / 2;

  const ones = new Array<number>(bitLength).fill(0);
  const seen = new Array<number>(bitLength).fill(0);
  const order = makePermutation(capacity, keyImage);
  for (let p = 0; p < capacity; p++) {
    if (p % w === 0) await checkpoint(options.signal);
    const idx = order[p]!;
    const i = Math.floor(idx / w), j = idx % w;
    const hl = HL[i]![j]!;
    // flat 2x2 block: crop-recovery fill, carries nothing
    if (hl === 0 && LH[i]![j] === 0 && HH[i]![j] === 0) continue;
    const slot = p % bitLength;
    ones[slot] = ones[slot]! + qimDecode(hl, q);
    seen[slot] = seen[slot]! + 1;
  }

  const scramble = makePermutation(bitLength, keyWatermark);
  const bits = new Array<number>(bitLength).fill(0);
  for (let s = 0; s < bitLength; s++) {
    bits[scramble[s]!] = ones[s]! * 2 > seen[s]! ? 1 : 0;
  }
  return fromBits(bits);
}

export class DwtQimTransform implements MarkTransform {
  constructor(
    private readonly options: MarkOptions = {},
    private readonly logger: Logger = silentLogger,
  ) {}

  embed(
    image: Buffer,
    payload: Uint8Array,
    keyImage: number,
    keyWatermark: number,
    signal?: AbortSignal,
  ): Promise<EmbedResult> {
    return addWatermark(image, payload, keyImage, keyWatermark, { ...this.options, signal }, this.logger);
  }

  extract(
    image: Buffer,
    bitLength: number,
    keyImage: number,
    keyWatermark: number,
    signal?: AbortSignal,
  ): Promise<Uint8Array> {
    return extractWatermark(image, bitLength, keyImage, keyWatermark, { ...this.options, signal });
  }
}
