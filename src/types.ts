/** RGBA pixels, row major, 4 bytes per pixel (same layout as a jimp bitmap). */
export interface Raster {
  width: number;
  height: number;
  data: Buffer;
}

/** Region of the original image, x = column, y = row, end-exclusive. */
export interface CropBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface CanvasShape {
  width: number;
  height: number;
}

export type Rgba = readonly [number, number, number, number];

export interface MarkOptions {
  channel?: 0 | 1 | 2;
  q?: number;          // quantization step QIM
  output?: "png" | "jpeg";
  jpegQuality?: number;
}

export interface EmbedResult {
  image: Buffer;
  bitLength: number;
}

/** Anything carrying text: a DOM node, or a plain object in tests. */
export interface TextCarrier {
  textContent: string | null;
}

export interface DeadlineOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/* ------------------------------ Capabilities ------------------------------ */

/*
 * Every capability takes an optional signal. Once it fires the capability
 * stops and rejects with `signal.reason`.
 */

/** Keyed frequency-domain transform. */
export interface MarkTransform {
  embed(
    image: Buffer,
    payload: Uint8Array,
    keyImage: number,
    keyWatermark: number,
    signal?: AbortSignal,
  ): Promise<EmbedResult>;
  extract(
    image: Buffer,
    bitLength: number,
    keyImage: number,
    keyWatermark: number,
    signal?: AbortSignal,
  ): Promise<Uint8Array>;
}

export interface TemplateMatch {
  x: number;
  y: number;
  width: number;
  height: number;
  score: number;
  scale: number;
}

export interface TemplateMatcher {
  /** Scores at most this far below the best are treated as ties. */
  readonly tolerance: number;
  /** Best scores below this are not a match. */
  readonly confidenceFloor: number;
  /** Rejects with ValidationError when the template fits the original at no scale. */
  match(original: Raster, template: Raster, signal?: AbortSignal): Promise<TemplateMatch>;
}

export const ATTACK_TYPES = ["cut", "resize", "bright", "shelter", "salt_pepper", "rot"] as const;
export type AttackType = (typeof ATTACK_TYPES)[number];

/** Ratios of width/height in [0, 1]. */
export interface RatioBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export type AttackParams =
  | { type: "cut"; box: RatioBox; scale?: number }
  | { type: "resize"; width: number; height: number }
  | { type: "bright"; ratio: number }
  | { type: "shelter"; ratio: number; n: number; seed?: number }
  | { type: "salt_pepper"; ratio: number; seed?: number }
  | { type: "rot"; angle: number };

export interface AttackSimulator {
  apply(image: Buffer, params: AttackParams, signal?: AbortSignal): Promise<Buffer>;
}
