import { checkpoint } from "./async";
import { ValidationError } from "./errors";
import { fromJimp, luma, toJimp } from "./raster";
import type { Raster, TemplateMatch, TemplateMatcher } from "./types";

export interface NccMatcherOptions {
  /** Score band treated as a tie; the first position in raster order wins. */
  tolerance?: number;
  confidenceFloor?: number;
  /**
   * Candidate factors the template was scaled by after cropping. Each one is
   * undone (template resized by 1/scale) before searching; scales at which
   * the template no longer fits inside the original are skipped.
   */
  scales?: readonly number[];
}

interface Hit {
  x: number;
  y: number;
  score: number;
}

/**
 * Exhaustive zero-mean normalised cross-correlation on luma. Scores lie in
 * [-1, 1], 1 being a match up to brightness and contrast. A flat template only
 * matches flat windows of the same level.
 */
export class NccTemplateMatcher implements TemplateMatcher {
  readonly tolerance: number;
  readonly confidenceFloor: number;
  readonly scales: readonly number[];

  constructor(options: NccMatcherOptions = {}) {
    this.tolerance = options.tolerance ?? 0.002;
    this.confidenceFloor = options.confidenceFloor ?? 0.9;
    this.scales = options.scales ?? [1];
    if (this.scales.length === 0 || this.scales.some((s) => !(s > 0) || !Number.isFinite(s))) {
      throw new RangeError("scales must be a non-empty list of positive numbers");
    }
  }

  async match(original: Raster, template: Raster, signal?: AbortSignal): Promise<TemplateMatch> {
    const field = integrate(luma(original), original.width, original.height);
    let best: TemplateMatch | undefined;

    for (const scale of this.scales) {
      const tpl = scale === 1 ? template : rescale(template, scale);
      if (tpl.width > original.width || tpl.height > original.height) continue;

      const hit = await search(field, luma(tpl), tpl.width, tpl.height, this.tolerance, signal);
      if (!best || hit.score > best.score + this.tolerance) {
        best = { x: hit.x, y: hit.y, width: tpl.width, height: tpl.height, score: hit.score, scale };
      }
    }

    if (!best) {
      throw new ValidationError("template is larger than the original at every candidate scale", {
        template: { width: template.width, height: template.height },
        original: { width: original.width, height: original.height },
        scales: this.scales,
      });
    }
    return best;
  }
}

function rescale(template: Raster, scale: number): Raster {
  const w = Math.max(1, Math.round(template.width / scale));
  const h = Math.max(1, Math.round(template.height / scale));
  return fromJimp(toJimp(template).resize({ w, h }));
}

interface LumaField {
  values: Float32Array;
  width: number;
  height: number;
  /** Summed-area tables of values and squared values, (width+1) x (height+1). */
  sum: Float64Array;
  sumSq: Float64Array;
}

function integrate(values: Float32Array, width: number, height: number): LumaField {
  const stride = width + 1;
  const sum = new Float64Array(stride * (height + 1));
  const sumSq = new Float64Array(stride * (height + 1));
  for (let y = 0; y < height; y++) {
    let row = 0;
    let rowSq = 0;
    for (let x = 0; x < width; x++) {
      const v = values[y * width + x]!;
      row += v;
      rowSq += v * v;
      sum[(y + 1) * stride + x + 1] = sum[y * stride + x + 1]! + row;
      sumSq[(y + 1) * stride + x + 1] = sumSq[y * stride + x + 1]! + rowSq;
    }
  }
  return { values, width, height, sum, sumSq };
}

function boxSum(table: Float64Array, stride: number, x: number, y: number, w: number, h: number): number {
  return table[(y + h) * stride + x + w]! - table[y * stride + x + w]! - table[(y + h) * stride + x]! + table[y * stride + x]!;
}

async function search(
  field: LumaField,
  tpl: Float32Array, tw: number, th: number,
  tolerance: number,
  signal?: AbortSignal,
): Promise<Hit> {
  const n = tw * th;
  let tplSum = 0;
  for (const v of tpl) tplSum += v;
  const tplMean = tplSum / n;
  const centred = new Float64Array(n);
  let tplVar = 0;
  for (let k = 0; k < n; k++) {
    centred[k] = tpl[k]! - tplMean;
    tplVar += centred[k]! * centred[k]!;
  }

  // below this a patch counts as flat (mean squared deviation 1e-3)
  const flat = 1e-3 * n;
  const stride = field.width + 1;
  const cols = field.width - tw + 1;
  const rows = field.height - th + 1;
  const scores = new Float64Array(cols * rows);
  let bestScore = -Infinity;

  for (let y = 0; y < rows; y++) {
    await checkpoint(signal);
    for (let x = 0; x < cols; x++) {
      const winSum = boxSum(field.sum, stride, x, y, tw, th);
      const winVar = Math.max(0, boxSum(field.sumSq, stride, x, y, tw, th) - (winSum * winSum) / n);

      let score: number;
      if (tplVar < flat || winVar < flat) {
        score = tplVar < flat && winVar < flat ? 1 - Math.abs(winSum / n - tplMean) / 255 : 0;
      } else {
        let cross = 0;
        for (let r = 0; r < th; r++) {
          const o = (y + r) * field.width + x;
          const t = r * tw;
          for (let c = 0; c < tw; c++) cross += field.values[o + c]! * centred[t + c]!;
        }
        score = Math.max(-1, Math.min(1, cross / Math.sqrt(tplVar * winVar)));
      }

      scores[y * cols + x] = score;
      if (score > bestScore) bestScore = score;
    }
  }

  // first in raster order within tolerance of the best
  for (let i = 0; i < scores.length; i++) {
    if (scores[i]! >= bestScore - tolerance) return { x: i % cols, y: Math.floor(i / cols), score: scores[i]! };
  }
  return { x: 0, y: 0, score: bestScore };
}
