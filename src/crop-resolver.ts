import { withDeadline } from "./async";
import { CapabilityError, NoMatchError, ValidationError, WatermarkError } from "./errors";
import { blit, createRaster } from "./raster";
import type { CanvasShape, CropBox, DeadlineOptions, Raster, Rgba, TemplateMatch, TemplateMatcher } from "./types";

/** Opaque black. */
export const NEUTRAL_FILL: Rgba = [0, 0, 0, 255];

export interface CropEstimate {
  box: CropBox;
  shape: CanvasShape;
  score: number;
  scale: number;
}

export interface CropResolverOptions {
  fill?: Rgba;
  timeoutMs?: number;
}

/**
 * Finds where a cropped fragment sat in its original and rebuilds a canvas of
 * the original size around it, so the image mark can be read after a crop.
 */
export class CropGeometryResolver {
  readonly fill: Rgba;
  private readonly matcher: TemplateMatcher;
  private readonly timeoutMs?: number;

  constructor(matcher: TemplateMatcher, options: CropResolverOptions = {}) {
    if (!matcher) throw new ValidationError("a template matcher is required");
    this.matcher = matcher;
    this.fill = options.fill ?? NEUTRAL_FILL;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * The matcher decides which scales to try; a template that fits at none of
   * them is a ValidationError.
   *
   * @throws NoMatchError when the best score is under the matcher's confidence floor
   */
  async estimateCrop(original: Raster, template: Raster, options: DeadlineOptions = {}): Promise<CropEstimate> {
    requireRaster("original", original);
    requireRaster("template", template);

    let found: TemplateMatch;
    try {
      found = await withDeadline("matcher.match", (signal) => this.matcher.match(original, template, signal), {
        timeoutMs: options.timeoutMs ?? this.timeoutMs,
        signal: options.signal,
      });
    } catch (err) {
      if (err instanceof WatermarkError) throw err;
      throw new CapabilityError("matcher.match", err);
    }

    if (found.score < this.matcher.confidenceFloor) throw new NoMatchError(found.score, this.matcher.confidenceFloor);
    return {
      box: { x1: found.x, y1: found.y, x2: found.x + found.width, y2: found.y + found.height },
      shape: { width: original.width, height: original.height },
      score: found.score,
      scale: found.scale,
    };
  }

  /**
   * Places `template` at `box` on a `shape`-sized canvas filled with the
   * neutral colour. The box must be exactly the template's size.
   */
  recoverCrop(template: Raster, box: CropBox, shape: CanvasShape): Raster {
    requireRaster("template", template);
    validateShape(shape);
    validateBox(box, shape);
    const boxWidth = box.x2 - box.x1;
    const boxHeight = box.y2 - box.y1;
    if (boxWidth !== template.width || boxHeight !== template.height) {
      throw new ValidationError(
        `crop box is ${boxWidth}x${boxHeight} but template is ${template.width}x${template.height}`,
        { box, template: { width: template.width, height: template.height } },
      );
    }

    const canvas = createRaster(shape, this.fill);
    blit(canvas, template, box.x1, box.y1);
    return canvas;
  }
}

function requireRaster(name: string, raster: Raster): void {
  if (raster.width <= 0 || raster.height <= 0 || raster.data.length !== raster.width * raster.height * 4) {
    throw new ValidationError(`${name} is not a valid RGBA raster`, { width: raster.width, height: raster.height });
  }
}

export function validateShape(shape: CanvasShape): void {
  if (!Number.isInteger(shape.width) || !Number.isInteger(shape.height) || shape.width <= 0 || shape.height <= 0) {
    throw new ValidationError("canvas shape must be positive integers", { shape });
  }
}

/** 0 <= x1 < x2 <= width and 0 <= y1 < y2 <= height, all integers. */
export function validateBox(box: CropBox, shape: CanvasShape): void {
  const { x1, y1, x2, y2 } = box;
  const ints = [x1, y1, x2, y2].every(Number.isInteger);
  if (!ints || x1 < 0 || y1 < 0 || x1 >= x2 || y1 >= y2 || x2 > shape.width || y2 > shape.height) {
    throw new ValidationError("crop box is outside the canvas or empty", { box, shape });
  }
}
