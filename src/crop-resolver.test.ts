import { describe, it, expect, vi } from "vitest";

import { CropGeometryResolver, NEUTRAL_FILL } from "./crop-resolver";
import { AbortedError, CapabilityError, NoMatchError, TimeoutError, ValidationError } from "./errors";
import { createRaster, cropRaster, blit } from "./raster";
import { NccTemplateMatcher } from "./template-matcher";
import { pixel, texturedRaster } from "./test-utils";
import type { TemplateMatcher } from "./types";

describe("CropGeometryResolver.recoverCrop", () => {
  const resolver = new CropGeometryResolver(new NccTemplateMatcher());
  const original = texturedRaster(200, 200, 42);
  const box = { x1: 10, y1: 10, x2: 110, y2: 110 };
  const template = cropRaster(original, box);

  it("puts the template back at the box and fills the rest", () => {
    const canvas = resolver.recoverCrop(template, box, { width: 200, height: 200 });

    expect([canvas.width, canvas.height]).toEqual([200, 200]);
    for (let y = 0; y < 200; y++) {
      for (let x = 0; x < 200; x++) {
        const inside = x >= 10 && x < 110 && y >= 10 && y < 110;
        const expected = inside ? pixel(template, x - 10, y - 10) : [...NEUTRAL_FILL];
        if (pixel(canvas, x, y).join() !== expected.join()) {
          throw new Error(`pixel (${x}, ${y}) is ${pixel(canvas, x, y)}, expected ${expected}`);
        }
      }
    }
  });

  it("uses a configured fill", () => {
    const grey = new CropGeometryResolver(new NccTemplateMatcher(), { fill: [128, 128, 128, 255] });
    const canvas = grey.recoverCrop(template, box, { width: 200, height: 200 });
    expect(pixel(canvas, 0, 0)).toEqual([128, 128, 128, 255]);
    expect(pixel(canvas, 10, 10)).toEqual(pixel(template, 0, 0));
  });

  it("refuses a box whose size differs from the template", () => {
    expect(() => resolver.recoverCrop(template, { x1: 10, y1: 10, x2: 111, y2: 110 }, { width: 200, height: 200 })).toThrow(
      ValidationError,
    );
  });

  it("refuses boxes outside the canvas or empty", () => {
    const shape = { width: 200, height: 200 };
    expect(() => resolver.recoverCrop(template, { x1: 150, y1: 10, x2: 250, y2: 110 }, shape)).toThrow(ValidationError);
    expect(() => resolver.recoverCrop(template, { x1: 10, y1: 10, x2: 10, y2: 110 }, shape)).toThrow(ValidationError);
    expect(() => resolver.recoverCrop(template, box, { width: 0, height: 200 })).toThrow(ValidationError);
  });
});

describe("CropGeometryResolver.estimateCrop", () => {
  it("finds where a fragment was cut from", async () => {
    const resolver = new CropGeometryResolver(new NccTemplateMatcher());
    const original = texturedRaster(200, 200, 42);
    const box = { x1: 10, y1: 10, x2: 110, y2: 110 };

    const estimate = await resolver.estimateCrop(original, cropRaster(original, box));

    expect(estimate.box).toEqual(box);
    expect(estimate.shape).toEqual({ width: 200, height: 200 });
    expect(estimate.score).toBeCloseTo(1, 6);
    expect(estimate.scale).toBe(1);
  });

  it("takes the first tie in raster order", async () => {
    const resolver = new CropGeometryResolver(new NccTemplateMatcher());
    const patch = texturedRaster(4, 4, 7);
    const original = createRaster({ width: 30, height: 30 }, [50, 50, 50, 255]);
    blit(original, patch, 3, 12);
    blit(original, patch, 20, 5);

    const estimate = await resolver.estimateCrop(original, patch);

    expect(estimate.box).toEqual({ x1: 20, y1: 5, x2: 24, y2: 9 });
  });

  it("picks the top-left position on a uniform image", async () => {
    const resolver = new CropGeometryResolver(new NccTemplateMatcher());
    const flat = createRaster({ width: 20, height: 20 }, [90, 90, 90, 255]);
    const estimate = await resolver.estimateCrop(flat, createRaster({ width: 5, height: 5 }, [90, 90, 90, 255]));
    expect(estimate.box).toEqual({ x1: 0, y1: 0, x2: 5, y2: 5 });
  });

  it("reports no match below the confidence floor", async () => {
    const resolver = new CropGeometryResolver(new NccTemplateMatcher());
    const white = createRaster({ width: 16, height: 16 }, [255, 255, 255, 255]);

    await expect(resolver.estimateCrop(texturedRaster(64, 64), white)).rejects.toBeInstanceOf(NoMatchError);
  });

  it("does not accept a flat patch that occurs nowhere in the original", async () => {
    const resolver = new CropGeometryResolver(new NccTemplateMatcher());
    const grey = createRaster({ width: 40, height: 40 }, [128, 128, 128, 255]);

    await expect(resolver.estimateCrop(texturedRaster(120, 120, 3), grey)).rejects.toBeInstanceOf(NoMatchError);
  });

  it("does not accept a textured patch from another image", async () => {
    const resolver = new CropGeometryResolver(new NccTemplateMatcher());
    const foreign = texturedRaster(24, 24, 99);

    await expect(resolver.estimateCrop(texturedRaster(120, 120, 3), foreign)).rejects.toBeInstanceOf(NoMatchError);
  });

  it("scores a brightened fragment as a match", async () => {
    const resolver = new CropGeometryResolver(new NccTemplateMatcher());
    const original = texturedRaster(60, 60, 6);
    const fragment = cropRaster(original, { x1: 14, y1: 8, x2: 44, y2: 38 });
    for (let i = 0; i < fragment.data.length; i += 4) {
      fragment.data[i] = fragment.data[i]! + 20;
      fragment.data[i + 1] = fragment.data[i + 1]! + 20;
      fragment.data[i + 2] = fragment.data[i + 2]! + 20;
    }

    const estimate = await resolver.estimateCrop(original, fragment);
    expect(estimate.box).toEqual({ x1: 14, y1: 8, x2: 44, y2: 38 });
    expect(estimate.score).toBeGreaterThan(0.999);
  });

  it("rejects a template larger than the original", async () => {
    const resolver = new CropGeometryResolver(new NccTemplateMatcher());
    await expect(resolver.estimateCrop(texturedRaster(10, 10), texturedRaster(12, 8))).rejects.toBeInstanceOf(ValidationError);
  });

  it("skips scales at which the template no longer fits", async () => {
    const resolver = new CropGeometryResolver(new NccTemplateMatcher({ scales: [0.25, 1] }));
    const original = texturedRaster(40, 40, 2);
    const estimate = await resolver.estimateCrop(original, cropRaster(original, { x1: 8, y1: 4, x2: 32, y2: 20 }));
    expect(estimate.scale).toBe(1);
    expect(estimate.box).toEqual({ x1: 8, y1: 4, x2: 32, y2: 20 });
  });

  it("wraps matcher faults and honours the deadline", async () => {
    const failing: TemplateMatcher = {
      tolerance: 0,
      confidenceFloor: 0.5,
      match: vi.fn().mockRejectedValue(new Error("boom")),
    };
    const stuck: TemplateMatcher = {
      tolerance: 0,
      confidenceFloor: 0.5,
      match: () => new Promise(() => undefined),
    };
    const original = texturedRaster(10, 10);
    const template = texturedRaster(4, 4);

    await expect(new CropGeometryResolver(failing).estimateCrop(original, template)).rejects.toBeInstanceOf(CapabilityError);
    await expect(
      new CropGeometryResolver(stuck, { timeoutMs: 20 }).estimateCrop(original, template),
    ).rejects.toBeInstanceOf(TimeoutError);
  });

  it("stops the built-in matcher when the deadline passes", async () => {
    const original = texturedRaster(300, 300, 12);
    const template = cropRaster(original, { x1: 100, y1: 100, x2: 160, y2: 160 });
    const resolver = new CropGeometryResolver(new NccTemplateMatcher(), { timeoutMs: 1 });

    await expect(resolver.estimateCrop(original, template)).rejects.toBeInstanceOf(TimeoutError);
  });

  it("stops the built-in matcher when the caller aborts", async () => {
    const original = texturedRaster(300, 300, 12);
    const template = cropRaster(original, { x1: 100, y1: 100, x2: 160, y2: 160 });
    const resolver = new CropGeometryResolver(new NccTemplateMatcher());
    const controller = new AbortController();

    const pending = resolver.estimateCrop(original, template, { signal: controller.signal });
    setTimeout(() => controller.abort(), 1);

    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });
});
