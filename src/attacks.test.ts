import { describe, it, expect } from "vitest";

import { applyAttack, RasterAttackSimulator } from "./attacks";
import { decodeImage, encodePng, sniffFormat } from "./raster";
import { pixel, texturedRaster } from "./test-utils";

const src = texturedRaster(100, 80, 13);

describe("applyAttack", () => {
  it("cuts the ratio box out of the image", () => {
    const out = applyAttack(src, { type: "cut", box: { x1: 0.25, y1: 0.25, x2: 0.75, y2: 0.75 } });

    expect([out.width, out.height]).toEqual([50, 40]);
    expect(pixel(out, 0, 0)).toEqual(pixel(src, 25, 20));
    expect(pixel(out, 49, 39)).toEqual(pixel(src, 74, 59));
  });

  it("rescales a cut when asked", () => {
    const out = applyAttack(src, { type: "cut", box: { x1: 0, y1: 0, x2: 0.5, y2: 0.5 }, scale: 2 });
    expect([out.width, out.height]).toEqual([100, 80]);
  });

  it("resizes to the requested size", () => {
    const out = applyAttack(src, { type: "resize", width: 30, height: 20 });
    expect([out.width, out.height]).toEqual([30, 20]);
  });

  it("scales brightness and leaves alpha alone", () => {
    const out = applyAttack(src, { type: "bright", ratio: 0.5 });
    const [r, g, b] = pixel(src, 3, 4);
    expect(pixel(out, 3, 4)).toEqual([Math.round(r! * 0.5), Math.round(g! * 0.5), Math.round(b! * 0.5), 255]);
  });

  it("covers n blocks of ratio-sized white", () => {
    const out = applyAttack(src, { type: "shelter", ratio: 0.5, n: 1 });
    let white = 0;
    for (let y = 0; y < out.height; y++) {
      for (let x = 0; x < out.width; x++) {
        if (pixel(out, x, y).join() === "255,255,255,255") white++;
      }
    }
    expect(white).toBe(50 * 40);
  });

  it("adds no noise at ratio 0 and replaces every pixel at ratio 1", () => {
    expect(applyAttack(src, { type: "salt_pepper", ratio: 0 }).data.equals(src.data)).toBe(true);

    const noisy = applyAttack(src, { type: "salt_pepper", ratio: 1, seed: 5 });
    for (let i = 0; i < noisy.data.length; i += 4) {
      expect([0, 255]).toContain(noisy.data[i]);
    }
  });

  it("rotates into a well-formed raster", () => {
    const out = applyAttack(src, { type: "rot", angle: 30 });
    expect(out.data.length).toBe(out.width * out.height * 4);
  });

  it("is deterministic for a seed", () => {
    const a = applyAttack(src, { type: "salt_pepper", ratio: 0.3, seed: 9 });
    const b = applyAttack(src, { type: "salt_pepper", ratio: 0.3, seed: 9 });
    expect(a.data.equals(b.data)).toBe(true);
  });
});

describe("RasterAttackSimulator", () => {
  it("returns a PNG of the attacked image", async () => {
    const out = await new RasterAttackSimulator().apply(encodePng(src), { type: "resize", width: 40, height: 30 });

    expect(sniffFormat(out)).toBe("png");
    const decoded = await decodeImage(out);
    expect([decoded.width, decoded.height]).toEqual([40, 30]);
  });
});
