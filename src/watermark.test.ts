import { describe, it, expect } from "vitest";

import { applyAttack } from "./attacks";
import { CropGeometryResolver } from "./crop-resolver";
import { cropRaster, decodeImage, encodePng } from "./raster";
import { NccTemplateMatcher } from "./template-matcher";
import { pixel, texturedRaster } from "./test-utils";
import { bytesToString, stringToBytes } from "./utils";
import { addWatermark, extractWatermark, markCapacity } from "./watermark";

describe("DWT/QIM mark", () => {
  it("round-trips a payload and reports its bit length", async () => {
    const cover = encodePng(texturedRaster(64, 64, 3));

    const { image, bitLength } = await addWatermark(cover, stringToBytes("hello"), 7, 11);
    expect(bitLength).toBe(40);

    const bytes = await extractWatermark(image, bitLength, 7, 11);
    expect(bytesToString(bytes)).toBe("hello");
  });

  it("does not read the payload back under other keys", async () => {
    const cover = encodePng(texturedRaster(64, 64, 3));
    const { image, bitLength } = await addWatermark(cover, stringToBytes("hello"), 7, 11);

    const wrongImageKey = await extractWatermark(image, bitLength, 8, 11);
    const wrongMarkKey = await extractWatermark(image, bitLength, 7, 12);
    expect(bytesToString(wrongImageKey)).not.toBe("hello");
    expect(bytesToString(wrongMarkKey)).not.toBe("hello");
  });

  it("keeps image size and leaves an odd trailing column alone", async () => {
    const raster = texturedRaster(65, 63, 5);
    const { image, bitLength } = await addWatermark(encodePng(raster), stringToBytes("ok"), 1, 1);

    const marked = await decodeImage(image);
    expect([marked.width, marked.height]).toEqual([65, 63]);
    for (let y = 0; y < 63; y++) expect(pixel(marked, 64, y)).toEqual(pixel(raster, 64, y));
    expect(bytesToString(await extractWatermark(image, bitLength, 1, 1))).toBe("ok");
  });

  it("refuses a payload larger than the image capacity", async () => {
    const small = texturedRaster(8, 8);
    expect(markCapacity(small)).toBe(16);

    await expect(addWatermark(encodePng(small), stringToBytes("abc"), 1, 1)).rejects.toThrow(/capacity 16 bits/);
    await expect(addWatermark(encodePng(small), new Uint8Array(), 1, 1)).rejects.toThrow(/empty/);
  });

  it("stops at the next row once its signal fires", async () => {
    const cover = encodePng(texturedRaster(64, 64, 3));
    const controller = new AbortController();
    const reason = new Error("stop");
    controller.abort(reason);

    await expect(addWatermark(cover, stringToBytes("hi"), 1, 1, { signal: controller.signal })).rejects.toBe(reason);
    await expect(extractWatermark(cover, 16, 1, 1, { signal: controller.signal })).rejects.toBe(reason);
  });

  it("survives a crop once the canvas is rebuilt around the fragment", async () => {
    const original = texturedRaster(200, 200, 9);
    const { image, bitLength } = await addWatermark(encodePng(original), stringToBytes("hello"), 3, 4);
    const marked = await decodeImage(image);

    const box = { x1: 10, y1: 10, x2: 110, y2: 110 };
    const fragment = cropRaster(marked, box);

    const resolver = new CropGeometryResolver(new NccTemplateMatcher());
    const estimate = await resolver.estimateCrop(marked, fragment);
    expect(estimate.box).toEqual(box);

    const rebuilt = resolver.recoverCrop(fragment, estimate.box, estimate.shape);
    const bytes = await extractWatermark(encodePng(rebuilt), bitLength, 3, 4);
    expect(bytesToString(bytes)).toBe("hello");
  });

  it("reads the mark from a fragment produced by the cut attack", async () => {
    const { image, bitLength } = await addWatermark(encodePng(texturedRaster(200, 200, 17)), stringToBytes("cut"), 5, 6);
    const marked = await decodeImage(image);
    const fragment = applyAttack(marked, { type: "cut", box: { x1: 0.05, y1: 0.1, x2: 0.55, y2: 0.7 } });
    expect([fragment.width, fragment.height]).toEqual([100, 120]);

    const resolver = new CropGeometryResolver(new NccTemplateMatcher());
    const estimate = await resolver.estimateCrop(marked, fragment);
    expect(estimate.box).toEqual({ x1: 10, y1: 20, x2: 110, y2: 140 });

    const rebuilt = resolver.recoverCrop(fragment, estimate.box, estimate.shape);
    expect(bytesToString(await extractWatermark(encodePng(rebuilt), bitLength, 5, 6))).toBe("cut");
  });
});
