import * as fs from "fs";
import * as path from "path";

import {
  CropGeometryResolver,
  NccTemplateMatcher,
  addWatermark,
  applyAttack,
  bytesToString,
  decodeImage,
  encodePng,
  extractWatermark,
  loadConfig,
  stringToBytes,
} from "../src";
import type { Raster } from "../src";

// Smooth gradient with some noise, so the demo needs no image on disk.
function syntheticImage(width: number, height: number): Raster {
  const data = Buffer.alloc(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 4;
      const n = ((x * 7919 + y * 104729) % 37) - 18;
      data[i] = 80 + Math.round((x / width) * 90) + n;
      data[i + 1] = 80 + Math.round((y / height) * 90) - n;
      data[i + 2] = 120 + (n >> 1);
      data[i + 3] = 255;
    }
  }
  return { width, height, data };
}

(async () => {
  process.on("unhandledRejection", (e) => {
    console.error("UNHANDLED REJECTION:", e);
    process.exit(1);
  });

  const { outputDir } = loadConfig();
  fs.mkdirSync(outputDir, { recursive: true });

  const wmText = "my invisible mark";
  const original = encodePng(syntheticImage(256, 256));

  const { image, bitLength } = await addWatermark(original, stringToBytes(wmText), 1234, 5678);
  fs.writeFileSync(path.join(outputDir, "blind_demo.png"), image);
  console.log(`embedded ${bitLength} bits`);

  const extracted = bytesToString(await extractWatermark(image, bitLength, 1234, 5678));
  console.log(`plain -> ${JSON.stringify(extracted)} ${extracted === wmText ? "✅" : "❌"}`);

  const marked = await decodeImage(image);
  const fragment = applyAttack(marked, { type: "cut", box: { x1: 0.125, y1: 0.25, x2: 0.75, y2: 0.75 } });
  fs.writeFileSync(path.join(outputDir, "attacked_cut_demo.png"), encodePng(fragment));

  const resolver = new CropGeometryResolver(new NccTemplateMatcher());
  const estimate = await resolver.estimateCrop(marked, fragment);
  console.log(`crop found at ${JSON.stringify(estimate.box)} score ${estimate.score.toFixed(4)}`);

  const rebuilt = encodePng(resolver.recoverCrop(fragment, estimate.box, estimate.shape));
  fs.writeFileSync(path.join(outputDir, "recovered_demo.png"), rebuilt);

  const recovered = bytesToString(await extractWatermark(rebuilt, bitLength, 1234, 5678));
  console.log(`cut -> ${JSON.stringify(recovered)} ${recovered === wmText ? "✅" : "❌"}`);
})().catch((err: unknown) => {
  console.error("demo failed:", err);
  process.exitCode = 1;
});
