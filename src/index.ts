/**
 * provenance-mark
 *
 * Invisible provenance marks for page text (zero-width characters) and raster
 * images (keyed DWT/QIM), with crop-geometry recovery for cropped images.
 *
 * @example
 * ```typescript
 * import { TextMarker, singleByteToBytes, bytesToSingleByte } from "provenance-mark";
 *
 * const marker = new TextMarker();
 * const html = marker.embedIntoDocument("<html><body>Hi</body></html>", singleByteToBytes("ID-42"));
 * bytesToSingleByte(marker.extractFromDocument(html)); // "ID-42"
 * ```
 */

export { BitCodec, ZERO, ONE } from "./bit-codec";
export { TextMarker, DEFAULT_INSERTION_TAG } from "./text-mark";
export type { ExtractionScope, TextMarkOptions } from "./text-mark";

export { InvisibleImageMarkOrchestrator, MAX_BIT_LENGTH, parseAttack, isAttackType } from "./orchestrator";
export type { OrchestratorDeps } from "./orchestrator";
export { CropGeometryResolver, NEUTRAL_FILL, validateBox, validateShape } from "./crop-resolver";
export type { CropEstimate, CropResolverOptions } from "./crop-resolver";

export { DwtQimTransform, addWatermark, extractWatermark, markCapacity } from "./watermark";
export type { MarkRunOptions } from "./watermark";
export { NccTemplateMatcher } from "./template-matcher";
export type { NccMatcherOptions } from "./template-matcher";
export { RasterAttackSimulator, applyAttack } from "./attacks";

export { ProvenanceService, parseInteger } from "./service";
export type { CallOptions, NumericField, ServiceDeps, TextScope } from "./service";
export { ArtifactStore } from "./artifact-store";
export type { ArtifactRef } from "./artifact-store";
export { loadConfig, DEFAULT_CONFIG } from "./config";
export type { ServiceConfig } from "./config";
export { createConsoleLogger, silentLogger } from "./logger";
export type { LogLevel, Logger } from "./logger";
export { withDeadline, checkpoint } from "./async";

export {
  WatermarkError,
  ValidationError,
  CapabilityError,
  NoMatchError,
  TimeoutError,
  AbortedError,
  toErrorResponse,
} from "./errors";
export type { ErrorResponse, WatermarkErrorKind } from "./errors";

export { decodeImage, encodePng, encodeJpeg, cropRaster, createRaster, sniffFormat } from "./raster";
export type { ImageFormat } from "./raster";
export { singleByteToBytes, bytesToSingleByte, stringToBytes, bytesToString } from "./utils";

export { ATTACK_TYPES } from "./types";
export type * from "./types";
