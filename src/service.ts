import { ArtifactStore, type ArtifactRef } from "./artifact-store";
import { RasterAttackSimulator } from "./attacks";
import { loadConfig, type ServiceConfig } from "./config";
import { CropGeometryResolver, type CropEstimate } from "./crop-resolver";
import { ValidationError, WatermarkError } from "./errors";
import { createConsoleLogger, type Logger } from "./logger";
import { InvisibleImageMarkOrchestrator } from "./orchestrator";
import { decodeImage, encodePng, sniffFormat } from "./raster";
import { NccTemplateMatcher } from "./template-matcher";
import { TextMarker } from "./text-mark";
import type { AttackSimulator, MarkTransform, Raster, TemplateMatcher } from "./types";
import { bytesToSingleByte, bytesToString, singleByteToBytes, stringToBytes } from "./utils";
import { DwtQimTransform } from "./watermark";

/** Numbers arrive either as numbers or as decimal strings from form fields. */
export type NumericField = number | string;

export type TextScope = { kind: "selector"; selector: string } | { kind: "document" };

export interface CallOptions {
  signal?: AbortSignal;
}

export interface ServiceDeps {
  config?: Partial<ServiceConfig>;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  transform?: MarkTransform;
  attacks?: AttackSimulator;
  matcher?: TemplateMatcher;
  textMarker?: TextMarker;
}

/**
 * Request/response surface over the mark components: validates wire fields,
 * stores output images and logs one line per call.
 */
export class ProvenanceService {
  readonly config: ServiceConfig;
  readonly store: ArtifactStore;
  private readonly logger: Logger;
  private readonly orchestrator: InvisibleImageMarkOrchestrator;
  private readonly resolver: CropGeometryResolver;
  private readonly textMarker: TextMarker;

  constructor(deps: ServiceDeps = {}) {
    this.config = loadConfig(deps.config, deps.env);
    this.logger = deps.logger ?? createConsoleLogger(this.config.logLevel);
    this.store = new ArtifactStore(this.config.outputDir);
    this.orchestrator = new InvisibleImageMarkOrchestrator({
      transform: deps.transform ?? new DwtQimTransform({}, this.logger),
      attacks: deps.attacks ?? new RasterAttackSimulator(),
      timeoutMs: this.config.timeoutMs,
    });
    const matcher = deps.matcher ?? new NccTemplateMatcher({ scales: this.config.matchScales });
    this.resolver = new CropGeometryResolver(matcher, { timeoutMs: this.config.timeoutMs });
    this.textMarker = deps.textMarker ?? new TextMarker();
  }

  embedImageMark(
    req: { image: Buffer; payload: string; keyImage?: NumericField; keyWatermark?: NumericField },
    opts: CallOptions = {},
  ): Promise<{ output: ArtifactRef; bitLength: number }> {
    return this.run("embed_image_mark", async () => {
      this.requireUpload("image", req.image);
      if (typeof req.payload !== "string" || req.payload.length === 0) throw new ValidationError("payload is required");
      const keyImage = parseInteger("keyImage", req.keyImage ?? this.config.defaultKeyImage);
      const keyWatermark = parseInteger("keyWatermark", req.keyWatermark ?? this.config.defaultKeyWatermark);

      const { image, bitLength } = await this.orchestrator.embed(req.image, stringToBytes(req.payload), keyImage, keyWatermark, {
        signal: opts.signal,
      });
      const output = await this.store.put("blind", image, "png", opts.signal);
      return { output, bitLength };
    });
  }

  /** The payload may be garbage if bitLength is not the one embed returned. */
  extractImageMark(
    req: { image: Buffer; bitLength: NumericField; keyImage?: NumericField; keyWatermark?: NumericField },
    opts: CallOptions = {},
  ): Promise<{ payload: string }> {
    return this.run("extract_image_mark", async () => {
      this.requireUpload("image", req.image);
      const bitLength = parseInteger("bitLength", req.bitLength);
      const keyImage = parseInteger("keyImage", req.keyImage ?? this.config.defaultKeyImage);
      const keyWatermark = parseInteger("keyWatermark", req.keyWatermark ?? this.config.defaultKeyWatermark);

      const bytes = await this.orchestrator.extract(req.image, bitLength, keyImage, keyWatermark, { signal: opts.signal });
      return { payload: bytesToString(bytes) };
    });
  }

  applyAttack(
    req: { image: Buffer; attackType: string; params?: Record<string, unknown> },
    opts: CallOptions = {},
  ): Promise<{ output: ArtifactRef; attackType: string }> {
    return this.run("apply_attack", async () => {
      this.requireUpload("image", req.image);
      if (!req.attackType) throw new ValidationError("attackType is required");
      const degraded = await this.orchestrator.attack(req.image, req.attackType, coerceNumbers(req.params ?? {}), {
        signal: opts.signal,
      });
      const output = await this.store.put(`attacked_${req.attackType}`, degraded, "png", opts.signal);
      return { output, attackType: req.attackType };
    });
  }

  estimateCrop(req: { original: Buffer; template: Buffer }, opts: CallOptions = {}): Promise<CropEstimate> {
    return this.run("estimate_crop", async () => {
      const original = await this.readRaster("original", req.original);
      const template = await this.readRaster("template", req.template);
      return this.resolver.estimateCrop(original, template, { signal: opts.signal });
    });
  }

  recoverCrop(
    req: {
      template: Buffer;
      box: { x1: NumericField; y1: NumericField; x2: NumericField; y2: NumericField };
      shape: { width: NumericField; height: NumericField };
    },
    opts: CallOptions = {},
  ): Promise<{ output: ArtifactRef }> {
    return this.run("recover_crop", async () => {
      const template = await this.readRaster("template", req.template);
      const box = {
        x1: parseInteger("x1", req.box.x1),
        y1: parseInteger("y1", req.box.y1),
        x2: parseInteger("x2", req.box.x2),
        y2: parseInteger("y2", req.box.y2),
      };
      const shape = { width: parseInteger("width", req.shape.width), height: parseInteger("height", req.shape.height) };
      const canvas = this.resolver.recoverCrop(template, box, shape);
      const output = await this.store.put("recovered", encodePng(canvas), "png", opts.signal);
      return { output };
    });
  }

  embedTextMark(req: { markup: string; scope: TextScope; payload: string }): Promise<{ markup: string }> {
    return this.run("embed_text_mark", async () => {
      if (typeof req.markup !== "string") throw new ValidationError("markup is required");
      if (typeof req.payload !== "string" || req.payload.length === 0) throw new ValidationError("payload is required");
      const payload = singleByteToBytes(req.payload);
      const scope = requireScope(req.scope);
      const markup =
        scope.kind === "document"
          ? this.textMarker.embedIntoDocument(req.markup, payload)
          : this.textMarker.embedIntoSelector(req.markup, scope.selector, payload);
      return { markup };
    });
  }

  extractTextMark(req: { markup: string; scope: TextScope }): Promise<{ payload: string }> {
    return this.run("extract_text_mark", async () => {
      if (typeof req.markup !== "string") throw new ValidationError("markup is required");
      const scope = requireScope(req.scope);
      const bytes =
        scope.kind === "document"
          ? this.textMarker.extractFromDocument(req.markup)
          : this.textMarker.extractFromSelector(req.markup, scope.selector);
      return { payload: bytesToSingleByte(bytes) };
    });
  }

  /** Deletes stored outputs older than `artifactMaxAgeMs`. */
  cleanupArtifacts(now: number = Date.now()): Promise<{ removed: string[] }> {
    return this.run("cleanup_artifacts", async () => {
      const removed = await this.store.cleanup(this.config.artifactMaxAgeMs, now);
      return { removed };
    });
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const started = performance.now();
    try {
      const result = await fn();
      this.logger.info(`${operation} ok`, { ms: elapsed(started) });
      return result;
    } catch (err) {
      const kind = err instanceof WatermarkError ? err.kind : "internal";
      const fields = { ms: elapsed(started), kind, error: err instanceof Error ? err.message : String(err) };
      if (kind === "validation" || kind === "no_match") this.logger.warn(`${operation} rejected`, fields);
      else this.logger.error(`${operation} failed`, fields);
      throw err;
    }
  }

  private requireUpload(name: string, data: Buffer): void {
    if (!Buffer.isBuffer(data) || data.length === 0) throw new ValidationError(`${name} upload is required`);
    if (data.length > this.config.maxUploadBytes) {
      throw new ValidationError(`${name} is larger than ${this.config.maxUploadBytes} bytes`, { size: data.length });
    }
    if (!sniffFormat(data)) throw new ValidationError(`${name} is not a png, jpeg, bmp or gif image`);
  }

  private async readRaster(name: string, data: Buffer): Promise<Raster> {
    this.requireUpload(name, data);
    try {
      return await decodeImage(data);
    } catch (err) {
      throw new ValidationError(`${name} could not be decoded`, { reason: err instanceof Error ? err.message : String(err) });
    }
  }
}

function elapsed(started: number): number {
  return Math.round((performance.now() - started) * 100) / 100;
}

/** Accepts integers and strings of decimal digits, nothing else. */
export function parseInteger(name: string, value: NumericField | undefined): number {
  if (typeof value === "number" && Number.isSafeInteger(value)) return value;
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    const n = Number(value.trim());
    if (Number.isSafeInteger(n)) return n;
  }
  throw new ValidationError(`${name} must be a decimal integer`, { [name]: value });
}

const DECIMAL = /^-?\d+(\.\d+)?$/;

// Form fields arrive as strings; nested objects (the cut box) one level deep.
function coerceNumbers(params: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    if (typeof value === "string" && DECIMAL.test(value.trim())) out[key] = Number(value.trim());
    else if (typeof value === "object" && value !== null && !Array.isArray(value)) out[key] = coerceNumbers({ ...value });
    else out[key] = value;
  }
  return out;
}

function requireScope(scope: TextScope | undefined): TextScope {
  if (!scope) throw new ValidationError("scope is required");
  if (scope.kind === "document") return scope;
  if (scope.kind === "selector" && typeof scope.selector === "string" && scope.selector.trim() !== "") return scope;
  throw new ValidationError("scope must be a document or a non-empty selector", { scope });
}
