import { withDeadline } from "./async";
import { CapabilityError, ValidationError, WatermarkError } from "./errors";
import type { AttackParams, AttackSimulator, AttackType, DeadlineOptions, EmbedResult, MarkTransform, RatioBox } from "./types";
import { ATTACK_TYPES } from "./types";

/** Largest mark length `extract` accepts: a 128 KiB payload. */
export const MAX_BIT_LENGTH = 1 << 20;

export interface OrchestratorDeps {
  transform: MarkTransform;
  attacks: AttackSimulator;
  timeoutMs?: number;
  maxBitLength?: number;
}

/**
 * Drives the keyed image transform and the attack simulator.
 *
 * `embed` hands back the only copy of the mark's bit length; `extract` trusts
 * whatever length it is given. There is no checksum, so a wrong length yields
 * a wrong payload, not an error.
 */
export class InvisibleImageMarkOrchestrator {
  private readonly transform: MarkTransform;
  private readonly attacks: AttackSimulator;
  private readonly timeoutMs?: number;
  private readonly maxBitLength: number;

  constructor(deps: OrchestratorDeps) {
    if (!deps.transform) throw new ValidationError("a mark transform is required");
    if (!deps.attacks) throw new ValidationError("an attack simulator is required");
    this.transform = deps.transform;
    this.attacks = deps.attacks;
    this.timeoutMs = deps.timeoutMs;
    this.maxBitLength = deps.maxBitLength ?? MAX_BIT_LENGTH;
  }

  async embed(
    image: Buffer,
    payload: Uint8Array,
    keyImage: number,
    keyWatermark: number,
    options: DeadlineOptions = {},
  ): Promise<EmbedResult> {
    requireImage(image);
    if (payload.length === 0) throw new ValidationError("payload must not be empty");
    requireKey("keyImage", keyImage);
    requireKey("keyWatermark", keyWatermark);
    return this.delegate(
      "transform.embed",
      (signal) => this.transform.embed(image, payload, keyImage, keyWatermark, signal),
      options,
    );
  }

  async extract(
    image: Buffer,
    bitLength: number,
    keyImage: number,
    keyWatermark: number,
    options: DeadlineOptions = {},
  ): Promise<Uint8Array> {
    requireImage(image);
    if (!Number.isSafeInteger(bitLength) || bitLength <= 0) {
      throw new ValidationError("bitLength must be a positive integer", { bitLength });
    }
    if (bitLength > this.maxBitLength) {
      throw new ValidationError(`bitLength must be at most ${this.maxBitLength}`, { bitLength });
    }
    requireKey("keyImage", keyImage);
    requireKey("keyWatermark", keyWatermark);
    return this.delegate(
      "transform.extract",
      (signal) => this.transform.extract(image, bitLength, keyImage, keyWatermark, signal),
      options,
    );
  }

  async attack(image: Buffer, attackType: string, params: Record<string, unknown>, options: DeadlineOptions = {}): Promise<Buffer> {
    requireImage(image);
    const parsed = parseAttack(attackType, params);
    return this.delegate(`attacks.${parsed.type}`, (signal) => this.attacks.apply(image, parsed, signal), options);
  }

  private async delegate<T>(
    operation: string,
    work: (signal: AbortSignal) => Promise<T>,
    options: DeadlineOptions,
  ): Promise<T> {
    try {
      return await withDeadline(operation, work, { timeoutMs: options.timeoutMs ?? this.timeoutMs, signal: options.signal });
    } catch (err) {
      if (err instanceof WatermarkError && (err.kind === "timeout" || err.kind === "aborted")) throw err;
      throw new CapabilityError(operation, err);
    }
  }
}

function requireImage(image: Buffer): void {
  if (!Buffer.isBuffer(image) || image.length === 0) throw new ValidationError("image bytes are required");
}

function requireKey(name: string, value: number): void {
  if (!Number.isSafeInteger(value)) throw new ValidationError(`${name} must be an integer`, { [name]: value });
}

export function isAttackType(value: string): value is AttackType {
  return (ATTACK_TYPES as readonly string[]).includes(value);
}

/** Checks the attack type and the params it needs. */
export function parseAttack(attackType: string, params: Record<string, unknown>): AttackParams {
  if (!isAttackType(attackType)) {
    throw new ValidationError(`unsupported attack type: ${attackType}`, { attackType, supported: ATTACK_TYPES });
  }
  switch (attackType) {
    case "cut": {
      const box = ratioBox(params.box);
      const scale = optionalNumber(params, "scale", (v) => v > 0);
      return scale === undefined ? { type: "cut", box } : { type: "cut", box, scale };
    }
    case "resize":
      return {
        type: "resize",
        width: requiredNumber(params, "width", (v) => Number.isInteger(v) && v > 0),
        height: requiredNumber(params, "height", (v) => Number.isInteger(v) && v > 0),
      };
    case "bright":
      return { type: "bright", ratio: requiredNumber(params, "ratio", (v) => v >= 0) };
    case "shelter": {
      const ratio = requiredNumber(params, "ratio", (v) => v > 0 && v <= 1);
      const n = requiredNumber(params, "n", (v) => Number.isInteger(v) && v > 0);
      const seed = optionalNumber(params, "seed", Number.isInteger);
      return seed === undefined ? { type: "shelter", ratio, n } : { type: "shelter", ratio, n, seed };
    }
    case "salt_pepper": {
      const ratio = requiredNumber(params, "ratio", (v) => v >= 0 && v <= 1);
      const seed = optionalNumber(params, "seed", Number.isInteger);
      return seed === undefined ? { type: "salt_pepper", ratio } : { type: "salt_pepper", ratio, seed };
    }
    case "rot":
      return { type: "rot", angle: requiredNumber(params, "angle", () => true) };
  }
}

function requiredNumber(params: Record<string, unknown>, name: string, ok: (v: number) => boolean): number {
  const value = params[name];
  if (typeof value !== "number" || !Number.isFinite(value) || !ok(value)) {
    throw new ValidationError(`attack parameter ${name} is missing or invalid`, { [name]: value });
  }
  return value;
}

function optionalNumber(params: Record<string, unknown>, name: string, ok: (v: number) => boolean): number | undefined {
  return params[name] === undefined ? undefined : requiredNumber(params, name, ok);
}

function ratioBox(value: unknown): RatioBox {
  if (typeof value !== "object" || value === null) {
    throw new ValidationError("attack parameter box is missing or invalid", { box: value });
  }
  const raw: Record<string, unknown> = { ...value };
  const inUnit = (v: number) => v >= 0 && v <= 1;
  const box = {
    x1: requiredNumber(raw, "x1", inUnit),
    y1: requiredNumber(raw, "y1", inUnit),
    x2: requiredNumber(raw, "x2", inUnit),
    y2: requiredNumber(raw, "y2", inUnit),
  };
  if (box.x1 >= box.x2 || box.y1 >= box.y2) throw new ValidationError("attack box is empty", { box });
  return box;
}
