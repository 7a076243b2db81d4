export type WatermarkErrorKind = "validation" | "capability" | "no_match" | "timeout" | "aborted";

export class WatermarkError extends Error {
  readonly kind: WatermarkErrorKind;
  readonly details: Record<string, unknown>;

  constructor(
    kind: WatermarkErrorKind,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "WatermarkError";
    this.kind = kind;
    this.details = details;
  }
}

/** Missing or malformed input. Always raised before any capability is called. */
export class ValidationError extends WatermarkError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("validation", message, details);
    this.name = "ValidationError";
  }
}

/** A transform, matcher or attack collaborator failed. Never retried. */
export class CapabilityError extends WatermarkError {
  readonly capability: string;

  constructor(capability: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("capability", `${capability} failed: ${detail}`, { capability }, { cause });
    this.name = "CapabilityError";
    this.capability = capability;
  }
}

export class NoMatchError extends WatermarkError {
  readonly score: number;
  readonly floor: number;

  constructor(score: number, floor: number) {
    super("no_match", `best template score ${score.toFixed(4)} is below confidence floor ${floor}`, {
      score,
      floor,
    });
    this.name = "NoMatchError";
    this.score = score;
    this.floor = floor;
  }
}

export class TimeoutError extends WatermarkError {
  constructor(operation: string, timeoutMs: number) {
    super("timeout", `${operation} timed out after ${timeoutMs}ms`, { operation, timeoutMs });
    this.name = "TimeoutError";
  }
}

export class AbortedError extends WatermarkError {
  constructor(operation: string) {
    super("aborted", `${operation} was aborted`, { operation });
    this.name = "AbortedError";
  }
}

export interface ErrorResponse {
  error: {
    kind: WatermarkErrorKind | "internal";
    message: string;
    details?: Record<string, unknown>;
  };
}

export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof WatermarkError) {
    return { error: { kind: err.kind, message: err.message, details: err.details } };
  }
  return { error: { kind: "internal", message: err instanceof Error ? err.message : String(err) } };
}
