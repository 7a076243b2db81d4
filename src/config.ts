import { ValidationError } from "./errors";
import { isLogLevel, type LogLevel } from "./logger";

export interface ServiceConfig {
  outputDir: string;
  timeoutMs: number;
  logLevel: LogLevel;
  maxUploadBytes: number;
  defaultKeyImage: number;
  defaultKeyWatermark: number;
  /** Scale factors the crop estimator tries, for fragments resized after the cut. */
  matchScales: readonly number[];
  /** Stored outputs older than this are removed by cleanup. */
  artifactMaxAgeMs: number;
}

export const DEFAULT_CONFIG: ServiceConfig = {
  outputDir: "output",
  timeoutMs: 30_000,
  logLevel: "info",
  maxUploadBytes: 16 * 1024 * 1024,
  defaultKeyImage: 1,
  defaultKeyWatermark: 1,
  matchScales: [0.5, 0.75, 1, 1.5, 2],
  artifactMaxAgeMs: 24 * 60 * 60 * 1000,
};

/** Defaults, then WATERMARK_* environment variables, then explicit overrides. */
export function loadConfig(
  overrides: Partial<ServiceConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): ServiceConfig {
  const logLevel = env.WATERMARK_LOG_LEVEL;
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ValidationError(`WATERMARK_LOG_LEVEL must be one of debug, info, warn, error, silent`, { logLevel });
  }
  return {
    outputDir: overrides.outputDir ?? env.WATERMARK_OUTPUT_DIR ?? DEFAULT_CONFIG.outputDir,
    timeoutMs: overrides.timeoutMs ?? intFromEnv(env, "WATERMARK_TIMEOUT_MS", 1) ?? DEFAULT_CONFIG.timeoutMs,
    logLevel: overrides.logLevel ?? logLevel ?? DEFAULT_CONFIG.logLevel,
    maxUploadBytes:
      overrides.maxUploadBytes ?? intFromEnv(env, "WATERMARK_MAX_UPLOAD_BYTES", 1) ?? DEFAULT_CONFIG.maxUploadBytes,
    defaultKeyImage:
      overrides.defaultKeyImage ?? intFromEnv(env, "WATERMARK_DEFAULT_KEY_IMAGE") ?? DEFAULT_CONFIG.defaultKeyImage,
    defaultKeyWatermark:
      overrides.defaultKeyWatermark ??
      intFromEnv(env, "WATERMARK_DEFAULT_KEY_WATERMARK") ??
      DEFAULT_CONFIG.defaultKeyWatermark,
    matchScales: overrides.matchScales ?? scalesFromEnv(env, "WATERMARK_MATCH_SCALES") ?? DEFAULT_CONFIG.matchScales,
    artifactMaxAgeMs:
      overrides.artifactMaxAgeMs ??
      intFromEnv(env, "WATERMARK_ARTIFACT_MAX_AGE_MS", 1) ??
      DEFAULT_CONFIG.artifactMaxAgeMs,
  };
}

function intFromEnv(env: NodeJS.ProcessEnv, name: string, min?: number): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  if (!/^-?\d+$/.test(raw.trim())) throw new ValidationError(`${name} must be a decimal integer`, { [name]: raw });
  const value = Number(raw.trim());
  if (min !== undefined && value < min) throw new ValidationError(`${name} must be at least ${min}`, { [name]: raw });
  return value;
}

// comma separated positive decimals, e.g. "0.5,1,2"
function scalesFromEnv(env: NodeJS.ProcessEnv, name: string): number[] | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const parts = raw.split(",").map((p) => p.trim());
  if (!parts.every((p) => /^\d+(\.\d+)?$/.test(p) && Number(p) > 0)) {
    throw new ValidationError(`${name} must be a comma separated list of positive numbers`, { [name]: raw });
  }
  return parts.map(Number);
}
