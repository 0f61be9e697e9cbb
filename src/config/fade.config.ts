import { LogLevel } from "@nestjs/common";
import { ConfigType, registerAs } from "@nestjs/config";
import { ITERATOR_DEFAULTS } from "../mp3-codec/consts";

/**
 * Error thrown when an environment setting holds an invalid value
 */
export class ConfigurationError extends Error {
  constructor(
    public readonly key: string,
    message: string,
  ) {
    super(message);
    this.name = "ConfigurationError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

/**
 * Log levels from least to most verbose
 */
const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "log", "debug", "verbose"];

const DEFAULT_READ_CHUNK_SIZE = 64 * 1024;
const DEFAULT_LOG_LEVEL: LogLevel = "log";

function positiveInteger(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === "") {
    return fallback;
  }
  if (!/^\d+$/.test(raw) || Number(raw) === 0 || !Number.isSafeInteger(Number(raw))) {
    throw new ConfigurationError(key, `${key} must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

/**
 * Every level up to and including the configured one
 */
export function logLevelsFor(level: string): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level);
  if (index === -1) {
    throw new ConfigurationError(
      "FADE_LOG_LEVEL",
      `FADE_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${level}"`,
    );
  }
  return LOG_LEVELS.slice(0, index + 1);
}

export function loadFadeSettings(env: NodeJS.ProcessEnv) {
  const logLevel = env.FADE_LOG_LEVEL?.trim() || DEFAULT_LOG_LEVEL;
  return {
    readChunkSize: positiveInteger(env, "FADE_READ_CHUNK_SIZE", DEFAULT_READ_CHUNK_SIZE),
    maxSyncBufferSize: positiveInteger(
      env,
      "FADE_MAX_SYNC_BUFFER",
      ITERATOR_DEFAULTS.MAX_SYNC_BUFFER_SIZE,
    ),
    logLevels: logLevelsFor(logLevel),
  };
}

export const fadeConfig = registerAs("fade", () => loadFadeSettings(process.env));

export type FadeConfig = ConfigType<typeof fadeConfig>;
