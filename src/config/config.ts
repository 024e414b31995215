import { createLogger, isLogLevel, type LogLevel, type Logger } from "./logger.js";

export const DEFAULT_STEP_BOUND = 1_000_000;
export const DEFAULT_MAX_CALL_DEPTH = 1_000;
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export interface HarnessConfig {
  /** Instructions a thread may execute before it stops unfinished. */
  stepBound: number;
  /** Frames a thread may hold before a call traps. */
  maxCallDepth: number;
  logLevel: LogLevel;
  logger: Logger;
}

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, name: string, fallback: number, warnings: string[]): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    warnings.push(`${name}=${raw} is not a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

interface EnvSettings {
  stepBound: number;
  maxCallDepth: number;
  logLevel: LogLevel;
  warnings: string[];
}

function readEnv(env: Env): EnvSettings {
  const warnings: string[] = [];
  const stepBound = positiveInt(env, "WASM_HARNESS_STEP_BOUND", DEFAULT_STEP_BOUND, warnings);
  const maxCallDepth = positiveInt(env, "WASM_HARNESS_MAX_CALL_DEPTH", DEFAULT_MAX_CALL_DEPTH, warnings);

  let logLevel = DEFAULT_LOG_LEVEL;
  const rawLevel = env.WASM_HARNESS_LOG_LEVEL?.trim().toLowerCase();
  if (rawLevel) {
    if (isLogLevel(rawLevel)) {
      logLevel = rawLevel;
    } else {
      warnings.push(`WASM_HARNESS_LOG_LEVEL=${rawLevel} is not a log level, using ${DEFAULT_LOG_LEVEL}`);
    }
  }
  return { stepBound, maxCallDepth, logLevel, warnings };
}

/**
 * Read configuration from the environment:
 * WASM_HARNESS_STEP_BOUND, WASM_HARNESS_MAX_CALL_DEPTH, WASM_HARNESS_LOG_LEVEL.
 */
export function loadConfig(env: Env = process.env): HarnessConfig {
  return resolveConfig({}, env);
}

/**
 * Environment configuration with explicit overrides applied on top.
 * Warnings about bad environment values go to the resolved logger.
 */
export function resolveConfig(overrides: Partial<HarnessConfig> = {}, env: Env = process.env): HarnessConfig {
  const base = readEnv(env);
  const logLevel = overrides.logLevel ?? base.logLevel;
  const logger = overrides.logger ?? createLogger(logLevel);
  for (const w of base.warnings) logger.warn(w);
  return {
    stepBound: overrides.stepBound ?? base.stepBound,
    maxCallDepth: overrides.maxCallDepth ?? base.maxCallDepth,
    logLevel,
    logger,
  };
}
