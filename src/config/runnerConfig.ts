/**
 * Runner configuration from the environment
 *
 * Every variable is optional and falls back to the defaults in
 * @/constants. A value that is present but invalid is an error: the
 * runner refuses to start rather than guess.
 */

import type { LogLevel, RunMode, RunnerConfig } from "@/types";
import {
  DEFAULT_CRAWL_CONCURRENCY,
  DEFAULT_CYCLE_INTERVAL_MS,
  DEFAULT_DB_PATH,
  DEFAULT_LOG_LEVEL,
  DEFAULT_OWNERS_FILE,
  DEFAULT_OWNER_TIMEOUT_MS,
  DEFAULT_RUN_MODE,
} from "@/constants";
import { isLogLevel } from "@/logger";

export type ConfigEnv = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(
    public readonly variable: string,
    message: string,
  ) {
    super(`Invalid configuration: ${variable} ${message}`);
    this.name = "ConfigError";
  }
}

const RUN_MODES: readonly RunMode[] = ["once", "forever"];

function isRunMode(value: string): value is RunMode {
  return RUN_MODES.some((mode) => mode === value);
}

/**
 * Trimmed value, or undefined when unset or blank
 */
function readRaw(env: ConfigEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readString(env: ConfigEnv, name: string, fallback: string): string {
  return readRaw(env, name) ?? fallback;
}

function readPositiveInt(env: ConfigEnv, name: string, fallback: number): number {
  const raw = readRaw(env, name);
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigError(name, `must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

function readRunMode(env: ConfigEnv): RunMode {
  const raw = readRaw(env, "RUN_MODE")?.toLowerCase();
  if (raw === undefined) {
    return DEFAULT_RUN_MODE;
  }
  if (!isRunMode(raw)) {
    throw new ConfigError("RUN_MODE", `must be one of ${RUN_MODES.join(", ")}, got "${raw}"`);
  }
  return raw;
}

function readLogLevel(env: ConfigEnv): LogLevel {
  const raw = readRaw(env, "LOG_LEVEL")?.toLowerCase();
  if (raw === undefined) {
    return DEFAULT_LOG_LEVEL;
  }
  if (!isLogLevel(raw)) {
    throw new ConfigError("LOG_LEVEL", `must be one of debug, info, warn, error, got "${raw}"`);
  }
  return raw;
}

/**
 * Read and validate the runner configuration
 *
 * @throws {ConfigError} Naming the first invalid variable
 */
export function loadRunnerConfig(env: ConfigEnv = process.env): RunnerConfig {
  return {
    runMode: readRunMode(env),
    logLevel: readLogLevel(env),
    dbPath: readString(env, "DB_PATH", DEFAULT_DB_PATH),
    ownersFile: readString(env, "OWNERS_FILE", DEFAULT_OWNERS_FILE),
    crawlConcurrency: readPositiveInt(env, "CRAWL_CONCURRENCY", DEFAULT_CRAWL_CONCURRENCY),
    ownerTimeoutMs: readPositiveInt(env, "OWNER_TIMEOUT_MS", DEFAULT_OWNER_TIMEOUT_MS),
    cycleIntervalMs: readPositiveInt(env, "CYCLE_INTERVAL_MS", DEFAULT_CYCLE_INTERVAL_MS),
  };
}
