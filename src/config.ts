import { homedir } from "node:os";
import { join } from "node:path";
import type { CacheConfig } from "./types.js";
import { DEFAULT_CONFIG } from "./types.js";
import { CacheConfigError } from "./errors.js";

type Env = Record<string, string | undefined>;

/**
 * Defaults, then explicit values, then environment fallbacks for anything
 * still unset.
 */
export function resolveConfig(partial: Partial<CacheConfig> = {}, env: Env = process.env): CacheConfig {
  const config: CacheConfig = { ...DEFAULT_CONFIG, ...partial };

  if (partial.enabled === undefined && env.INSTANT_CACHE_ENABLED !== undefined) {
    config.enabled = !["0", "false", "off", "no"].includes(env.INSTANT_CACHE_ENABLED.trim().toLowerCase());
  }
  if (partial.threshold === undefined && env.INSTANT_CACHE_THRESHOLD) {
    config.threshold = parseNumber("INSTANT_CACHE_THRESHOLD", env.INSTANT_CACHE_THRESHOLD);
  }
  if (partial.maxEntries === undefined && env.INSTANT_CACHE_MAX_ENTRIES) {
    config.maxEntries = parseNumber("INSTANT_CACHE_MAX_ENTRIES", env.INSTANT_CACHE_MAX_ENTRIES);
  }
  if (partial.workerConcurrency === undefined && env.INSTANT_CACHE_CONCURRENCY) {
    config.workerConcurrency = parseNumber("INSTANT_CACHE_CONCURRENCY", env.INSTANT_CACHE_CONCURRENCY);
  }
  if (!config.storePath) {
    config.storePath = env.INSTANT_CACHE_PATH || join(env.HOME || homedir(), ".instant-answer", "answers.jsonl");
  }
  if (!config.jinaApiKey) {
    config.jinaApiKey = env.JINA_API_KEY || "";
  }
  if (!partial.jinaModel && env.JINA_MODEL) {
    config.jinaModel = env.JINA_MODEL;
  }

  validateConfig(config);
  return config;
}

export function validateConfig(config: CacheConfig): void {
  if (!(config.threshold >= 0 && config.threshold <= 1)) {
    throw new CacheConfigError(`threshold must be within [0, 1], got ${config.threshold}`);
  }
  for (const key of ["maxEntries", "queryEmbeddingCacheSize", "embedTimeoutMs"] as const) {
    if (!Number.isInteger(config[key]) || config[key] < 0) {
      throw new CacheConfigError(`${key} must be a non-negative integer, got ${config[key]}`);
    }
  }
  if (!Number.isInteger(config.workerConcurrency) || config.workerConcurrency < 1) {
    throw new CacheConfigError(`workerConcurrency must be at least 1, got ${config.workerConcurrency}`);
  }
}

function parseNumber(name: string, value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new CacheConfigError(`${name} is not a number: "${value}"`);
  }
  return n;
}
