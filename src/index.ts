/**
 * Instant Answer Cache — entry point
 *
 * One cache per process, built here and handed to both call sites:
 *   orchestration → cacheLookup(question) before inference
 *   orchestration → cacheStore(question, answer, audio) after synthesis
 */

import type { Answerer, CacheConfig, Clock, EmbeddingProvider, Logger } from "./types.js";
import { resolveConfig } from "./config.js";
import { InstantAnswerCache } from "./layers/instant-answer-cache.js";
import { AnswerWorker } from "./layers/answer-worker.js";
import { JinaEmbeddingProvider } from "./utils/embedding.js";
import { consoleLogger } from "./utils/logger.js";
import { CacheConfigError } from "./errors.js";

export interface CreateCacheDeps {
  embedder?: EmbeddingProvider;
  logger?: Logger;
  clock?: Clock;
  env?: Record<string, string | undefined>;
}

export async function createInstantAnswerCache(
  partial: Partial<CacheConfig> = {},
  deps: CreateCacheDeps = {}
): Promise<InstantAnswerCache> {
  const config = resolveConfig(partial, deps.env);
  const logger = deps.logger || consoleLogger;

  let embedder = deps.embedder;
  if (!embedder) {
    if (!config.jinaApiKey) {
      throw new CacheConfigError("No embedding provider: pass one or set JINA_API_KEY");
    }
    embedder = new JinaEmbeddingProvider({
      apiKey: config.jinaApiKey,
      model: config.jinaModel,
      timeoutMs: config.embedTimeoutMs,
    });
  }

  const cache = new InstantAnswerCache({ config, embedder, clock: deps.clock, logger });
  await cache.init();
  return cache;
}

export function createAnswerWorker(
  cache: InstantAnswerCache,
  answerer: Answerer,
  opts: { concurrency?: number; logger?: Logger } = {}
): AnswerWorker {
  return new AnswerWorker({
    cache,
    answerer,
    concurrency: opts.concurrency ?? cache.workerConcurrency,
    logger: opts.logger || consoleLogger,
  });
}

export * from "./types.js";
export * from "./errors.js";
export { resolveConfig, validateConfig } from "./config.js";
export { InstantAnswerCache } from "./layers/instant-answer-cache.js";
export type { InstantAnswerCacheOptions } from "./layers/instant-answer-cache.js";
export { SemanticIndex } from "./layers/semantic-index.js";
export { AnswerStore } from "./layers/answer-store.js";
export type { RecordExtras } from "./layers/answer-store.js";
export { AnswerWorker, Semaphore } from "./layers/answer-worker.js";
export type { AnswerDelivery, PollResult, TicketStatus } from "./layers/answer-worker.js";
export { importLegacyCache } from "./layers/legacy-import.js";
export type { LegacyImportResult } from "./layers/legacy-import.js";
export { JinaEmbeddingProvider, cosineSimilarity } from "./utils/embedding.js";
export { normalizeQuestion, isDegenerateQuestion } from "./utils/normalize.js";
export { consoleLogger, silentLogger } from "./utils/logger.js";
