/**
 * Instant Answer Cache — composes the semantic index and the answer store
 *
 * cacheLookup: before inference. Never throws; any failure is a miss.
 * cacheStore:  after a successful inference + synthesis cycle. Store and
 *              index are updated together or not at all.
 */

import type { CacheConfig, CacheStats, Clock, EmbeddingProvider, Logger, LookupResult, QuestionRecord } from "../types.js";
import { DEFAULT_CONFIG } from "../types.js";
import { SemanticIndex } from "./semantic-index.js";
import { AnswerStore, freezeRecord } from "./answer-store.js";
import type { RecordExtras } from "./answer-store.js";
import { generateId } from "../utils/embedding.js";
import { isDegenerateQuestion, normalizeQuestion } from "../utils/normalize.js";
import { silentLogger } from "../utils/logger.js";
import { EmbeddingFailure, IndexInconsistency, getErrorMessage } from "../errors.js";

export interface InstantAnswerCacheOptions {
  config?: Partial<CacheConfig>;
  embedder: EmbeddingProvider;
  store?: AnswerStore;
  clock?: Clock;
  logger?: Logger;
}

export class InstantAnswerCache {
  private config: CacheConfig;
  private index: SemanticIndex;
  private store: AnswerStore;
  private clock: Clock;
  private logger: Logger;
  private initialized = false;
  private hits = 0;
  private misses = 0;
  private evicted = 0;

  constructor(opts: InstantAnswerCacheOptions) {
    this.config = { ...DEFAULT_CONFIG, ...opts.config };
    this.logger = opts.logger || silentLogger;
    this.clock = opts.clock || Date.now;
    this.index = new SemanticIndex({
      embedder: opts.embedder,
      queryCacheSize: this.config.queryEmbeddingCacheSize,
    });
    this.store = opts.store || new AnswerStore({ path: this.config.storePath, logger: this.logger });
  }

  get enabled(): boolean { return this.config.enabled; }

  get threshold(): number { return this.config.threshold; }

  get workerConcurrency(): number { return this.config.workerConcurrency; }

  get size(): number { return this.index.size; }

  /** Load the store once and build the index from it */
  async init(): Promise<void> {
    if (this.initialized) return;

    let records: QuestionRecord[];
    try {
      records = await this.store.loadAll();
    } catch (err) {
      this.logger.error(`[instant-cache] Store load failed, starting empty in append-only mode: ${getErrorMessage(err)}`);
      records = [];
    }

    const mismatched = findDimensionOutliers(records);
    if (mismatched.length > 0) {
      this.logger.warn(
        `[instant-cache] ${mismatched.length} records have a foreign embedding dimension, dropping them`
      );
      await this.removeFromStore(mismatched.map(r => r.id));
    }

    this.rebuild();
    this.verifyIndex();
    await this.evictIfNeeded();

    this.initialized = true;
    this.logger.info(
      `[instant-cache] Ready: ${this.index.size} answers, dim=${this.index.dim ?? "-"}, threshold=${this.config.threshold}`
    );
  }

  /**
   * Cross-check index against store by id. The store is the source of
   * truth; any divergence triggers a full rebuild.
   */
  verifyIndex(): boolean {
    const indexed = new Set(this.index.ids());
    const stored = this.store.all();
    const consistent = indexed.size === stored.length && stored.every(r => indexed.has(r.id));
    if (!consistent) {
      const err = new IndexInconsistency(
        `index has ${indexed.size} entries, store has ${stored.length}`
      );
      this.logger.warn(`[instant-cache] ${err.message}, rebuilding`);
      this.rebuild();
    }
    return consistent;
  }

  async cacheLookup(question: string): Promise<LookupResult> {
    if (!this.config.enabled || isDegenerateQuestion(question)) {
      this.misses++;
      return { hit: false, similarity: 0 };
    }

    let result: LookupResult;
    try {
      result = await this.index.lookup(question, this.config.threshold);
    } catch (err) {
      const kind = err instanceof EmbeddingFailure ? "Embedding failure" : "Lookup error";
      this.logger.warn(`[instant-cache] ${kind}, treating as miss: ${getErrorMessage(err)}`);
      result = { hit: false, similarity: 0 };
    }

    if (result.hit) {
      this.hits++;
      this.logger.info(
        `[instant-cache] HIT ${result.similarity.toFixed(3)} "${question.slice(0, 20)}" → ${result.record?.id}`
      );
    } else {
      this.misses++;
    }
    return result;
  }

  /**
   * Record a finished answer. Throws EmbeddingFailure, StorageWriteFailure
   * or IndexInconsistency; the caller still delivers its answer.
   */
  async cacheStore(
    question: string,
    answer: string,
    audio: string,
    extras: RecordExtras = {}
  ): Promise<QuestionRecord> {
    if (isDegenerateQuestion(question)) {
      throw new RangeError("Cannot cache an empty question");
    }
    if (answer.trim() === "") {
      throw new RangeError("Cannot cache an empty answer");
    }

    const embedding = await this.index.embed(question);
    const record = freezeRecord({
      id: generateId(),
      question,
      normalized: normalizeQuestion(question),
      embedding: [...embedding],
      answer,
      audio,
      created_at: this.clock(),
    });

    await this.store.append(record, extras);

    try {
      this.index.insert(record);
    } catch (err) {
      await this.removeFromStore([record.id]);
      throw err instanceof IndexInconsistency
        ? err
        : new IndexInconsistency(`Index insert failed: ${getErrorMessage(err)}`, err);
    }

    this.logger.info(`[instant-cache] Stored ${record.id} "${question.slice(0, 20)}" (${this.index.size} total)`);
    await this.evictIfNeeded();
    return record;
  }

  get(id: string): QuestionRecord | undefined {
    return this.store.get(id);
  }

  /** Stored records sharing this normalized question, oldest first */
  findExact(question: string): QuestionRecord[] {
    const key = normalizeQuestion(question);
    return this.store.all().filter(r => r.normalized === key);
  }

  stats(): CacheStats {
    return {
      entries: this.index.size,
      dimension: this.index.dim,
      storePath: this.store.path,
      quarantined: this.store.quarantined,
      hits: this.hits,
      misses: this.misses,
      evicted: this.evicted,
    };
  }

  private rebuild(): void {
    this.index.clear();
    for (const record of this.store.all()) {
      this.index.insert(record);
    }
  }

  private async evictIfNeeded(): Promise<void> {
    const max = this.config.maxEntries;
    if (max <= 0 || this.index.size <= max) return;

    // victims come from the index: store removals may still be queued
    const oldest = this.index.records()
      .sort((a, b) => a.created_at - b.created_at)
      .slice(0, this.index.size - max)
      .map(r => r.id);

    const removed = this.index.remove(oldest);
    this.evicted += removed;
    this.logger.info(`[instant-cache] Evicted ${removed} oldest answers (max ${max})`);
    await this.removeFromStore(oldest);
  }

  // Memory is always updated; a failed rewrite is retried by the next write
  private async removeFromStore(ids: string[]): Promise<void> {
    try {
      await this.store.remove(ids);
    } catch (err) {
      this.logger.error(`[instant-cache] Store rewrite failed, will retry on next write: ${getErrorMessage(err)}`);
    }
  }
}

function findDimensionOutliers(records: QuestionRecord[]): QuestionRecord[] {
  if (records.length === 0) return [];
  const counts = new Map<number, number>();
  for (const r of records) {
    counts.set(r.embedding.length, (counts.get(r.embedding.length) || 0) + 1);
  }
  const [majority] = [...counts.entries()].sort((a, b) => b[1] - a[1])[0];
  return records.filter(r => r.embedding.length !== majority);
}
