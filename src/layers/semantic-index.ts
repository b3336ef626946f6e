/**
 * Semantic Index — nearest-neighbour lookup over question embeddings
 *
 * Linear cosine scan, single best match. Ties on the top score go to the
 * newest record (later answers may be corrections).
 */

import type { EmbeddingProvider, LookupResult, QuestionRecord } from "../types.js";
import { cosineSimilarity } from "../utils/embedding.js";
import { normalizeQuestion } from "../utils/normalize.js";
import { EmbeddingFailure, IndexInconsistency, getErrorMessage } from "../errors.js";

interface IndexEntry {
  record: QuestionRecord;
  seq: number; // insertion order, last tie-break
}

export class SemanticIndex {
  private entries: IndexEntry[] = [];
  private seq = 0;
  private dimension: number | null = null;
  private embedder: EmbeddingProvider;
  private queryCache = new Map<string, number[]>();
  private queryCacheSize: number;

  constructor(opts: { embedder: EmbeddingProvider; queryCacheSize?: number }) {
    this.embedder = opts.embedder;
    this.queryCacheSize = opts.queryCacheSize ?? 256;
  }

  get size(): number { return this.entries.length; }

  get dim(): number | null { return this.dimension; }

  ids(): string[] {
    return this.entries.map(e => e.record.id);
  }

  records(): QuestionRecord[] {
    return this.entries.map(e => e.record);
  }

  /**
   * Embed a question through the provider, memoized by normalized text.
   * Anything the provider throws becomes an EmbeddingFailure.
   */
  async embed(question: string): Promise<number[]> {
    const key = normalizeQuestion(question);
    const cached = this.queryCache.get(key);
    if (cached) {
      // refresh LRU position
      this.queryCache.delete(key);
      this.queryCache.set(key, cached);
      return cached;
    }

    let vector: number[];
    try {
      vector = await this.embedder.embed(key);
    } catch (err) {
      if (err instanceof EmbeddingFailure) throw err;
      throw new EmbeddingFailure(`Embedding provider error: ${getErrorMessage(err)}`, err);
    }
    if (vector.length === 0 || !vector.every(Number.isFinite)) {
      throw new EmbeddingFailure(`Embedding provider returned an invalid vector for "${key.slice(0, 20)}"`);
    }

    if (this.queryCacheSize > 0) {
      this.queryCache.set(key, vector);
      if (this.queryCache.size > this.queryCacheSize) {
        const oldest = this.queryCache.keys().next().value;
        if (oldest !== undefined) this.queryCache.delete(oldest);
      }
    }
    return vector;
  }

  async lookup(question: string, threshold: number): Promise<LookupResult> {
    if (this.entries.length === 0) return miss();
    if (normalizeQuestion(question).length === 0) return miss();

    const vector = await this.embed(question);
    return this.search(vector, threshold);
  }

  /** Synchronous scan, so a lookup always sees a whole insert or none of it */
  search(vector: number[], threshold: number): LookupResult {
    let best: IndexEntry | null = null;
    let bestScore = -Infinity;

    for (const entry of this.entries) {
      const score = cosineSimilarity(vector, entry.record.embedding);
      if (score > bestScore || (best && score === bestScore && isNewer(entry, best))) {
        best = entry;
        bestScore = score;
      }
    }

    if (!best) return miss();
    const similarity = Math.min(1, Math.max(0, bestScore));
    if (similarity >= threshold) {
      return { hit: true, record: best.record, similarity };
    }
    return { hit: false, similarity };
  }

  insert(record: QuestionRecord): void {
    const dim = record.embedding.length;
    if (dim === 0) {
      throw new IndexInconsistency(`Record ${record.id} has an empty embedding`);
    }
    if (this.dimension !== null && dim !== this.dimension) {
      throw new IndexInconsistency(
        `Record ${record.id} has dimension ${dim}, index has ${this.dimension}`
      );
    }
    if (this.entries.some(e => e.record.id === record.id)) {
      throw new IndexInconsistency(`Record ${record.id} is already indexed`);
    }
    this.dimension = dim;
    this.entries.push({ record, seq: this.seq++ });
  }

  remove(ids: Iterable<string>): number {
    const drop = new Set(ids);
    const before = this.entries.length;
    this.entries = this.entries.filter(e => !drop.has(e.record.id));
    if (this.entries.length === 0) this.dimension = null;
    return before - this.entries.length;
  }

  clear(): void {
    this.entries = [];
    this.dimension = null;
  }
}

function miss(): LookupResult {
  return { hit: false, similarity: 0 };
}

function isNewer(a: IndexEntry, b: IndexEntry): boolean {
  if (a.record.created_at !== b.record.created_at) {
    return a.record.created_at > b.record.created_at;
  }
  return a.seq > b.seq;
}
