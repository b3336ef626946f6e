/**
 * Instant Answer Cache — Type Definitions
 * Semantic index over answered questions + durable answer store
 */

// --- Records ---

export interface QuestionRecord {
  id: string;
  question: string;       // as asked
  normalized: string;     // normalizeQuestion(question)
  embedding: number[];
  answer: string;
  audio: string;          // audio reference: file path or blob key
  created_at: number;     // ms, from the injected clock
}

export interface LookupResult {
  hit: boolean;
  record?: QuestionRecord;
  similarity: number;     // 0..1, best score seen even on a miss
}

// --- Collaborators ---

export interface EmbeddingProvider {
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

export type Clock = () => number;

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Inference + speech synthesis, supplied by the orchestration layer */
export interface Answerer {
  answer(question: string): Promise<AnsweredQuestion>;
}

export interface AnsweredQuestion {
  answer: string;
  audio: string;
  emotion?: string;
}

// --- Stats ---

export interface CacheStats {
  entries: number;
  dimension: number | null;
  storePath: string;
  quarantined: number;
  hits: number;
  misses: number;
  evicted: number;
}

// --- Config ---

export interface CacheConfig {
  enabled: boolean;
  threshold: number;
  storePath: string;
  maxEntries: number;             // 0 = unbounded
  queryEmbeddingCacheSize: number;
  workerConcurrency: number;
  jinaApiKey: string;
  jinaModel: string;
  embedTimeoutMs: number;
}

export const DEFAULT_CONFIG: CacheConfig = {
  enabled: true,
  threshold: 0.85,
  storePath: "",
  maxEntries: 0,
  queryEmbeddingCacheSize: 256,
  workerConcurrency: 3,
  jinaApiKey: "",
  jinaModel: "jina-embeddings-v3",
  embedTimeoutMs: 10_000,
};
