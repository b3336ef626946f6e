import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { EmbeddingProvider, QuestionRecord } from "../types.js";

/** Deterministic embedder: vectors looked up by normalized text */
export class TableEmbedder implements EmbeddingProvider {
  readonly model = "test-embed";
  calls: string[] = [];
  failing = false;

  constructor(private table: Record<string, number[]> = {}) {}

  set(text: string, vector: number[]): void {
    this.table[text] = vector;
  }

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failing) throw new Error("provider offline");
    const vector = this.table[text];
    if (!vector) throw new Error(`no test vector for "${text}"`);
    return vector;
  }
}

export function oneHot(i: number, dim = 16): number[] {
  const v = new Array<number>(dim).fill(0);
  v[i % dim] = 1;
  return v;
}

export function makeRecord(i: number, overrides: Partial<QuestionRecord> = {}): QuestionRecord {
  return {
    id: `r${i}`,
    question: `q${i}`,
    normalized: `q${i}`,
    embedding: oneHot(i),
    answer: `answer ${i}`,
    audio: `a${i}.mp3`,
    created_at: 1000 + i,
    ...overrides,
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "instant-cache-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Clock that advances one millisecond per call */
export function tickingClock(start = 1_700_000_000_000): () => number {
  let now = start;
  return () => now++;
}
