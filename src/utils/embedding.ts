/**
 * Jina Embedding Utility
 * Question vectorization for the semantic index
 */

import { z } from "zod";
import type { EmbeddingProvider } from "../types.js";
import { EmbeddingFailure, getErrorMessage } from "../errors.js";

const JINA_API_URL = "https://api.jina.ai/v1/embeddings";

const jinaResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

export interface JinaEmbeddingOptions {
  apiKey: string;
  model?: string;
  task?: string;
  timeoutMs?: number;
  url?: string;
}

export class JinaEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private apiKey: string;
  private task: string;
  private timeoutMs: number;
  private url: string;

  constructor(opts: JinaEmbeddingOptions) {
    this.apiKey = opts.apiKey;
    this.model = opts.model || "jina-embeddings-v3";
    this.task = opts.task || "text-matching";
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.url = opts.url || JINA_API_URL;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    let resp: Response;
    try {
      resp = await fetch(this.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({ model: this.model, input: texts, task: this.task }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new EmbeddingFailure(`Jina embed request failed: ${getErrorMessage(err)}`, err);
    }

    if (!resp.ok) {
      throw new EmbeddingFailure(`Jina embed failed: ${resp.status} ${await resp.text()}`);
    }

    const parsed = jinaResponseSchema.safeParse(await resp.json());
    if (!parsed.success || parsed.data.data.length !== texts.length) {
      throw new EmbeddingFailure("Jina embed returned an unexpected payload");
    }
    return parsed.data.data.map((d) => d.embedding);
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;
  let dot = 0, normA = 0, normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

export function generateId(): string {
  return `${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}
