/**
 * Answer Store — durable question → answer → audio records
 *
 * One JSON object per line (answers.jsonl). Operators may edit the file by
 * hand: unknown fields survive rewrites, and lines that fail to parse are
 * skipped on load but written back verbatim.
 */

import { appendFile, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { Logger, QuestionRecord } from "../types.js";
import { StorageCorruption, StorageWriteFailure, getErrorMessage } from "../errors.js";
import { normalizeQuestion } from "../utils/normalize.js";
import { silentLogger } from "../utils/logger.js";

const recordSchema = z.object({
  id: z.string().min(1),
  question: z.string().min(1),
  normalized: z.string().optional(),
  embedding: z.array(z.number().finite()).min(1),
  answer: z.string(),
  audio: z.string(),
  created_at: z.number().finite(),
}).passthrough();

const KNOWN_FIELDS = new Set(Object.keys(recordSchema.shape));

export type RecordExtras = Record<string, unknown>;

type StoredRow =
  | { kind: "record"; record: QuestionRecord; extras: RecordExtras }
  | { kind: "raw"; text: string };

export class AnswerStore {
  readonly path: string;
  private logger: Logger;
  private rows: StoredRow[] = [];
  private byId = new Map<string, { record: QuestionRecord; extras: RecordExtras }>();
  private chain: Promise<unknown> = Promise.resolve();
  // file may not end with "\n"; unknown until loaded
  private unterminated = true;
  // false until loadAll has read the file: rewrites would drop what is on disk
  private loaded = false;
  // last rewrite failed: disk is behind memory until the next successful rewrite
  private dirty = false;

  constructor(opts: { path: string; logger?: Logger }) {
    this.path = opts.path;
    this.logger = opts.logger || silentLogger;
  }

  get size(): number { return this.byId.size; }

  get quarantined(): number {
    return this.rows.filter(r => r.kind === "raw").length;
  }

  get(id: string): QuestionRecord | undefined {
    return this.byId.get(id)?.record;
  }

  extrasOf(id: string): RecordExtras | undefined {
    const entry = this.byId.get(id);
    return entry ? { ...entry.extras } : undefined;
  }

  all(): QuestionRecord[] {
    const out: QuestionRecord[] = [];
    for (const row of this.rows) {
      if (row.kind === "record") out.push(row.record);
    }
    return out;
  }

  /** Read the whole file once. Corrupt lines are skipped and logged. */
  async loadAll(): Promise<QuestionRecord[]> {
    return this.enqueue(async () => {
      this.rows = [];
      this.byId.clear();
      this.loaded = false;
      this.unterminated = true;
      this.dirty = false;

      let content: string;
      try {
        content = await readFile(this.path, "utf-8");
      } catch (err) {
        if (isNotFound(err)) {
          this.logger.info(`[answer-store] No store at ${this.path}, starting empty`);
          this.loaded = true;
          this.unterminated = false;
          return [];
        }
        throw new StorageCorruption(`Cannot read ${this.path}: ${getErrorMessage(err)}`, 0, err);
      }

      if (content.charCodeAt(0) === 0xfeff) content = content.slice(1);
      this.unterminated = content.length > 0 && !content.endsWith("\n");
      this.loaded = true;

      const lines = content.split(/\r?\n/);
      for (let i = 0; i < lines.length; i++) {
        const text = lines[i];
        if (text.trim() === "") continue;
        try {
          const row = parseLine(text, i + 1);
          if (this.byId.has(row.record.id)) {
            throw new StorageCorruption(`duplicate id ${row.record.id}`, i + 1);
          }
          this.rows.push(row);
          this.byId.set(row.record.id, row);
        } catch (err) {
          this.logger.warn(`[answer-store] Skipping unreadable line ${i + 1}: ${getErrorMessage(err)}`);
          this.rows.push({ kind: "raw", text });
        }
      }

      this.logger.info(
        `[answer-store] Loaded ${this.byId.size} records from ${this.path}` +
        (this.quarantined > 0 ? ` (${this.quarantined} unreadable)` : "")
      );
      return this.all();
    });
  }

  /**
   * Persist one record. Resolves only once the line is on disk. Before a
   * successful load this only ever appends.
   */
  async append(record: QuestionRecord, extras: RecordExtras = {}): Promise<void> {
    return this.enqueue(async () => {
      const row: StoredRow = { kind: "record", record, extras: stripKnown(extras) };
      if (this.dirty) {
        // disk missed an earlier rewrite; write the full state instead
        await this.writeAll([...this.rows, row]);
      } else {
        const prefix = this.unterminated ? "\n" : "";
        try {
          await mkdir(dirname(this.path), { recursive: true });
          await appendFile(this.path, prefix + serializeRow(row) + "\n", "utf-8");
        } catch (err) {
          // a partial line may be left behind
          this.unterminated = true;
          throw new StorageWriteFailure(`Append to ${this.path} failed: ${getErrorMessage(err)}`, err);
        }
        this.unterminated = false;
      }
      this.rows.push(row);
      this.byId.set(record.id, row);
    });
  }

  /**
   * Drop records and rewrite the file. Memory is updated even if the rewrite
   * fails; the next write then retries the full rewrite.
   */
  async remove(ids: Iterable<string>): Promise<number> {
    const drop = new Set(ids);
    return this.enqueue(async () => {
      const before = this.byId.size;
      this.rows = this.rows.filter(r => r.kind === "raw" || !drop.has(r.record.id));
      for (const id of drop) this.byId.delete(id);
      const removed = before - this.byId.size;
      if (!this.loaded) throw this.notLoaded();
      if (removed > 0 || this.dirty) {
        this.dirty = true;
        await this.writeAll(this.rows);
      }
      return removed;
    });
  }

  /** Write current memory state through a temp file + rename */
  async rewrite(): Promise<void> {
    return this.enqueue(async () => {
      if (!this.loaded) throw this.notLoaded();
      await this.writeAll(this.rows);
    });
  }

  private notLoaded(): StorageWriteFailure {
    return new StorageWriteFailure(`Refusing to rewrite ${this.path}: it was never loaded`);
  }

  private async writeAll(rows: StoredRow[]): Promise<void> {
    const tmp = `${this.path}.${process.pid}.tmp`;
    const body = rows.map(r => (r.kind === "raw" ? r.text : serializeRow(r)) + "\n").join("");
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tmp, body, "utf-8");
      await rename(tmp, this.path);
    } catch (err) {
      this.dirty = true;
      throw new StorageWriteFailure(`Rewrite of ${this.path} failed: ${getErrorMessage(err)}`, err);
    }
    this.dirty = false;
    this.unterminated = false;
  }

  // Serializes file access; errors surface through the returned promise
  private enqueue<T>(op: () => Promise<T>): Promise<T> {
    const run = this.chain.then(op, op);
    this.chain = run.then(() => undefined, () => undefined);
    return run;
  }
}

function parseLine(text: string, line: number): { kind: "record"; record: QuestionRecord; extras: RecordExtras } {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new StorageCorruption(`malformed JSON`, line, err);
  }
  const parsed = recordSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new StorageCorruption(`${issue.path.join(".") || "record"}: ${issue.message}`, line, parsed.error);
  }
  const data = parsed.data;
  const record: QuestionRecord = freezeRecord({
    id: data.id,
    question: data.question,
    normalized: data.normalized ?? normalizeQuestion(data.question),
    embedding: data.embedding,
    answer: data.answer,
    audio: data.audio,
    created_at: data.created_at,
  });
  return { kind: "record", record, extras: stripKnown(data) };
}

function serializeRow(row: { record: QuestionRecord; extras: RecordExtras }): string {
  return JSON.stringify({ ...row.record, ...row.extras });
}

function stripKnown(obj: Record<string, unknown>): RecordExtras {
  const extras: RecordExtras = {};
  for (const [key, value] of Object.entries(obj)) {
    if (!KNOWN_FIELDS.has(key)) extras[key] = value;
  }
  return extras;
}

export function freezeRecord(record: QuestionRecord): QuestionRecord {
  Object.freeze(record.embedding);
  return Object.freeze(record);
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
