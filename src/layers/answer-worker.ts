/**
 * Answer Worker — handoff between a polling frontend and the slow
 * inference + synthesis cycle
 *
 * Per session: one cycle in flight, at most one pending question (a newer
 * question replaces the pending one). poll() never blocks.
 * Across sessions: at most `concurrency` cycles run at once.
 */

import type { Answerer, Logger } from "../types.js";
import type { InstantAnswerCache } from "./instant-answer-cache.js";
import { generateId } from "../utils/embedding.js";
import { silentLogger } from "../utils/logger.js";
import { getErrorMessage } from "../errors.js";

export type TicketStatus =
  | "pending"
  | "running"
  | "done"
  | "failed"
  | "superseded"
  | "cancelled"
  | "unknown";

export interface AnswerDelivery {
  question: string;
  answer: string;
  audio: string;
  emotion?: string;
  cached: boolean;
  similarity: number;
  recordId?: string;
}

export interface PollResult {
  status: TicketStatus;
  delivery?: AnswerDelivery;
  error?: string;
}

interface Job {
  ticket: string;
  sessionId: string;
  question: string;
  status: TicketStatus;
  delivery?: AnswerDelivery;
  error?: string;
  // result() was handed out: the promise carries the outcome, nothing to keep
  claimed: boolean;
  settled: Promise<PollResult>;
  settle: (result: PollResult) => void;
}

interface SessionSlot {
  running?: Job;
  pending?: Job;
  closed: boolean;
}

const TERMINAL: ReadonlySet<TicketStatus> = new Set(["done", "failed", "superseded", "cancelled"]);

export class AnswerWorker {
  private cache: InstantAnswerCache;
  private answerer: Answerer;
  private logger: Logger;
  private limiter: Semaphore;
  private jobs = new Map<string, Job>();
  // terminal tickets nobody has collected yet, oldest first
  private finished = new Set<string>();
  private maxFinished: number;
  private sessions = new Map<string, SessionSlot>();
  private inflight = new Set<Promise<void>>();

  constructor(opts: {
    cache: InstantAnswerCache;
    answerer: Answerer;
    concurrency?: number;
    maxFinished?: number;
    logger?: Logger;
  }) {
    this.cache = opts.cache;
    this.answerer = opts.answerer;
    this.logger = opts.logger || silentLogger;
    this.limiter = new Semaphore(Math.max(1, opts.concurrency ?? 3));
    this.maxFinished = Math.max(0, opts.maxFinished ?? 1024);
  }

  submit(sessionId: string, question: string): string {
    const job = createJob(sessionId, question);
    this.jobs.set(job.ticket, job);

    let slot = this.sessions.get(sessionId);
    if (!slot || slot.closed) {
      slot = { closed: false };
      this.sessions.set(sessionId, slot);
    }

    if (!slot.running) {
      this.start(slot, job);
    } else {
      if (slot.pending) {
        this.logger.info(`[answer-worker] ${sessionId}: pending question replaced`);
        this.finish(slot.pending, "superseded");
      }
      slot.pending = job;
    }
    return job.ticket;
  }

  /** Non-blocking. A terminal status is reported once, then forgotten. */
  poll(ticket: string): PollResult {
    const job = this.jobs.get(ticket);
    if (!job) return { status: "unknown" };
    const result = snapshot(job);
    if (TERMINAL.has(job.status)) this.forget(ticket);
    return result;
  }

  /** Promise form of poll() for callers that can await */
  result(ticket: string): Promise<PollResult> {
    const job = this.jobs.get(ticket);
    if (!job) return Promise.resolve({ status: "unknown" });
    if (TERMINAL.has(job.status)) {
      this.forget(ticket);
    } else {
      job.claimed = true;
    }
    return job.settled;
  }

  /**
   * Frontend went away. The pending question is dropped; a running cycle
   * finishes and still caches its answer, but nobody is notified.
   */
  endSession(sessionId: string): void {
    const slot = this.sessions.get(sessionId);
    if (!slot) return;
    slot.closed = true;
    if (slot.pending) {
      this.finish(slot.pending, "cancelled");
      this.forget(slot.pending.ticket);
      slot.pending = undefined;
    }
    if (slot.running) {
      this.forget(slot.running.ticket);
    } else {
      this.sessions.delete(sessionId);
    }
  }

  /** Tickets still answerable by poll() */
  get trackedTickets(): number {
    return this.jobs.size;
  }

  get activeSessions(): number {
    return [...this.sessions.values()].filter(s => !s.closed).length;
  }

  /** Resolves once no cycle is running */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  private start(slot: SessionSlot, job: Job): void {
    slot.running = job;
    const cycle: Promise<void> = this.runCycle(job).then(() => {
      this.inflight.delete(cycle);
      this.advance(job.sessionId, slot);
    });
    this.inflight.add(cycle);
  }

  private advance(sessionId: string, slot: SessionSlot): void {
    slot.running = undefined;
    if (slot.closed) {
      if (this.sessions.get(sessionId) === slot) this.sessions.delete(sessionId);
      return;
    }
    const next = slot.pending;
    if (next) {
      slot.pending = undefined;
      this.start(slot, next);
    }
  }

  // Never rejects: every outcome lands on the job
  private async runCycle(job: Job): Promise<void> {
    const release = await this.limiter.acquire();
    job.status = "running";
    try {
      const lookup = await this.cache.cacheLookup(job.question);
      if (lookup.hit && lookup.record) {
        this.finish(job, "done", {
          question: job.question,
          answer: lookup.record.answer,
          audio: lookup.record.audio,
          cached: true,
          similarity: lookup.similarity,
          recordId: lookup.record.id,
        });
        return;
      }

      const answered = await this.answerer.answer(job.question);
      let recordId: string | undefined;
      if (this.cache.enabled) {
        try {
          const extras = answered.emotion ? { emotion: answered.emotion } : {};
          const record = await this.cache.cacheStore(job.question, answered.answer, answered.audio, extras);
          recordId = record.id;
        } catch (err) {
          this.logger.warn(`[answer-worker] Answer not cached: ${getErrorMessage(err)}`);
        }
      }

      this.finish(job, "done", {
        question: job.question,
        answer: answered.answer,
        audio: answered.audio,
        emotion: answered.emotion,
        cached: false,
        similarity: lookup.similarity,
        recordId,
      });
    } catch (err) {
      this.logger.error(`[answer-worker] Cycle failed for "${job.question.slice(0, 20)}": ${getErrorMessage(err)}`);
      this.finish(job, "failed", undefined, getErrorMessage(err));
    } finally {
      release();
    }
  }

  private finish(job: Job, status: TicketStatus, delivery?: AnswerDelivery, error?: string): void {
    job.status = status;
    job.delivery = delivery;
    job.error = error;
    job.settle(snapshot(job));

    if (job.claimed || !this.jobs.has(job.ticket)) {
      this.forget(job.ticket);
      return;
    }
    this.finished.add(job.ticket);
    while (this.finished.size > this.maxFinished) {
      const oldest = this.finished.values().next().value;
      if (oldest === undefined) break;
      this.forget(oldest);
    }
  }

  private forget(ticket: string): void {
    this.jobs.delete(ticket);
    this.finished.delete(ticket);
  }
}

function createJob(sessionId: string, question: string): Job {
  let settle: (result: PollResult) => void = () => {};
  const settled = new Promise<PollResult>((resolve) => { settle = resolve; });
  return { ticket: generateId(), sessionId, question, status: "pending", claimed: false, settled, settle };
}

function snapshot(job: Job): PollResult {
  const result: PollResult = { status: job.status };
  if (job.delivery) result.delivery = job.delivery;
  if (job.error !== undefined) result.error = job.error;
  return result;
}

/** FIFO counting semaphore */
export class Semaphore {
  private available: number;
  private waiters: (() => void)[] = [];

  constructor(permits: number) {
    this.available = permits;
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available--;
    } else {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) next();
      else this.available++;
    };
  }
}
