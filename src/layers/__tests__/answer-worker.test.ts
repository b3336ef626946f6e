import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { AnswerWorker, Semaphore } from "../answer-worker.js";
import { InstantAnswerCache } from "../instant-answer-cache.js";
import type { AnsweredQuestion, Answerer } from "../../types.js";
import { TableEmbedder, makeTempDir, oneHot, removeTempDir } from "../../__tests__/fixtures.js";

/** Answerer whose calls stay open until the test releases them */
class GatedAnswerer implements Answerer {
  calls: string[] = [];
  private waiting = new Map<string, (result: AnsweredQuestion | Error) => void>();

  answer(question: string): Promise<AnsweredQuestion> {
    this.calls.push(question);
    return new Promise((resolve, reject) => {
      this.waiting.set(question, (r) => (r instanceof Error ? reject(r) : resolve(r)));
    });
  }

  release(question: string, result?: AnsweredQuestion | Error): void {
    const settle = this.waiting.get(question);
    if (!settle) throw new Error(`no open call for ${question}`);
    this.waiting.delete(question);
    settle(result ?? { answer: `answer to ${question}`, audio: `${question}.mp3`, emotion: "Neutral" });
  }
}

describe("AnswerWorker", () => {
  let dir: string;
  let cache: InstantAnswerCache;
  let answerer: GatedAnswerer;
  let worker: AnswerWorker;

  async function openCache(storePath: string): Promise<InstantAnswerCache> {
    const embedder = new TableEmbedder();
    for (let i = 0; i < 16; i++) embedder.set(`q${i}`, oneHot(i));
    const c = new InstantAnswerCache({ config: { storePath }, embedder });
    await c.init();
    return c;
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    cache = await openCache(join(dir, "answers.jsonl"));
    answerer = new GatedAnswerer();
    worker = new AnswerWorker({ cache, answerer });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("runs inference on a miss, caches it, and answers the repeat from cache", async () => {
    const first = worker.submit("s1", "q1");
    await vi.waitFor(() => expect(answerer.calls).toEqual(["q1"]));
    answerer.release("q1");

    const r1 = await worker.result(first);
    expect(r1.status).toBe("done");
    expect(r1.delivery).toMatchObject({ answer: "answer to q1", audio: "q1.mp3", emotion: "Neutral", cached: false });
    expect(r1.delivery?.recordId).toBeDefined();
    await worker.drain();

    const second = worker.submit("s1", "q1");
    const r2 = await worker.result(second);
    expect(r2.status).toBe("done");
    expect(r2.delivery?.cached).toBe(true);
    expect(r2.delivery?.answer).toBe("answer to q1");
    expect(r2.delivery?.recordId).toBe(r1.delivery?.recordId);
    expect(answerer.calls).toEqual(["q1"]);
  });

  it("stores the emotion alongside the cached answer", async () => {
    const ticket = worker.submit("s1", "q2");
    await vi.waitFor(() => expect(answerer.calls).toEqual(["q2"]));
    answerer.release("q2", { answer: "yes", audio: "y.mp3", emotion: "Joy" });
    const r = await worker.result(ticket);
    const recordId = r.delivery?.recordId ?? "";
    expect(recordId).not.toBe("");
    expect(cache.get(recordId)?.answer).toBe("yes");
  });

  it("polls without blocking and forgets a ticket after reporting it finished", async () => {
    const ticket = worker.submit("s1", "q1");
    expect(worker.poll(ticket).status).toBe("pending");

    await vi.waitFor(() => expect(answerer.calls).toEqual(["q1"]));
    expect(worker.poll(ticket).status).toBe("running");

    answerer.release("q1");
    await worker.drain();

    const done = worker.poll(ticket);
    expect(done.status).toBe("done");
    expect(done.delivery?.answer).toBe("answer to q1");
    expect(worker.poll(ticket)).toEqual({ status: "unknown" });
  });

  it("keeps one pending question per session, newest wins", async () => {
    const a = worker.submit("s1", "q1");
    await vi.waitFor(() => expect(answerer.calls).toEqual(["q1"]));
    const b = worker.submit("s1", "q2");
    const c = worker.submit("s1", "q3");

    expect(worker.poll(b)).toEqual({ status: "superseded" });
    expect(worker.poll(c).status).toBe("pending");

    answerer.release("q1");
    await vi.waitFor(() => expect(answerer.calls).toEqual(["q1", "q3"]));
    answerer.release("q3");
    await worker.drain();

    expect(worker.poll(a).status).toBe("done");
    expect(worker.poll(c).delivery?.answer).toBe("answer to q3");
  });

  it("finishes and caches a running cycle after the session ends, without notifying", async () => {
    const ticket = worker.submit("s1", "q1");
    const settled = worker.result(ticket);
    await vi.waitFor(() => expect(answerer.calls).toEqual(["q1"]));

    worker.endSession("s1");
    expect(worker.poll(ticket)).toEqual({ status: "unknown" });

    answerer.release("q1");
    await worker.drain();

    expect((await settled).status).toBe("done");
    expect(cache.size).toBe(1);
    expect((await cache.cacheLookup("q1")).hit).toBe(true);
    expect(worker.activeSessions).toBe(0);
  });

  it("drops the pending question when the session ends", async () => {
    worker.submit("s1", "q1");
    await vi.waitFor(() => expect(answerer.calls).toEqual(["q1"]));
    const pending = worker.submit("s1", "q2");
    const settled = worker.result(pending);

    worker.endSession("s1");
    expect((await settled).status).toBe("cancelled");

    answerer.release("q1");
    await worker.drain();
    expect(answerer.calls).toEqual(["q1"]);
  });

  it("delivers the answer even when it cannot be cached", async () => {
    const storePath = join(dir, "blocked");
    await mkdir(storePath);
    const blocked = await openCache(storePath);
    const w = new AnswerWorker({ cache: blocked, answerer });

    const ticket = w.submit("s1", "q1");
    await vi.waitFor(() => expect(answerer.calls).toEqual(["q1"]));
    answerer.release("q1");

    const r = await w.result(ticket);
    expect(r.status).toBe("done");
    expect(r.delivery?.answer).toBe("answer to q1");
    expect(r.delivery?.recordId).toBeUndefined();
    expect(blocked.size).toBe(0);
  });

  it("reports a failed cycle and moves on", async () => {
    const ticket = worker.submit("s1", "q1");
    await vi.waitFor(() => expect(answerer.calls).toEqual(["q1"]));
    answerer.release("q1", new Error("tts down"));

    expect(await worker.result(ticket)).toEqual({ status: "failed", error: "tts down" });
    await worker.drain();
    expect(cache.size).toBe(0);
  });

  it("forgets tickets whose outcome was awaited through result()", async () => {
    const first = worker.submit("s1", "q1");
    await vi.waitFor(() => expect(answerer.calls).toEqual(["q1"]));
    answerer.release("q1");
    await worker.result(first);

    for (let i = 0; i < 20; i++) {
      const r = await worker.result(worker.submit("s1", "q1"));
      expect(r.delivery?.cached).toBe(true);
    }
    expect(worker.trackedTickets).toBe(0);
    expect(worker.poll(first)).toEqual({ status: "unknown" });
  });

  it("keeps only the newest uncollected outcomes", async () => {
    await cache.cacheStore("q1", "answer 1", "a1.mp3");
    const bounded = new AnswerWorker({ cache, answerer, maxFinished: 2 });
    const tickets: string[] = [];
    for (let i = 0; i < 4; i++) {
      tickets.push(bounded.submit("s1", "q1"));
      await bounded.drain();
    }

    expect(bounded.trackedTickets).toBe(2);
    expect(bounded.poll(tickets[0])).toEqual({ status: "unknown" });
    expect(bounded.poll(tickets[1])).toEqual({ status: "unknown" });
    expect(bounded.poll(tickets[3]).status).toBe("done");
    expect(bounded.trackedTickets).toBe(1);
  });

  it("caps simultaneous cycles across sessions", async () => {
    const limited = new AnswerWorker({ cache, answerer, concurrency: 1 });
    const t1 = limited.submit("s1", "q1");
    const t2 = limited.submit("s2", "q2");

    await vi.waitFor(() => expect(answerer.calls).toEqual(["q1"]));
    expect(limited.poll(t2).status).toBe("pending");

    answerer.release("q1");
    await vi.waitFor(() => expect(answerer.calls).toEqual(["q1", "q2"]));
    answerer.release("q2");
    await limited.drain();

    expect(limited.poll(t1).status).toBe("done");
    expect(limited.poll(t2).status).toBe("done");
  });
});

describe("Semaphore", () => {
  it("hands permits out in FIFO order", async () => {
    const sem = new Semaphore(1);
    const order: number[] = [];
    const release0 = await sem.acquire();
    const p1 = sem.acquire().then((r) => { order.push(1); return r; });
    const p2 = sem.acquire().then((r) => { order.push(2); return r; });

    release0();
    const release1 = await p1;
    expect(order).toEqual([1]);
    release1();
    release1(); // second call is a no-op
    const release2 = await p2;
    expect(order).toEqual([1, 2]);
    release2();
  });
});
