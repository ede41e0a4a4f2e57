import { describe, it, expect, vi } from "vitest";
import { AnalyzerQueue, QueueTimeoutError, withTimeout } from "../../analysis/analyzerQueue";
import type { AnalyzerQueueConfig, DiscardReason } from "../../analysis/analyzerQueue";

function gate() {
  let open: () => void = () => undefined;
  const promise = new Promise<void>(resolve => {
    open = resolve;
  });
  return { promise, open };
}

function blockingQueue(config: Partial<AnalyzerQueueConfig<string>> = {}) {
  const release = gate();
  const started: string[] = [];
  const discarded: Array<[string, DiscardReason]> = [];

  const queue = new AnalyzerQueue<string>(
    (payload) => {
      started.push(payload);
      return release.promise;
    },
    {
      name: "test",
      concurrency: 1,
      capacity: 2,
      overflow: "newest-wins",
      timeoutMs: 1000,
      onDiscard: (payload, reason) => {
        discarded.push([payload, reason]);
      },
      ...config,
    }
  );

  return { queue, started, discarded, release: release.open };
}

describe("AnalyzerQueue", () => {
  it("runs one entry at a time in enqueue order", async () => {
    const { queue, started, release } = blockingQueue({ capacity: 5 });

    queue.enqueue("a");
    queue.enqueue("b");
    queue.enqueue("c");
    expect(started).toEqual(["a"]);
    expect(queue.getStats()).toMatchObject({ pending: 2, processing: 1 });

    release();
    await expect(queue.drain(1000)).resolves.toBe(true);
    expect(started).toEqual(["a", "b", "c"]);
    expect(queue.getStats().totalCompleted).toBe(3);
  });

  it("evicts the oldest pending entry under newest-wins", async () => {
    const { queue, started, discarded, release } = blockingQueue({ overflow: "newest-wins" });

    queue.enqueue("a");
    queue.enqueue("b");
    queue.enqueue("c");
    const result = queue.enqueue("d");

    expect(result.accepted).toBe(true);
    expect(discarded).toEqual([["b", "evicted"]]);

    release();
    await queue.drain(1000);
    expect(started).toEqual(["a", "c", "d"]);
    expect(queue.getStats().totalEvicted).toBe(1);
  });

  it("rejects the new entry under oldest-wins", async () => {
    const { queue, started, discarded, release } = blockingQueue({ overflow: "oldest-wins", capacity: 1 });

    queue.enqueue("a");
    queue.enqueue("b");
    const result = queue.enqueue("c");

    expect(result).toEqual({ accepted: false, reason: "full" });
    expect(discarded).toEqual([["c", "rejected"]]);

    release();
    await queue.drain(1000);
    expect(started).toEqual(["a", "b"]);
  });

  it("merges into the last pending entry under coalesce", async () => {
    const { queue, started, release } = blockingQueue({
      overflow: "coalesce",
      capacity: 1,
      merge: (pending, incoming) => `${pending}+${incoming}`,
    });

    queue.enqueue("a");
    queue.enqueue("b");
    const result = queue.enqueue("c");

    expect(result.accepted && result.merged).toBe(true);

    release();
    await queue.drain(1000);
    expect(started).toEqual(["a", "b+c"]);
    expect(queue.getStats().totalCoalesced).toBe(1);
  });

  it("requires a merge function for coalesce", () => {
    expect(() => new AnalyzerQueue<string>(async () => undefined, {
      name: "broken",
      concurrency: 1,
      capacity: 1,
      overflow: "coalesce",
      timeoutMs: 100,
    })).toThrow("coalesce policy requires a merge function");
  });

  it("cancels entries that have not started", async () => {
    const { queue, started, discarded, release } = blockingQueue({ capacity: 5 });

    queue.enqueue("a");
    queue.enqueue("b");
    queue.enqueue("c");

    expect(queue.cancelPending()).toEqual(["b", "c"]);
    expect(discarded).toEqual([["b", "cancelled"], ["c", "cancelled"]]);

    release();
    await queue.drain(1000);
    expect(started).toEqual(["a"]);
    expect(queue.getStats().totalCancelled).toBe(2);
  });

  it("times out a stuck call and reports it", async () => {
    const onError = vi.fn();
    const queue = new AnalyzerQueue<string>(() => new Promise<void>(() => undefined), {
      name: "stuck",
      concurrency: 1,
      capacity: 1,
      overflow: "oldest-wins",
      timeoutMs: 20,
      onError,
    });

    queue.enqueue("a");
    await expect(queue.drain(1000)).resolves.toBe(true);

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBe("a");
    expect(onError.mock.calls[0][1]).toBeInstanceOf(QueueTimeoutError);
    expect(queue.getStats().totalFailed).toBe(1);
  });

  it("reports drain timeouts", async () => {
    const { queue, release } = blockingQueue();
    queue.enqueue("a");

    await expect(queue.drain(10)).resolves.toBe(false);

    release();
    await expect(queue.drain(1000)).resolves.toBe(true);
  });

  it("refuses work while closed", () => {
    const { queue, discarded, release } = blockingQueue();
    queue.close();

    expect(queue.enqueue("a")).toEqual({ accepted: false, reason: "closed" });
    expect(discarded).toEqual([["a", "rejected"]]);
    expect(queue.isClosed()).toBe(true);
    release();
  });

  it("aborts the processor signal when a call times out", async () => {
    const signals: AbortSignal[] = [];
    const queue = new AnalyzerQueue<string>((_payload, signal) => {
      signals.push(signal);
      return new Promise<void>(() => undefined);
    }, {
      name: "slow",
      concurrency: 1,
      capacity: 1,
      overflow: "oldest-wins",
      timeoutMs: 20,
    });

    queue.enqueue("a");
    await queue.drain(1000);

    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
    expect(signals[0].reason).toBeInstanceOf(QueueTimeoutError);
  });

  it("halt cancels pending entries, abandons running ones and starts nothing else", async () => {
    const onError = vi.fn();
    const signals: AbortSignal[] = [];
    const { queue, started, discarded, release } = blockingQueue({ capacity: 5, onError });
    const tracked = new AnalyzerQueue<string>((_payload, signal) => {
      signals.push(signal);
      return new Promise<void>(() => undefined);
    }, { name: "tracked", concurrency: 1, capacity: 1, overflow: "oldest-wins", timeoutMs: 1000 });

    queue.enqueue("a");
    queue.enqueue("b");
    queue.enqueue("c");
    tracked.enqueue("x");

    queue.halt();
    tracked.halt();

    expect(discarded).toEqual([["b", "cancelled"], ["c", "cancelled"], ["a", "abandoned"]]);
    expect(queue.getStats()).toMatchObject({ pending: 0, processing: 0, totalCancelled: 2, totalAbandoned: 1 });
    await expect(queue.drain(10)).resolves.toBe(true);
    expect(signals[0].aborted).toBe(true);

    release();
    await new Promise(resolve => setTimeout(resolve, 20));

    expect(started).toEqual(["a"]);
    expect(onError).not.toHaveBeenCalled();
    expect(queue.getStats().totalCompleted).toBe(0);
    expect(queue.enqueue("d")).toEqual({ accepted: false, reason: "closed" });
  });
});

describe("withTimeout", () => {
  it("passes through a value that arrives in time", async () => {
    await expect(withTimeout(Promise.resolve("done"), 100, "fast")).resolves.toBe("done");
  });

  it("rejects with QueueTimeoutError naming the call", async () => {
    await expect(withTimeout(new Promise<string>(() => undefined), 10, "openai:summary"))
      .rejects.toThrow("openai:summary call timed out after 10ms");
  });
});
