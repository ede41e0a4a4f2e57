/**
 * Analyzer work queue
 *
 * Each analyzer owns one queue. Features:
 * - bounded concurrency (one in-flight model call per analyzer by default)
 * - bounded pending list with an overflow policy:
 *     newest-wins  evict the oldest pending entry to admit the new one
 *     oldest-wins  reject the new entry
 *     coalesce     merge the new payload into the last pending entry
 * - per-entry timeout; the processor's signal aborts when it passes
 * - cancellation of entries that have not started
 * - `halt()` for shutdown: pending entries are cancelled, running ones
 *   abandoned, and nothing new starts
 */

import { v4 as uuidv4 } from "uuid";
import { log, errorMessage } from "../logger";

export type OverflowPolicy = "newest-wins" | "oldest-wins" | "coalesce";
export type EntryStatus = "pending" | "processing" | "completed" | "failed" | "cancelled" | "abandoned";
export type DiscardReason = "evicted" | "rejected" | "cancelled" | "abandoned";

export interface QueueEntry<T> {
  id: string;
  payload: T;
  status: EntryStatus;
  enqueuedAt: number;
  startedAt: number | null;
  completedAt: number | null;
  error: string | null;
}

export interface AnalyzerQueueConfig<T> {
  name: string;
  concurrency: number;
  capacity: number;
  overflow: OverflowPolicy;
  timeoutMs: number;
  /** Required for `coalesce`: combine the last pending payload with the incoming one */
  merge?: (pending: T, incoming: T) => T;
  /** Called for every entry that will never run or whose result will be dropped */
  onDiscard?: (payload: T, reason: DiscardReason) => void;
  /** Called when the processor throws or times out */
  onError?: (payload: T, error: unknown) => void;
}

export type EnqueueResult<T> =
  | { accepted: true; entry: QueueEntry<T>; merged: boolean }
  | { accepted: false; reason: "full" | "closed" };

export class QueueTimeoutError extends Error {
  constructor(queueName: string, timeoutMs: number) {
    super(`${queueName} call timed out after ${timeoutMs}ms`);
    this.name = "QueueTimeoutError";
  }
}

export class QueueHaltedError extends Error {
  constructor(queueName: string) {
    super(`${queueName} halted`);
    this.name = "QueueHaltedError";
  }
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new QueueTimeoutError(label, timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => {
    clearTimeout(timer);
  });
}

/** Rejects as soon as `signal` aborts, without waiting for `promise` */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

export interface AnalyzerQueueStats {
  totalEnqueued: number;
  totalCompleted: number;
  totalFailed: number;
  totalEvicted: number;
  totalRejected: number;
  totalCoalesced: number;
  totalCancelled: number;
  totalAbandoned: number;
  pending: number;
  processing: number;
}

/** `signal` aborts on timeout or halt; a processor publishes nothing once it has */
type Processor<T> = (payload: T, signal: AbortSignal) => Promise<void>;

interface ActiveEntry<T> {
  entry: QueueEntry<T>;
  controller: AbortController;
  run: Promise<void>;
}

export class AnalyzerQueue<T> {
  private pending: QueueEntry<T>[] = [];
  private active = new Map<string, ActiveEntry<T>>();
  private closed = false;
  private halted = false;
  private idleWaiters: Array<() => void> = [];
  private readonly config: AnalyzerQueueConfig<T>;

  private stats = {
    totalEnqueued: 0,
    totalCompleted: 0,
    totalFailed: 0,
    totalEvicted: 0,
    totalRejected: 0,
    totalCoalesced: 0,
    totalCancelled: 0,
    totalAbandoned: 0,
  };

  constructor(
    private readonly processor: Processor<T>,
    config: AnalyzerQueueConfig<T>
  ) {
    if (config.overflow === "coalesce" && !config.merge) {
      throw new Error(`[AnalyzerQueue:${config.name}] coalesce policy requires a merge function`);
    }
    this.config = config;
  }

  get name(): string {
    return this.config.name;
  }

  enqueue(payload: T): EnqueueResult<T> {
    if (this.closed) {
      this.stats.totalRejected++;
      this.config.onDiscard?.(payload, "rejected");
      return { accepted: false, reason: "closed" };
    }

    if (this.pending.length >= this.config.capacity) {
      const outcome = this.handleOverflow(payload);
      if (outcome) return outcome;
    }

    const entry: QueueEntry<T> = {
      id: uuidv4(),
      payload,
      status: "pending",
      enqueuedAt: Date.now(),
      startedAt: null,
      completedAt: null,
      error: null,
    };

    this.pending.push(entry);
    this.stats.totalEnqueued++;
    this.processNext();

    return { accepted: true, entry, merged: false };
  }

  /** Returns a result when the overflow policy settled the enqueue, null to admit the entry */
  private handleOverflow(payload: T): EnqueueResult<T> | null {
    switch (this.config.overflow) {
      case "newest-wins": {
        const evicted = this.pending.shift();
        if (evicted) {
          evicted.status = "cancelled";
          this.stats.totalEvicted++;
          log(`[AnalyzerQueue:${this.config.name}] Queue full, evicted oldest pending entry ${evicted.id}`, "analysis", "debug");
          this.config.onDiscard?.(evicted.payload, "evicted");
        }
        return null;
      }

      case "oldest-wins":
        this.stats.totalRejected++;
        log(`[AnalyzerQueue:${this.config.name}] Queue full (${this.config.capacity}), rejected new entry`, "analysis", "warn");
        this.config.onDiscard?.(payload, "rejected");
        return { accepted: false, reason: "full" };

      case "coalesce": {
        const last = this.pending[this.pending.length - 1];
        const merge = this.config.merge;
        if (!last || !merge) return null;
        last.payload = merge(last.payload, payload);
        this.stats.totalCoalesced++;
        log(`[AnalyzerQueue:${this.config.name}] Queue full, coalesced into entry ${last.id}`, "analysis", "debug");
        return { accepted: true, entry: last, merged: true };
      }
    }
  }

  private processNext(): void {
    while (!this.halted && this.active.size < this.config.concurrency && this.pending.length > 0) {
      const entry = this.pending.shift();
      if (!entry) break;

      entry.status = "processing";
      entry.startedAt = Date.now();

      const controller = new AbortController();
      const run = this.execute(entry, controller).finally(() => {
        this.active.delete(entry.id);
        this.processNext();
        this.notifyIfIdle();
      });
      this.active.set(entry.id, { entry, controller, run });
    }
  }

  private async execute(entry: QueueEntry<T>, controller: AbortController): Promise<void> {
    try {
      const run = untilAborted(this.processor(entry.payload, controller.signal), controller.signal);
      await withTimeout(run, this.config.timeoutMs, this.config.name);
      entry.status = "completed";
      this.stats.totalCompleted++;
    } catch (error) {
      if (entry.status === "abandoned") return;

      controller.abort(error);
      entry.status = "failed";
      entry.error = errorMessage(error);
      this.stats.totalFailed++;
      log(`[AnalyzerQueue:${this.config.name}] Entry ${entry.id} failed: ${entry.error}`, "analysis", "warn");

      try {
        this.config.onError?.(entry.payload, error);
      } catch (hookError) {
        log(`[AnalyzerQueue:${this.config.name}] onError hook threw: ${errorMessage(hookError)}`, "analysis", "error");
      }
    } finally {
      entry.completedAt = Date.now();
    }
  }

  private notifyIfIdle(): void {
    if (this.active.size === 0 && this.pending.length === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach(resolve => resolve());
    }
  }

  /** Removes entries that have not started and returns their payloads */
  cancelPending(): T[] {
    const cancelled = this.pending;
    this.pending = [];

    for (const entry of cancelled) {
      entry.status = "cancelled";
      this.stats.totalCancelled++;
      this.config.onDiscard?.(entry.payload, "cancelled");
    }

    if (cancelled.length > 0) {
      log(`[AnalyzerQueue:${this.config.name}] Cancelled ${cancelled.length} pending entr${cancelled.length === 1 ? "y" : "ies"}`, "analysis", "debug");
    }

    this.notifyIfIdle();
    return cancelled.map(entry => entry.payload);
  }

  /**
   * Waits until nothing is pending or running. Resolves false when the
   * timeout passes first.
   */
  drain(timeoutMs: number): Promise<boolean> {
    if (this.active.size === 0 && this.pending.length === 0) {
      return Promise.resolve(true);
    }

    return new Promise(resolve => {
      const onIdle = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.idleWaiters = this.idleWaiters.filter(waiter => waiter !== onIdle);
        log(`[AnalyzerQueue:${this.config.name}] Drain timed out with ${this.active.size} running, ${this.pending.length} pending`, "analysis", "warn");
        resolve(false);
      }, timeoutMs);
      this.idleWaiters.push(onIdle);
    });
  }

  close(): void {
    this.closed = true;
  }

  /**
   * Final shutdown. Pending entries are cancelled and running entries are
   * abandoned, both through `onDiscard`; a late result from an abandoned
   * entry is never published.
   */
  halt(): void {
    this.closed = true;
    this.halted = true;
    this.cancelPending();

    const abandoned = [...this.active.values()];
    this.active.clear();
    for (const { entry, controller } of abandoned) {
      entry.status = "abandoned";
      entry.completedAt = Date.now();
      this.stats.totalAbandoned++;
      controller.abort(new QueueHaltedError(this.config.name));
      this.config.onDiscard?.(entry.payload, "abandoned");
    }

    if (abandoned.length > 0) {
      log(`[AnalyzerQueue:${this.config.name}] Abandoned ${abandoned.length} running call(s)`, "analysis", "warn");
    }
    this.notifyIfIdle();
  }

  isClosed(): boolean {
    return this.closed;
  }

  getStats(): AnalyzerQueueStats {
    return {
      ...this.stats,
      pending: this.pending.length,
      processing: this.active.size,
    };
  }
}
