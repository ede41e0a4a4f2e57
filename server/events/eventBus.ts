/**
 * In-process Event Bus
 *
 * Typed publish/subscribe broker between the transcription channel, the
 * analyzers, the session store and presentation.
 *
 * Delivery model:
 * - fan-out to every subscriber present when `publish` is called
 * - each subscriber owns a FIFO mailbox drained by its own task, so order is
 *   kept per topic and a slow subscriber only delays itself
 * - `publish` never waits on a handler; a failing handler is logged and counted
 */

import { v4 as uuidv4 } from "uuid";
import { log, errorMessage } from "../logger";
import type { Topic, TopicMap } from "@shared/schema";

export type EventHandler<T extends Topic> = (event: TopicMap[T]) => void | Promise<void>;

export interface SubscriptionHandle {
  readonly id: string;
  readonly topic: Topic;
  readonly name: string;
}

export interface HistoryEntry {
  topic: Topic;
  at: number;
  event: TopicMap[Topic];
}

export interface EventBusStats {
  published: number;
  delivered: number;
  handlerErrors: number;
  subscribers: number;
  busySubscribers: number;
}

interface MailboxHooks {
  onBusy(): void;
  onIdle(): void;
  onDelivered(): void;
  onError(subscription: SubscriptionHandle, error: unknown): void;
}

const MAX_HISTORY = 1000;
const MAILBOX_HIGH_WATER = 1000;

class Subscription<T extends Topic> implements SubscriptionHandle {
  private queue: TopicMap[T][] = [];
  private draining = false;
  private active = true;
  private warnedHighWater = false;

  constructor(
    readonly id: string,
    readonly topic: T,
    readonly name: string,
    private readonly handler: EventHandler<T>,
    private readonly hooks: MailboxHooks
  ) {}

  enqueue(event: TopicMap[T]): void {
    if (!this.active) return;

    this.queue.push(event);

    if (this.queue.length > MAILBOX_HIGH_WATER && !this.warnedHighWater) {
      this.warnedHighWater = true;
      log(`[EventBus] Subscriber ${this.name} on ${this.topic} is falling behind (${this.queue.length} queued)`, "bus", "warn");
    }

    if (!this.draining) {
      this.draining = true;
      this.hooks.onBusy();
      this.drain().catch((error) => {
        log(`[EventBus] Mailbox drain failed for ${this.name}: ${errorMessage(error)}`, "bus", "error");
      });
    }
  }

  deactivate(): void {
    this.active = false;
    this.queue = [];
  }

  private async drain(): Promise<void> {
    // Delivery is always asynchronous relative to publish
    await Promise.resolve();

    try {
      while (this.active && this.queue.length > 0) {
        const event = this.queue.shift();
        if (event === undefined) break;

        try {
          await this.handler(event);
          this.hooks.onDelivered();
        } catch (error) {
          this.hooks.onError(this, error);
        }
      }
    } finally {
      this.draining = false;
      this.warnedHighWater = false;
      this.hooks.onIdle();
    }
  }
}

type Registry = { [K in Topic]: Map<string, Subscription<K>> };

function createRegistry(): Registry {
  return {
    "audio.frame": new Map(),
    "transcript.segment": new Map(),
    "question.detected": new Map(),
    "answer.generated": new Map(),
    "summary.generated": new Map(),
    "suggestion.generated": new Map(),
    "idea.generated": new Map(),
    "session.lifecycle": new Map(),
    "pipeline.error": new Map(),
  };
}

export class EventBus {
  private readonly registry: Registry = createRegistry();
  private readonly history: HistoryEntry[] = [];
  private busy = 0;
  private idleWaiters: Array<() => void> = [];

  private stats = {
    published: 0,
    delivered: 0,
    handlerErrors: 0,
  };

  private readonly hooks: MailboxHooks = {
    onBusy: () => {
      this.busy++;
    },
    onIdle: () => {
      this.busy--;
      if (this.busy === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach(resolve => resolve());
      }
    },
    onDelivered: () => {
      this.stats.delivered++;
    },
    onError: (subscription, error) => {
      this.stats.handlerErrors++;
      log(
        `[EventBus] Handler ${subscription.name} failed on ${subscription.topic}: ${errorMessage(error)}`,
        "bus",
        "error"
      );
    },
  };

  subscribe<T extends Topic>(topic: T, handler: EventHandler<T>, name = "anonymous"): SubscriptionHandle {
    const subscription = new Subscription<T>(uuidv4(), topic, name, handler, this.hooks);
    this.registry[topic].set(subscription.id, subscription);
    log(`[EventBus] ${name} subscribed to ${topic}`, "bus", "debug");
    return subscription;
  }

  unsubscribe(handle: SubscriptionHandle): boolean {
    return this.removeFrom(handle.topic, handle.id);
  }

  private removeFrom<T extends Topic>(topic: T, id: string): boolean {
    const subscriptions = this.registry[topic];
    const subscription = subscriptions.get(id);
    if (!subscription) return false;

    subscription.deactivate();
    subscriptions.delete(id);
    return true;
  }

  publish<T extends Topic>(topic: T, event: TopicMap[T]): void {
    this.stats.published++;

    if (topic !== "audio.frame") {
      this.history.push({ topic, at: Date.now(), event });
      if (this.history.length > MAX_HISTORY) {
        this.history.splice(0, this.history.length - MAX_HISTORY);
      }
    }

    // Snapshot: subscribers added by a handler do not see this event
    const subscribers = Array.from(this.registry[topic].values());
    for (const subscriber of subscribers) {
      subscriber.enqueue(event);
    }
  }

  /**
   * Resolves once every mailbox is empty and no handler is running,
   * including events published by handlers while draining.
   */
  idle(): Promise<void> {
    if (this.busy === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  subscriberCount(topic?: Topic): number {
    if (topic) {
      return this.registry[topic].size;
    }
    return Object.values(this.registry).reduce((sum, subscriptions) => sum + subscriptions.size, 0);
  }

  getHistory(topic?: Topic, limit = 50): HistoryEntry[] {
    const entries = topic ? this.history.filter(entry => entry.topic === topic) : this.history;
    return entries.slice(-limit);
  }

  getStats(): EventBusStats {
    return {
      ...this.stats,
      subscribers: this.subscriberCount(),
      busySubscribers: this.busy,
    };
  }
}

export function createEventBus(): EventBus {
  return new EventBus();
}
