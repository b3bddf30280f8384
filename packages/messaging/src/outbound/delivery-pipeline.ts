import { randomUUID } from "node:crypto";
import type { OutboundEnqueueInput, OutboundSink } from "../../../core/src/conversation/conversation-engine.ts";
import { DeadLetterNotFoundError, describeError } from "../../../core/src/errors.ts";
import { logEvent } from "../../../core/src/observability/logger.ts";
import { elapsedMetricMs, emitMetricBestEffort, nowMetricMs } from "../../../core/src/observability/metrics.ts";
import { classifySendError, type MessagingGateway, type SendOutcome } from "../gateway.ts";
import type {
  DeadLetterEntry,
  DeadLetterFilter,
  DeadLetterReason,
  OutboundMessage,
  OutboundStatus,
} from "../types.ts";
import { InMemoryDeadLetterStore, resolveListLimit, type DeadLetterStore } from "./dead-letter-store.ts";
import { OutboundQueue } from "./outbound-queue.ts";
import { RateLimitCoordinator } from "./rate-limit-coordinator.ts";
import { DEFAULT_RETRY_POLICY, hasAttemptsLeft, nextRetryDelayMs, type RetryPolicy } from "./retry-policy.ts";

const DAY_MS = 86_400_000;

export const DEFAULT_WORKER_CONCURRENCY = 2;
export const DEFAULT_QUEUE_CAPACITY = 10_000;
export const DEFAULT_DEAD_LETTER_RETENTION_MS = 30 * DAY_MS;
export const DEFAULT_HISTORY_LIMIT = 1_000;
const IDLE_POLL_MS = 1_000;

export type Clock = {
  now(): number;
};

export const systemClock: Clock = { now: () => Date.now() };

export type DeliveryPipelineOptions = {
  gateway: MessagingGateway;
  rateLimiter?: RateLimitCoordinator;
  deadLetters?: DeadLetterStore;
  clock?: Clock;
  idFactory?: () => string;
  concurrency?: number;
  queueCapacity?: number;
  retry?: RetryPolicy;
  deadLetterRetentionMs?: number;
  historyLimit?: number;
};

type AttemptOutcome = "delivered" | "retried" | "dead_lettered" | "deferred";

export type TickSummary = {
  processed: number;
  delivered: number;
  retried: number;
  dead_lettered: number;
  deferred: number;
};

export type PipelineStats = {
  running: boolean;
  queue_depth: number;
  capacity: number;
  status_counts: Record<OutboundStatus, number>;
  unpersisted_dead_letters: number;
};

/**
 * Bounded outbound queue drained by a fixed worker pool. Tests drive it with `tick()` and an
 * injected clock; the server calls `start()` for the timer-driven loop.
 */
export class DeliveryPipeline implements OutboundSink {
  private readonly gateway: MessagingGateway;
  private readonly rateLimiter: RateLimitCoordinator;
  private readonly deadLetters: DeadLetterStore;
  private readonly clock: Clock;
  private readonly idFactory: () => string;
  private readonly concurrency: number;
  private readonly retry: RetryPolicy;
  private readonly retentionMs: number;
  private readonly historyLimit: number;
  private readonly queue: OutboundQueue;

  private readonly finished = new Map<string, OutboundMessage>();
  private readonly unpersisted: DeadLetterEntry[] = [];
  private flushChain: Promise<void> = Promise.resolve();
  private nextSequence = 1;

  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private activeTick: Promise<void> | null = null;

  constructor(options: DeliveryPipelineOptions) {
    this.gateway = options.gateway;
    this.rateLimiter = options.rateLimiter ?? new RateLimitCoordinator();
    this.deadLetters = options.deadLetters ?? new InMemoryDeadLetterStore();
    this.clock = options.clock ?? systemClock;
    this.idFactory = options.idFactory ?? (() => randomUUID());
    this.concurrency = Math.max(1, Math.trunc(options.concurrency ?? DEFAULT_WORKER_CONCURRENCY));
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.retentionMs = options.deadLetterRetentionMs ?? DEFAULT_DEAD_LETTER_RETENTION_MS;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.queue = new OutboundQueue(options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
  }

  /** Non-blocking. A full queue dead-letters the new message instead of dropping it. */
  enqueue(input: OutboundEnqueueInput): OutboundMessage {
    return this.admit(input, null);
  }

  getMessage(id: string): OutboundMessage | null {
    return this.queue.get(id) ?? this.finished.get(id) ?? null;
  }

  async tick(): Promise<TickSummary> {
    const summary: TickSummary = { processed: 0, delivered: 0, retried: 0, dead_lettered: 0, deferred: 0 };
    const lanes = groupByRecipient(this.queue.due(this.clock.now()));

    let cursor = 0;
    const worker = async (): Promise<void> => {
      while (cursor < lanes.length) {
        const lane = lanes[cursor];
        cursor += 1;
        if (lane) {
          await this.drainLane(lane, summary);
        }
      }
    };
    await Promise.all(Array.from({ length: Math.min(this.concurrency, lanes.length) }, () => worker()));

    await this.flushDeadLetters();
    this.rateLimiter.prune(this.clock.now());
    emitMetricBestEffort({
      metric: "outbound.queue.depth",
      value: this.queue.size,
      tags: { component: "delivery_pipeline" },
    });
    return summary;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.wake(0);
  }

  /** Stops scheduling and waits for the pass in flight. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.activeTick) {
      await this.activeTick;
    }
    await this.flushDeadLetters();
  }

  /** Enqueues a fresh copy of a dead-lettered message; the entry itself stays for audit. */
  async replay(deadLetterId: string): Promise<string> {
    await this.flushDeadLetters();
    const entry = (await this.deadLetters.get(deadLetterId)) ??
      this.unpersisted.find((candidate) => candidate.id === deadLetterId) ??
      null;
    if (!entry) {
      throw new DeadLetterNotFoundError(deadLetterId);
    }

    const message = this.admit(
      { recipient: entry.recipient, payload: entry.payload, correlation_id: null },
      entry.id,
    );
    logEvent({
      event: "operator.dead_letter_replayed",
      user_id: entry.recipient,
      payload: {
        dead_letter_id: entry.id,
        message_id: message.id,
        original_message_id: entry.message_id,
        status: message.status,
      },
    });
    return message.id;
  }

  async listDeadLetters(filter: DeadLetterFilter = {}): Promise<DeadLetterEntry[]> {
    await this.flushDeadLetters();
    return this.deadLetters.list({ ...filter, limit: resolveListLimit(filter.limit) });
  }

  async purgeExpired(nowMs: number = this.clock.now()): Promise<number> {
    const cutoff = new Date(nowMs - this.retentionMs).toISOString();
    const purged = await this.deadLetters.deleteOlderThan(cutoff);
    logEvent({
      event: "outbound.dead_letters_purged",
      payload: { purged_count: purged, cutoff },
    });
    return purged;
  }

  stats(): PipelineStats {
    const counts: Record<OutboundStatus, number> = {
      ...this.queue.statusCounts(),
      Delivered: 0,
      DeadLettered: 0,
    };
    for (const message of this.finished.values()) {
      if (message.status === "Delivered" || message.status === "DeadLettered") {
        counts[message.status] += 1;
      }
    }
    return {
      running: this.running,
      queue_depth: this.queue.size,
      capacity: this.queue.capacity,
      status_counts: counts,
      unpersisted_dead_letters: this.unpersisted.length,
    };
  }

  private admit(input: OutboundEnqueueInput, replayOf: string | null): OutboundMessage {
    const nowIso = new Date(this.clock.now()).toISOString();
    const message: OutboundMessage = {
      id: this.idFactory(),
      recipient: input.recipient,
      payload: input.payload,
      attempt: 0,
      next_retry_at: nowIso,
      status: "Queued",
      sequence: this.nextSequence,
      enqueued_at: nowIso,
      last_error: null,
      replay_of: replayOf,
      correlation_id: input.correlation_id ?? null,
    };
    this.nextSequence += 1;

    if (this.queue.isFull()) {
      logEvent({
        event: "outbound.queue_overflow",
        level: "warn",
        user_id: message.recipient,
        correlation_id: message.correlation_id,
        payload: { message_id: message.id, capacity: this.queue.capacity },
      });
      return this.moveToDeadLetters(message, "queue_overflow", "Outbound queue at capacity.", 0);
    }

    this.queue.add(message);
    logEvent({
      event: "outbound.enqueued",
      user_id: message.recipient,
      correlation_id: message.correlation_id,
      payload: {
        message_id: message.id,
        payload_kind: message.payload.kind,
        replay_of: message.replay_of,
        queue_depth: this.queue.size,
      },
    });
    this.wake(0);
    return message;
  }

  private async drainLane(lane: readonly OutboundMessage[], summary: TickSummary): Promise<void> {
    for (let index = 0; index < lane.length; index += 1) {
      const queued = lane[index];
      const current = queued ? this.queue.get(queued.id) : null;
      if (!current || current.status === "Sending") {
        continue;
      }

      const outcome = await this.attempt(current);
      summary.processed += 1;
      summary[outcome] += 1;

      if (outcome === "deferred" || outcome === "retried") {
        // Later messages for this recipient wait behind the one rescheduled.
        const deferredUntil = this.queue.get(current.id)?.next_retry_at ?? current.next_retry_at;
        for (const waiting of lane.slice(index + 1)) {
          const pending = this.queue.get(waiting.id);
          if (pending && pending.status !== "Sending") {
            this.queue.update({ ...pending, status: "Queued", next_retry_at: laterOf(pending.next_retry_at, deferredUntil) });
            summary.processed += 1;
            summary.deferred += 1;
          }
        }
        return;
      }
    }
  }

  private async attempt(message: OutboundMessage): Promise<AttemptOutcome> {
    const nowMs = this.clock.now();
    const decision = this.rateLimiter.tryAcquire(message.recipient, nowMs);
    if (!decision.granted) {
      const nextRetryAt = new Date(decision.retry_at_ms).toISOString();
      this.queue.update({ ...message, status: "Queued", next_retry_at: nextRetryAt });
      logEvent({
        event: "outbound.rate_limited",
        user_id: message.recipient,
        correlation_id: message.correlation_id,
        payload: { message_id: message.id, limiter: decision.limiter, next_retry_at: nextRetryAt },
      });
      return "deferred";
    }

    this.queue.update({ ...message, status: "Sending" });
    const startedAtMs = nowMetricMs();
    let result: SendOutcome;
    try {
      result = await this.gateway.send(message.recipient, message.payload);
    } catch (error) {
      result = classifySendError(error);
    }
    emitMetricBestEffort({
      metric: "outbound.send.latency",
      value: elapsedMetricMs(startedAtMs),
      correlation_id: message.correlation_id,
      tags: { component: "delivery_pipeline", outcome: result.kind },
    });

    const settledAtMs = this.clock.now();
    switch (result.kind) {
      case "delivered": {
        this.queue.remove(message.id);
        this.remember({ ...message, status: "Delivered", last_error: null });
        logEvent({
          event: "outbound.delivered",
          user_id: message.recipient,
          correlation_id: message.correlation_id,
          payload: {
            message_id: message.id,
            attempt: message.attempt,
            payload_kind: message.payload.kind,
            gateway_message_id: result.gateway_message_id,
          },
        });
        return "delivered";
      }

      case "transient": {
        const attempt = message.attempt + 1;
        const lastError = result.error.message;
        if (!hasAttemptsLeft(attempt, this.retry)) {
          this.moveToDeadLetters({ ...message, attempt }, "max_retries_exceeded", lastError, attempt);
          return "dead_lettered";
        }
        const nextRetryAt = new Date(
          settledAtMs + nextRetryDelayMs(attempt, this.retry, result.error.retryAfterMs),
        ).toISOString();
        this.queue.update({
          ...message,
          attempt,
          status: "RetryScheduled",
          next_retry_at: nextRetryAt,
          last_error: lastError,
        });
        logEvent({
          event: "outbound.retry_scheduled",
          level: "warn",
          user_id: message.recipient,
          correlation_id: message.correlation_id,
          payload: {
            message_id: message.id,
            attempt,
            next_retry_at: nextRetryAt,
            status_code: result.error.statusCode,
            error_message: lastError,
          },
        });
        return "retried";
      }

      case "permanent":
        this.moveToDeadLetters(message, "permanent_failure", result.error.message, message.attempt);
        return "dead_lettered";
    }
  }

  private moveToDeadLetters(
    message: OutboundMessage,
    reason: DeadLetterReason,
    lastError: string,
    retryCount: number,
  ): OutboundMessage {
    const entry: DeadLetterEntry = {
      id: this.idFactory(),
      message_id: message.id,
      recipient: message.recipient,
      payload: message.payload,
      failure_reason: reason,
      last_error: lastError,
      retry_count: retryCount,
      enqueued_at: message.enqueued_at,
      dead_lettered_at: new Date(this.clock.now()).toISOString(),
    };
    this.queue.remove(message.id);
    const deadLettered: OutboundMessage = { ...message, status: "DeadLettered", last_error: lastError };
    this.remember(deadLettered);
    this.unpersisted.push(entry);

    logEvent({
      event: "outbound.dead_lettered",
      level: "warn",
      user_id: message.recipient,
      correlation_id: message.correlation_id,
      payload: {
        message_id: message.id,
        dead_letter_id: entry.id,
        failure_reason: reason,
        retry_count: retryCount,
        error_message: lastError,
      },
    });
    return deadLettered;
  }

  private flushDeadLetters(): Promise<void> {
    const run = this.flushChain.then(() => this.persistUnpersisted());
    this.flushChain = run;
    return run;
  }

  // Entries that fail to persist stay in memory and are retried on the next flush.
  private async persistUnpersisted(): Promise<void> {
    const pending = this.unpersisted.splice(0, this.unpersisted.length);
    for (const entry of pending) {
      try {
        await this.deadLetters.insert(entry);
      } catch (error) {
        this.unpersisted.push(entry);
        logEvent({
          event: "system.unhandled_error",
          level: "error",
          user_id: entry.recipient,
          payload: {
            phase: "dead_letter_insert",
            dead_letter_id: entry.id,
            ...describeError(error),
          },
        });
      }
    }
  }

  private remember(message: OutboundMessage): void {
    this.finished.delete(message.id);
    this.finished.set(message.id, message);
    while (this.finished.size > this.historyLimit) {
      const oldest = this.finished.keys().next();
      if (oldest.done) {
        break;
      }
      this.finished.delete(oldest.value);
    }
  }

  private wake(delayMs: number): void {
    if (!this.running || this.activeTick) {
      return;
    }
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.activeTick = this.runScheduledTick();
    }, Math.max(0, delayMs));
  }

  private async runScheduledTick(): Promise<void> {
    try {
      await this.tick();
    } catch (error) {
      logEvent({
        event: "system.unhandled_error",
        level: "error",
        payload: { phase: "delivery_tick", ...describeError(error) },
      });
    } finally {
      this.activeTick = null;
      const dueAt = this.queue.earliestDueAt();
      this.wake(dueAt === null ? IDLE_POLL_MS : dueAt - this.clock.now());
    }
  }
}

function groupByRecipient(messages: readonly OutboundMessage[]): OutboundMessage[][] {
  const lanes = new Map<string, OutboundMessage[]>();
  for (const message of messages) {
    const lane = lanes.get(message.recipient);
    if (lane) {
      lane.push(message);
    } else {
      lanes.set(message.recipient, [message]);
    }
  }
  return [...lanes.values()];
}

function laterOf(leftIso: string, rightIso: string): string {
  return Date.parse(leftIso) >= Date.parse(rightIso) ? leftIso : rightIso;
}
