import { applyGlobalCommand, parseGlobalCommand, type InterceptResult } from "../commands/global-command-interceptor.ts";
import {
  ConcurrencyConflict,
  ConversationEngineError,
  DomainServiceError,
  ValidationError,
  describeError,
} from "../errors.ts";
import type { DomainServices } from "../facades/types.ts";
import { logEvent } from "../observability/logger.ts";
import { elapsedMetricMs, emitMetricBestEffort, nowMetricMs } from "../observability/metrics.ts";
import { AnsweredEventCache } from "../session/answered-event-cache.ts";
import { KeyedLock } from "../session/keyed-lock.ts";
import {
  DEFAULT_MAX_STACK_DEPTH,
  popState,
  pushState,
  type PushOutcome,
} from "../session/navigation-stack.ts";
import {
  DEFAULT_LANGUAGE,
  advanceSession,
  createSession,
  hasProcessedEvent,
  type Session,
  type SessionChanges,
} from "../session/session.ts";
import type { SessionRepository } from "../session/session-repository.ts";
import { ROOT_STATE } from "../session/states.ts";
import { dispatchHandlerChain, type HandlerChain } from "./handler-chain.ts";
import { createDefaultHandlerChain } from "./handlers/registry.ts";
import { classifyInput, inputText } from "./input-classifier.ts";
import { renderScreen } from "./screens/screen-catalog.ts";
import { renderStateScreen } from "./screens/state-screens.ts";
import { runStateTransitionCore } from "./state-transition-core.ts";
import { TRANSITION_TABLE, type TransitionTable } from "./transition-table.ts";
import { serviceApologyReplies, validationRepromptTransition } from "./transitions.ts";
import type {
  ClassifiedInput,
  HandlerContext,
  InboundEvent,
  OutboundPayload,
  StateTransition,
} from "./types.ts";

export const DEFAULT_MAX_SAVE_ATTEMPTS = 5;

export type OutboundEnqueueInput = {
  recipient: string;
  payload: OutboundPayload;
  correlation_id?: string | null;
};

/** Where committed replies go. The delivery pipeline implements this. */
export interface OutboundSink {
  enqueue(input: OutboundEnqueueInput): void;
}

export type TransitionRoute = "command" | "handler" | "table" | "validation";

export type InboundOutcome =
  | { kind: "duplicate"; idempotency_key: string }
  | { kind: "help"; replies: OutboundPayload[] }
  | {
    kind: "committed";
    session: Session;
    route: TransitionRoute;
    reason: string;
    replies: OutboundPayload[];
  }
  | { kind: "aborted"; session: Session; replies: OutboundPayload[] };

export type ConversationEngineOptions = {
  repository: SessionRepository;
  outbound: OutboundSink;
  services: DomainServices;
  handlers?: HandlerChain;
  table?: TransitionTable;
  lock?: KeyedLock;
  answered?: AnsweredEventCache;
  maxStackDepth?: number;
  maxSaveAttempts?: number;
  now?: () => Date;
};

export type AppliedTransition = {
  session: Session;
  replies: OutboundPayload[];
  push_outcome: PushOutcome | null;
};

type Decision =
  | {
    kind: "commit";
    next: Session;
    route: TransitionRoute;
    reason: string;
    replies: OutboundPayload[];
  }
  | { kind: "abort"; replies: OutboundPayload[] };

/** Gateway message id when present, otherwise a key derived from the event itself. */
export function idempotencyKeyFor(event: InboundEvent): string {
  const gatewayId = event.gateway_message_id?.trim();
  if (gatewayId) {
    return gatewayId;
  }
  return `${event.sender_id}:${event.timestamp}:${event.type}:${event.text ?? ""}`;
}

/**
 * Turns a decided transition into the next snapshot. Every navigation kind goes through
 * `advanceSession`, so the version is bumped exactly once and the stack never keeps the
 * new state.
 */
export function applyTransition(
  session: Session,
  transition: StateTransition,
  options: { now: Date; eventId?: string | null; maxStackDepth?: number },
): AppliedTransition {
  const navigation = transition.navigation;
  let changes: SessionChanges = {};
  let pushOutcome: PushOutcome | null = null;

  switch (navigation.kind) {
    case "stay":
      break;
    case "push": {
      const pushed = pushState(
        session.stack,
        session.state,
        options.maxStackDepth ?? DEFAULT_MAX_STACK_DEPTH,
      );
      pushOutcome = pushed.outcome;
      changes = { state: navigation.to, stack: pushed.stack };
      break;
    }
    case "replace":
      changes = { state: navigation.to };
      break;
    case "pop": {
      const popped = popState(session.stack);
      changes = { state: popped.state ?? ROOT_STATE, stack: popped.stack };
      break;
    }
    case "reset":
      changes = { state: navigation.to ?? ROOT_STATE, stack: [] };
      break;
  }

  const next = advanceSession(
    session,
    { ...changes, data: transition.data, language: transition.language },
    { nowIso: options.now.toISOString(), eventId: options.eventId },
  );
  const replies = [...transition.replies];
  if (transition.render_screen) {
    replies.push(renderStateScreen(next, options.now));
  }
  return { session: next, replies, push_outcome: pushOutcome };
}

export class ConversationEngine {
  private readonly handlers: HandlerChain;
  private readonly table: TransitionTable;
  private readonly lock: KeyedLock;
  private readonly answered: AnsweredEventCache;
  private readonly maxStackDepth: number;
  private readonly maxSaveAttempts: number;
  private readonly now: () => Date;

  constructor(private readonly options: ConversationEngineOptions) {
    this.handlers = options.handlers ?? createDefaultHandlerChain();
    this.table = options.table ?? TRANSITION_TABLE;
    this.lock = options.lock ?? new KeyedLock();
    this.answered = options.answered ?? new AnsweredEventCache();
    this.maxStackDepth = options.maxStackDepth ?? DEFAULT_MAX_STACK_DEPTH;
    this.maxSaveAttempts = options.maxSaveAttempts ?? DEFAULT_MAX_SAVE_ATTEMPTS;
    this.now = options.now ?? (() => new Date());
  }

  /** Processes one inbound event under the sender's lock. */
  handleInbound(event: InboundEvent): Promise<InboundOutcome> {
    const idempotencyKey = idempotencyKeyFor(event);
    return this.lock.runExclusive(event.sender_id, () => this.process(event, idempotencyKey));
  }

  private async process(event: InboundEvent, idempotencyKey: string): Promise<InboundOutcome> {
    const startedAtMs = nowMetricMs();
    const userId = event.sender_id;
    const input = classifyInput(event);

    logEvent({
      event: "conversation.inbound_received",
      user_id: userId,
      correlation_id: idempotencyKey,
      payload: { event_type: event.type, idempotency_key: idempotencyKey, input_kind: input.kind },
    });

    if (this.answered.has(userId, idempotencyKey)) {
      logEvent({
        event: "conversation.duplicate_ignored",
        user_id: userId,
        correlation_id: idempotencyKey,
        payload: { idempotency_key: idempotencyKey, answered_without_save: true },
      });
      this.recordOutcome(idempotencyKey, "duplicate");
      return { kind: "duplicate", idempotency_key: idempotencyKey };
    }

    // help never reads or writes the session.
    if (parseGlobalCommand(inputText(input)) === "help") {
      const replies: OutboundPayload[] = [{ kind: "text", body: renderScreen("HELP", DEFAULT_LANGUAGE) }];
      this.enqueueReplies(userId, replies, idempotencyKey);
      this.answered.remember(userId, idempotencyKey);
      emitMetricBestEffort({
        metric: "conversation.command.count",
        value: 1,
        correlation_id: idempotencyKey,
        tags: { component: "global_command_interceptor", command: "help" },
      });
      this.recordOutcome(idempotencyKey, "help");
      return { kind: "help", replies };
    }

    let lastConflict: ConcurrencyConflict | null = null;
    for (let attempt = 1; attempt <= this.maxSaveAttempts; attempt += 1) {
      const now = this.now();
      const loaded = await this.options.repository.load(userId);
      const session = loaded ?? createSession(userId, now.toISOString());
      if (!loaded && attempt === 1) {
        logEvent({
          event: "session.created",
          user_id: userId,
          correlation_id: idempotencyKey,
          payload: { state: session.state },
        });
      }

      if (hasProcessedEvent(session, idempotencyKey)) {
        logEvent({
          event: "conversation.duplicate_ignored",
          user_id: userId,
          correlation_id: idempotencyKey,
          payload: { idempotency_key: idempotencyKey, state: session.state, version: session.version },
        });
        this.recordOutcome(idempotencyKey, "duplicate");
        return { kind: "duplicate", idempotency_key: idempotencyKey };
      }

      const decision = await this.decide(session, event, input, idempotencyKey, now);
      if (decision.kind === "abort") {
        this.enqueueReplies(userId, decision.replies, idempotencyKey);
        this.answered.remember(userId, idempotencyKey);
        this.recordOutcome(idempotencyKey, "aborted");
        return { kind: "aborted", session, replies: decision.replies };
      }

      try {
        await this.options.repository.save(decision.next, session.version);
      } catch (error) {
        if (!(error instanceof ConcurrencyConflict)) {
          throw error;
        }
        lastConflict = error;
        logEvent({
          event: "conversation.concurrency_conflict",
          level: "warn",
          user_id: userId,
          correlation_id: idempotencyKey,
          payload: {
            attempt,
            expected_version: error.expectedVersion,
            actual_version: error.actualVersion,
          },
        });
        continue;
      }

      logEvent({
        event: "conversation.state_transition",
        user_id: userId,
        correlation_id: idempotencyKey,
        payload: {
          previous_state: session.state,
          next_state: decision.next.state,
          reason: decision.reason,
          route: decision.route,
          version: decision.next.version,
          stack_depth: decision.next.stack.length,
        },
      });
      this.enqueueReplies(userId, decision.replies, idempotencyKey);
      emitMetricBestEffort({
        metric: "conversation.transition.latency",
        value: elapsedMetricMs(startedAtMs),
        correlation_id: idempotencyKey,
        tags: { component: "conversation_engine", route: decision.route, outcome: "committed" },
      });
      this.recordOutcome(idempotencyKey, "committed");
      return {
        kind: "committed",
        session: decision.next,
        route: decision.route,
        reason: decision.reason,
        replies: decision.replies,
      };
    }

    this.recordOutcome(idempotencyKey, "concurrency_exhausted");
    throw new ConversationEngineError({
      userId,
      attempts: this.maxSaveAttempts,
      cause: lastConflict,
    });
  }

  private async decide(
    session: Session,
    event: InboundEvent,
    input: ClassifiedInput,
    idempotencyKey: string,
    now: Date,
  ): Promise<Decision> {
    const command = parseGlobalCommand(inputText(input), session.state);
    if (command !== null) {
      const intercepted = applyGlobalCommand(command, session, {
        now,
        maxStackDepth: this.maxStackDepth,
        eventId: idempotencyKey,
      });
      return this.commandDecision(session, intercepted, idempotencyKey);
    }

    const context: HandlerContext = {
      session,
      event,
      input,
      now,
      idle_ms: Math.max(0, now.getTime() - Date.parse(session.last_active)),
      services: this.options.services,
    };

    let transition: StateTransition;
    let route: TransitionRoute;
    try {
      const dispatched = await dispatchHandlerChain(this.handlers, context);
      if (dispatched.kind === "handled") {
        logEvent({
          event: "conversation.handler_dispatched",
          user_id: session.user_id,
          correlation_id: idempotencyKey,
          payload: { handler: dispatched.handler, state: session.state },
        });
        transition = dispatched.transition;
        route = "handler";
      } else {
        transition = await runStateTransitionCore(context, this.table);
        route = "table";
      }
    } catch (error) {
      if (error instanceof ValidationError) {
        logEvent({
          event: "conversation.validation_rejected",
          user_id: session.user_id,
          correlation_id: idempotencyKey,
          payload: { state: session.state, reason: error.message, field: error.field },
        });
        transition = validationRepromptTransition(error, session, now);
        route = "validation";
      } else if (error instanceof DomainServiceError) {
        logEvent({
          event: "conversation.domain_service_failed",
          level: "warn",
          user_id: session.user_id,
          correlation_id: idempotencyKey,
          payload: {
            state: session.state,
            service: error.service,
            operation: error.operation,
            ...describeError(error.cause ?? error),
          },
        });
        return { kind: "abort", replies: serviceApologyReplies(session) };
      } else {
        throw error;
      }
    }

    if (transition.reason === "unrecognized_input") {
      logEvent({
        event: "conversation.fallback_unrecognized",
        user_id: session.user_id,
        correlation_id: idempotencyKey,
        payload: { state: session.state, input_kind: input.kind },
      });
    }
    if (transition.reason === "session.resume_prompted") {
      logEvent({
        event: "session.resume_prompted",
        user_id: session.user_id,
        correlation_id: idempotencyKey,
        payload: { paused_state: session.state, idle_ms: context.idle_ms },
      });
    }

    const applied = applyTransition(session, transition, {
      now,
      eventId: idempotencyKey,
      maxStackDepth: this.maxStackDepth,
    });
    this.warnOnOverflow(session, applied.push_outcome, idempotencyKey);
    return {
      kind: "commit",
      next: applied.session,
      route,
      reason: transition.reason,
      replies: applied.replies,
    };
  }

  private commandDecision(
    session: Session,
    intercepted: InterceptResult,
    idempotencyKey: string,
  ): Decision {
    logEvent({
      event: "conversation.command_intercepted",
      user_id: session.user_id,
      correlation_id: idempotencyKey,
      payload: {
        command: intercepted.command,
        previous_state: session.state,
        next_state: intercepted.session.state,
      },
    });
    this.warnOnOverflow(session, intercepted.push_outcome, idempotencyKey);

    // Only help leaves the snapshot untouched, and it is answered before any load.
    const next = intercepted.changed
      ? intercepted.session
      : advanceSession(session, {}, { nowIso: this.now().toISOString(), eventId: idempotencyKey });
    return {
      kind: "commit",
      next,
      route: "command",
      reason: `command.${intercepted.command}`,
      replies: intercepted.replies,
    };
  }

  private warnOnOverflow(session: Session, outcome: PushOutcome | null, idempotencyKey: string): void {
    if (outcome !== "rejected_overflow") {
      return;
    }
    logEvent({
      event: "session.stack_push_rejected",
      level: "warn",
      user_id: session.user_id,
      correlation_id: idempotencyKey,
      payload: { state: session.state, depth: session.stack.length, max_depth: this.maxStackDepth },
    });
  }

  private enqueueReplies(recipient: string, replies: readonly OutboundPayload[], correlationId: string): void {
    for (const payload of replies) {
      this.options.outbound.enqueue({ recipient, payload, correlation_id: correlationId });
    }
  }

  private recordOutcome(correlationId: string, outcome: string): void {
    emitMetricBestEffort({
      metric: "conversation.event.count",
      value: 1,
      correlation_id: correlationId,
      tags: { component: "conversation_engine", outcome },
    });
  }
}
