import { renderScreen } from "../conversation/screens/screen-catalog.ts";
import { renderStateScreen } from "../conversation/screens/state-screens.ts";
import type { OutboundPayload } from "../conversation/types.ts";
import {
  DEFAULT_MAX_STACK_DEPTH,
  popState,
  pushState,
  type PushOutcome,
} from "../session/navigation-stack.ts";
import { advanceSession, withData, type Session, type SessionChanges } from "../session/session.ts";
import {
  FREE_INPUT_STATES,
  NIL_FILING_ENTRY_STATE,
  ROOT_STATE,
  type ConversationState,
} from "../session/states.ts";

export type GlobalCommand = "reset" | "back" | "nil" | "help" | "restart" | "ca_handoff";

export type InterceptResult = {
  command: GlobalCommand;
  /** The next snapshot. For `help` this is the input session, untouched. */
  session: Session;
  changed: boolean;
  replies: OutboundPayload[];
  push_outcome: PushOutcome | null;
};

export type InterceptOptions = {
  now: Date;
  maxStackDepth?: number;
  eventId?: string | null;
};

const RESERVED_TOKENS: ReadonlyMap<string, GlobalCommand> = new Map([
  ["0", "reset"],
  ["9", "back"],
  ["nil", "nil"],
  ["help", "help"],
  ["?", "help"],
  ["restart", "restart"],
  ["ca", "ca_handoff"],
  ["talk to ca", "ca_handoff"],
]);

// Words a user could mean literally while typing a value.
const ALIAS_TOKENS: ReadonlyMap<string, GlobalCommand> = new Map([
  ["menu", "reset"],
  ["back", "back"],
]);

const EDGE_PUNCTUATION = /^[\p{P}\p{S}\s]+|[\p{P}\p{S}\s]+$/gu;

export function normalizeCommandText(rawText: string): string {
  const collapsed = rawText.trim().toLowerCase().replace(/\s+/g, " ");
  if (collapsed === "?") {
    return collapsed;
  }
  return collapsed.replace(EDGE_PUNCTUATION, "");
}

/** Token recognition only; needs no session except to know whether aliases apply. */
export function parseGlobalCommand(
  rawText: string | null,
  state: ConversationState | null = null,
): GlobalCommand | null {
  if (rawText === null) {
    return null;
  }
  const token = normalizeCommandText(rawText);
  if (!token) {
    return null;
  }

  const reserved = RESERVED_TOKENS.get(token);
  if (reserved) {
    return reserved;
  }
  if (state !== null && FREE_INPUT_STATES.has(state)) {
    return null;
  }
  return ALIAS_TOKENS.get(token) ?? null;
}

/**
 * Applies a universal shortcut to the session. Pure: the caller persists the returned
 * snapshot. Returns null when the text is not a command in the session's state.
 */
export function interceptGlobalCommand(
  rawText: string | null,
  session: Session,
  options: InterceptOptions,
): InterceptResult | null {
  const command = parseGlobalCommand(rawText, session.state);
  if (command === null) {
    return null;
  }
  return applyGlobalCommand(command, session, options);
}

export function applyGlobalCommand(
  command: GlobalCommand,
  session: Session,
  options: InterceptOptions,
): InterceptResult {
  const nowIso = options.now.toISOString();
  const advance = (changes: SessionChanges): Session =>
    advanceSession(session, changes, { nowIso, eventId: options.eventId });
  const notice = (key: string): OutboundPayload => ({
    kind: "text",
    body: renderScreen(key, session.language),
  });
  const result = (
    next: Session,
    replies: OutboundPayload[],
    pushOutcome: PushOutcome | null = null,
  ): InterceptResult => ({
    command,
    session: next,
    changed: true,
    replies,
    push_outcome: pushOutcome,
  });

  switch (command) {
    case "help":
      return {
        command,
        session,
        changed: false,
        replies: [notice("HELP")],
        push_outcome: null,
      };

    case "reset": {
      const next = advance({ state: ROOT_STATE, stack: [] });
      return result(next, [renderStateScreen(next, options.now)]);
    }

    case "back": {
      if (session.state === ROOT_STATE && session.stack.length === 0) {
        return result(advance({}), [notice("NOTHING_TO_GO_BACK")]);
      }
      const popped = popState(session.stack);
      const next = advance({ state: popped.state ?? ROOT_STATE, stack: popped.stack });
      return result(next, [renderStateScreen(next, options.now)]);
    }

    case "nil": {
      const data = withData(session.data, { nil_form: undefined });
      if (session.state === NIL_FILING_ENTRY_STATE) {
        const next = advance({ data });
        return result(next, [renderStateScreen(next, options.now)]);
      }
      const pushed = pushState(
        session.stack,
        session.state,
        options.maxStackDepth ?? DEFAULT_MAX_STACK_DEPTH,
      );
      const next = advance({ state: NIL_FILING_ENTRY_STATE, stack: pushed.stack, data });
      return result(next, [renderStateScreen(next, options.now)], pushed.outcome);
    }

    case "restart": {
      const next = advance({ state: ROOT_STATE, stack: [], data: {} });
      return result(next, [notice("RESTART_DONE"), renderStateScreen(next, options.now)]);
    }

    case "ca_handoff": {
      const next = advance({
        data: withData(session.data, {
          ca_handoff: { requested_at: nowIso, from_state: session.state },
        }),
      });
      return result(next, [notice("CA_HANDOFF_NOTED")]);
    }
  }
}
