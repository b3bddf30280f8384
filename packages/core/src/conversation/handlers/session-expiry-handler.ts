import { clearFlowData, readDataString, withData } from "../../session/session.ts";
import {
  ROOT_STATE,
  SENSITIVE_CONFIRM_STATES,
  isConversationState,
  moduleMenuForState,
  type ConversationState,
} from "../../session/states.ts";
import { unrecognizedInputTransition } from "../transitions.ts";
import {
  PASS,
  transitionTo,
  type ConversationHandler,
  type HandlerContext,
  type HandlerResponse,
} from "../types.ts";

export const DEFAULT_RESUME_PROMPT_MS = 30 * 60 * 1000;
export const DEFAULT_SENSITIVE_CONFIRM_MS = 10 * 60 * 1000;

export type SessionExpiryOptions = {
  resumePromptMs?: number;
  sensitiveConfirmMs?: number;
};

/**
 * Guards every state against stale context: confirmations go stale first, any other
 * screen outside the main menu offers to resume after a longer pause.
 */
export function createSessionExpiryHandler(options: SessionExpiryOptions = {}): ConversationHandler {
  const resumePromptMs = options.resumePromptMs ?? DEFAULT_RESUME_PROMPT_MS;
  const sensitiveConfirmMs = options.sensitiveConfirmMs ?? DEFAULT_SENSITIVE_CONFIRM_MS;

  return {
    name: "session_expiry",
    claims: () => true,
    handle: async (context) => {
      const { session } = context;
      if (session.state === "SESSION_RESUME_PROMPT") {
        return handleResumeChoice(context);
      }
      if (session.state === "SENSITIVE_CONFIRM_EXPIRED") {
        return returnToPausedState(context, "sensitive_confirm.reopened");
      }

      if (SENSITIVE_CONFIRM_STATES.has(session.state) && context.idle_ms >= sensitiveConfirmMs) {
        return transitionTo({
          navigation: { kind: "replace", to: "SENSITIVE_CONFIRM_EXPIRED" },
          data: withData(session.data, { pre_expiry_state: session.state }),
          replies: [],
          render_screen: true,
          reason: "sensitive_confirm.expired",
        });
      }

      if (session.state !== ROOT_STATE && context.idle_ms >= resumePromptMs) {
        return transitionTo({
          navigation: { kind: "replace", to: "SESSION_RESUME_PROMPT" },
          data: withData(session.data, { pre_expiry_state: session.state }),
          replies: [],
          render_screen: true,
          reason: "session.resume_prompted",
        });
      }

      return PASS;
    },
  };
}

function handleResumeChoice(context: HandlerContext): HandlerResponse {
  const { session, input } = context;
  if (input.kind !== "menu_choice") {
    return transitionTo(unrecognizedInputTransition(session, context.now));
  }

  switch (input.choice) {
    case 1:
      return returnToPausedState(context, "session.resumed");
    case 2: {
      const paused = pausedState(context);
      return transitionTo({
        navigation: { kind: "replace", to: moduleMenuForState(paused) },
        data: clearFlowData(session.data),
        replies: [],
        render_screen: true,
        reason: "session.module_restarted",
      });
    }
    case 3:
      return transitionTo({
        navigation: { kind: "reset" },
        data: withData(session.data, { pre_expiry_state: undefined }),
        replies: [],
        render_screen: true,
        reason: "session.main_menu",
      });
    default:
      return transitionTo(unrecognizedInputTransition(session, context.now));
  }
}

function returnToPausedState(context: HandlerContext, reason: string): HandlerResponse {
  return transitionTo({
    navigation: { kind: "replace", to: pausedState(context) },
    data: withData(context.session.data, { pre_expiry_state: undefined }),
    replies: [],
    render_screen: true,
    reason,
  });
}

function pausedState(context: HandlerContext): ConversationState {
  const paused = readDataString(context.session.data, "pre_expiry_state");
  return isConversationState(paused) ? paused : ROOT_STATE;
}
