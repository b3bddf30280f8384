import { ROOT_STATE, type ConversationState } from "./states.ts";

export const DEFAULT_MAX_STACK_DEPTH = 10;

export type NavigationStack = readonly ConversationState[];

export type PushOutcome =
  | "pushed"
  | "ignored_root"
  | "ignored_duplicate"
  | "rejected_overflow";

export type PushResult = {
  stack: NavigationStack;
  outcome: PushOutcome;
};

export type PopResult = {
  stack: NavigationStack;
  state: ConversationState | null;
};

/**
 * Pushes `state` on top of the stack. At `maxDepth` the push is rejected and the
 * stack is returned unchanged; the caller decides how to surface the warning.
 */
export function pushState(
  stack: NavigationStack,
  state: ConversationState,
  maxDepth: number = DEFAULT_MAX_STACK_DEPTH,
): PushResult {
  if (state === ROOT_STATE) {
    return { stack, outcome: "ignored_root" };
  }
  if (stack[stack.length - 1] === state) {
    return { stack, outcome: "ignored_duplicate" };
  }
  if (stack.length >= maxDepth) {
    return { stack, outcome: "rejected_overflow" };
  }
  return { stack: [...stack, state], outcome: "pushed" };
}

export function popState(stack: NavigationStack): PopResult {
  if (stack.length === 0) {
    return { stack, state: null };
  }
  return {
    stack: stack.slice(0, -1),
    state: stack[stack.length - 1] ?? null,
  };
}

/** Drops `next` and everything above it so the stack never holds the current state. */
export function unwindTo(stack: NavigationStack, next: ConversationState): NavigationStack {
  if (next === ROOT_STATE) {
    return [];
  }
  const index = stack.indexOf(next);
  return index === -1 ? stack : stack.slice(0, index);
}
