import type { ConversationHandler, HandlerContext, StateTransition } from "./types.ts";

export type HandlerChain = {
  readonly handlers: readonly ConversationHandler[];
};

export type DispatchResult =
  | { kind: "handled"; handler: string; transition: StateTransition }
  | { kind: "unclaimed" };

export function createHandlerChain(handlers: readonly ConversationHandler[]): HandlerChain {
  const seen = new Set<string>();
  for (const handler of handlers) {
    if (seen.has(handler.name)) {
      throw new Error(`Duplicate conversation handler '${handler.name}'.`);
    }
    seen.add(handler.name);
  }
  return { handlers: Object.freeze([...handlers]) };
}

/**
 * Walks the chain in registration order. A claiming handler may still pass, in which case
 * the next claiming handler is asked; the first non-pass response wins.
 */
export async function dispatchHandlerChain(
  chain: HandlerChain,
  context: HandlerContext,
): Promise<DispatchResult> {
  for (const handler of chain.handlers) {
    if (!handler.claims(context.session.state)) {
      continue;
    }
    const response = await handler.handle(context);
    if (response.kind === "transition") {
      return { kind: "handled", handler: handler.name, transition: response.transition };
    }
  }
  return { kind: "unclaimed" };
}
