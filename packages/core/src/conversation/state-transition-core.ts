import { outcomeToTransition } from "./transition-actions.ts";
import { findTransitionRule, TRANSITION_TABLE, type TransitionTable } from "./transition-table.ts";
import { unrecognizedInputTransition } from "./transitions.ts";
import type { HandlerContext, StateTransition } from "./types.ts";

/**
 * Table-driven fallback for states no handler claimed. ValidationError and
 * DomainServiceError thrown by actions propagate to the caller.
 */
export async function runStateTransitionCore(
  context: HandlerContext,
  table: TransitionTable = TRANSITION_TABLE,
): Promise<StateTransition> {
  const rule = findTransitionRule(table, context.session.state, context.input);
  if (!rule) {
    return unrecognizedInputTransition(context.session, context.now);
  }

  const outcome = rule.action ? await rule.action(context) : {};
  return outcomeToTransition(context, outcome, {
    navigation: rule.navigation,
    reason: rule.reason,
  });
}
