import { invokeFacade } from "../../facades/invoke.ts";
import { readDataString, withData } from "../../session/session.ts";
import type { ConversationState } from "../../session/states.ts";
import { inputText } from "../input-classifier.ts";
import { parseLabel } from "../input-parsers.ts";
import { readRegisteredGstins } from "../screens/state-screens.ts";
import { screenNotice, unrecognizedInputTransition } from "../transitions.ts";
import {
  transitionTo,
  type ConversationHandler,
  type HandlerContext,
  type HandlerResponse,
} from "../types.ts";

const CLAIMED_STATES: ReadonlySet<ConversationState> = new Set<ConversationState>([
  "MULTI_GSTIN_MENU",
  "MULTI_GSTIN_ADD",
  "MULTI_GSTIN_LABEL",
  "MULTI_GSTIN_SUMMARY",
]);

export const multiGstinHandler: ConversationHandler = {
  name: "multi_gstin",
  claims: (state) => CLAIMED_STATES.has(state),
  handle: async (context) => {
    switch (context.session.state) {
      case "MULTI_GSTIN_MENU":
        return handleMenu(context);
      case "MULTI_GSTIN_ADD":
        return addGstin(context);
      case "MULTI_GSTIN_LABEL":
        return labelGstin(context);
      default:
        return switchGstin(context);
    }
  },
};

function handleMenu(context: HandlerContext): HandlerResponse {
  const { input } = context;
  if (input.kind === "menu_choice" && (input.choice === 1 || input.choice === 2)) {
    return transitionTo({
      navigation: { kind: "push", to: input.choice === 1 ? "MULTI_GSTIN_ADD" : "MULTI_GSTIN_SUMMARY" },
      replies: [],
      render_screen: true,
      reason: input.choice === 1 ? "multi_gstin.add" : "multi_gstin.summary",
    });
  }
  return transitionTo(unrecognizedInputTransition(context.session, context.now));
}

async function addGstin(context: HandlerContext): Promise<HandlerResponse> {
  const text = inputText(context.input);
  if (text === null) {
    return transitionTo(unrecognizedInputTransition(context.session, context.now));
  }
  const validated = await invokeFacade(
    { service: "identifiers", operation: "validateGstin", field: "gstin" },
    () => context.services.identifiers.validateGstin(text),
  );
  return transitionTo({
    navigation: { kind: "replace", to: "MULTI_GSTIN_LABEL" },
    data: withData(context.session.data, { pending_gstin: validated.gstin }),
    replies: [],
    render_screen: true,
    reason: "multi_gstin.validated",
  });
}

function labelGstin(context: HandlerContext): HandlerResponse {
  const { session } = context;
  const pending = readDataString(session.data, "pending_gstin");
  const text = inputText(context.input);
  if (!pending || text === null) {
    return transitionTo(unrecognizedInputTransition(session, context.now));
  }

  const label = parseLabel(text);
  const registered = readRegisteredGstins(session.data).filter((entry) => entry.gstin !== pending);
  const next = [...registered, { gstin: pending, label }];

  return transitionTo({
    navigation: { kind: "replace", to: "MULTI_GSTIN_MENU" },
    data: withData(session.data, {
      additional_gstins: next,
      multi_gstin: next.length > 1,
      gstin: readDataString(session.data, "gstin") ?? pending,
      pending_gstin: undefined,
    }),
    replies: [screenNotice("MULTI_GSTIN_ADDED", session, { gstin: pending, label })],
    render_screen: true,
    reason: "multi_gstin.added",
  });
}

function switchGstin(context: HandlerContext): HandlerResponse {
  const { input, session } = context;
  const registered = readRegisteredGstins(session.data);
  const selected = input.kind === "menu_choice" ? registered[input.choice - 1] : undefined;

  if (!selected) {
    return transitionTo({
      navigation: { kind: "pop" },
      replies: [],
      render_screen: true,
      reason: "multi_gstin.summary_closed",
    });
  }
  return transitionTo({
    navigation: { kind: "pop" },
    data: withData(session.data, { gstin: selected.gstin }),
    replies: [screenNotice("MULTI_GSTIN_SWITCHED", session, { gstin: selected.gstin })],
    render_screen: true,
    reason: "multi_gstin.switched",
  });
}
