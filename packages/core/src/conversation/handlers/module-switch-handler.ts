import { clearFlowData, readDataString, withData } from "../../session/session.ts";
import {
  FREE_INPUT_STATES,
  isConversationState,
  moduleMenuForState,
  type ConversationState,
  type ModuleMenuState,
} from "../../session/states.ts";
import { inputText } from "../input-classifier.ts";
import { unrecognizedInputTransition } from "../transitions.ts";
import {
  PASS,
  transitionTo,
  type ConversationHandler,
  type HandlerContext,
  type HandlerResponse,
} from "../types.ts";

type SwitchableModule = Extract<ModuleMenuState, "GST_MENU" | "ITR_MENU">;

const MODULE_KEYWORDS: ReadonlyMap<string, SwitchableModule> = new Map([
  ["gst", "GST_MENU"],
  ["itr", "ITR_MENU"],
  ["income tax", "ITR_MENU"],
]);

export const moduleSwitchHandler: ConversationHandler = {
  name: "module_switch",
  claims: (state) => state === "CONFIRM_SWITCH_MODULE" || isSwitchableModule(moduleMenuForState(state)),
  handle: async (context) => {
    if (context.session.state === "CONFIRM_SWITCH_MODULE") {
      return handleSwitchConfirmation(context);
    }
    if (FREE_INPUT_STATES.has(context.session.state)) {
      return PASS;
    }

    const text = inputText(context.input)?.toLowerCase() ?? null;
    const target = text === null ? undefined : MODULE_KEYWORDS.get(text);
    const current = moduleMenuForState(context.session.state);
    if (!target || target === current) {
      return PASS;
    }

    return transitionTo({
      navigation: { kind: "replace", to: "CONFIRM_SWITCH_MODULE" },
      data: withData(context.session.data, {
        switch_target_module: target,
        switch_source_state: context.session.state,
      }),
      replies: [],
      render_screen: true,
      reason: "module_switch.requested",
    });
  },
};

function handleSwitchConfirmation(context: HandlerContext): HandlerResponse {
  const { session, input } = context;
  const data = session.data;
  const target = readDataString(data, "switch_target_module");
  const source = readDataString(data, "switch_source_state");
  const sourceState: ConversationState = isConversationState(source) ? source : "MAIN_MENU";

  if (input.kind === "menu_choice" && input.choice === 1 && isConversationState(target)) {
    return transitionTo({
      navigation: { kind: "reset", to: target },
      data: clearFlowData(data),
      replies: [],
      render_screen: true,
      reason: "module_switch.confirmed",
    });
  }
  if (input.kind === "menu_choice" && input.choice === 2) {
    return transitionTo({
      navigation: { kind: "replace", to: sourceState },
      data: withData(data, { switch_target_module: undefined, switch_source_state: undefined }),
      replies: [],
      render_screen: true,
      reason: "module_switch.declined",
    });
  }
  return transitionTo(unrecognizedInputTransition(session, context.now));
}

function isSwitchableModule(module: ModuleMenuState): module is SwitchableModule {
  return module === "GST_MENU" || module === "ITR_MENU";
}
