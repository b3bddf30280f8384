import { invokeFacade } from "../../facades/invoke.ts";
import type { NotificationPreferences } from "../../facades/types.ts";
import { withData } from "../../session/session.ts";
import { screenNotice, unrecognizedInputTransition } from "../transitions.ts";
import { transitionTo, type ConversationHandler } from "../types.ts";

export const NOTIFICATION_PRESETS: Readonly<Record<number, NotificationPreferences>> = {
  1: { filing_reminders: true, risk_alerts: true, status_updates: true },
  2: { filing_reminders: true, risk_alerts: false, status_updates: false },
  3: { filing_reminders: false, risk_alerts: true, status_updates: false },
  4: { filing_reminders: true, risk_alerts: true, status_updates: false },
  5: { filing_reminders: false, risk_alerts: false, status_updates: false },
};

export const notificationPreferencesHandler: ConversationHandler = {
  name: "notification_preferences",
  claims: (state) => state === "NOTIFICATION_SETTINGS",
  handle: async (context) => {
    const { input, session } = context;
    const preferences = input.kind === "menu_choice" ? NOTIFICATION_PRESETS[input.choice] : undefined;
    if (!preferences) {
      return transitionTo(unrecognizedInputTransition(session, context.now));
    }

    const scheduled = await invokeFacade(
      { service: "notifications", operation: "updatePreferences" },
      () => context.services.notifications.updatePreferences({ user_id: session.user_id, preferences }),
    );

    return transitionTo({
      navigation: { kind: "replace", to: "SETTINGS_MENU" },
      data: withData(session.data, { notification_prefs: { ...preferences } }),
      replies: [
        screenNotice("NOTIFICATIONS_UPDATED", session, {
          scheduled_reminders: scheduled.scheduled_reminders,
        }),
      ],
      render_screen: true,
      reason: "notifications.updated",
    });
  },
};
