import { createHandlerChain, type HandlerChain } from "../handler-chain.ts";
import { creditCheckHandler } from "./credit-check-handler.ts";
import { einvoiceHandler } from "./einvoice-handler.ts";
import { ewaybillHandler } from "./ewaybill-handler.ts";
import { moduleSwitchHandler } from "./module-switch-handler.ts";
import { multiGstinHandler } from "./multi-gstin-handler.ts";
import { notificationPreferencesHandler } from "./notification-preferences-handler.ts";
import { createSessionExpiryHandler, type SessionExpiryOptions } from "./session-expiry-handler.ts";

/** Priority order is part of the contract; expiry must see every event first. */
export function createDefaultHandlerChain(options: SessionExpiryOptions = {}): HandlerChain {
  return createHandlerChain([
    createSessionExpiryHandler(options),
    moduleSwitchHandler,
    einvoiceHandler,
    ewaybillHandler,
    creditCheckHandler,
    multiGstinHandler,
    notificationPreferencesHandler,
  ]);
}
