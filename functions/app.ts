import { textResponse, type FetchHandler } from "./_shared/http.ts";

export const WEBHOOK_PATH = "/webhooks/whatsapp";
export const HEALTH_PATH = "/health";
export const OPERATOR_PREFIX = "/operator/";

export type AppRoutes = {
  webhook: FetchHandler;
  operator: FetchHandler;
  health: FetchHandler;
};

export function createAppHandler(routes: AppRoutes): FetchHandler {
  return async (req) => {
    const { pathname } = new URL(req.url);
    if (pathname === WEBHOOK_PATH) {
      return routes.webhook(req);
    }
    if (pathname === HEALTH_PATH) {
      return routes.health(req);
    }
    if (pathname.startsWith(OPERATOR_PREFIX)) {
      return routes.operator(req);
    }
    return textResponse("Not Found", 404);
  };
}
