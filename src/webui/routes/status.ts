import { Hono } from "hono";
import type { APIResponse, StatusResponse, WebUIServerDeps } from "../types.js";

export function createStatusRoutes(deps: WebUIServerDeps) {
  const app = new Hono();

  app.get("/", (c) => {
    const data: StatusResponse = {
      uptime: Math.floor((Date.now() - deps.startedAt) / 1000),
      connected: deps.bridge.isAvailable(),
      botUsername: deps.bridge.getUsername() ?? null,
      handlerCount: deps.registry.count,
      sessionCount: deps.sessions.size,
    };
    const response: APIResponse<StatusResponse> = { success: true, data };
    return c.json(response);
  });

  return app;
}
