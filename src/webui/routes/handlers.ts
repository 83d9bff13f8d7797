import { Hono } from "hono";
import type {
  APIResponse,
  HandlerInfo,
  HandlerReloadResponse,
  WebUIServerDeps,
} from "../types.js";
import { getErrorMessage } from "../../utils/errors.js";

export function createHandlersRoutes(deps: WebUIServerDeps) {
  const app = new Hono();

  app.get("/", (c) => {
    const data: HandlerInfo[] = deps.registry
      .snapshot()
      .map((h) => ({ name: h.name, file: h.file }));
    const response: APIResponse<HandlerInfo[]> = { success: true, data };
    return c.json(response);
  });

  // Full reload, regardless of what the hot-reload monitor saw
  app.post("/reload", async (c) => {
    try {
      const report = await deps.registry.reload();
      const data: HandlerReloadResponse = {
        directory: report.directory,
        loaded: report.loaded,
        skipped: [],
        errors: [],
      };
      for (const outcome of report.outcomes) {
        if (outcome.status === "skipped") {
          data.skipped.push({ name: outcome.name, reason: outcome.reason });
        } else if (outcome.status === "error") {
          data.errors.push({ name: outcome.name, error: outcome.error });
        }
      }
      const response: APIResponse<HandlerReloadResponse> = { success: true, data };
      return c.json(response);
    } catch (error) {
      const response: APIResponse = { success: false, error: getErrorMessage(error) };
      return c.json(response, 500);
    }
  });

  return app;
}
