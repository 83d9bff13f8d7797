import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { bodyLimit } from "hono/body-limit";
import type { WebUIServerDeps } from "./types.js";
import { createLogger } from "../utils/logger.js";
import { bearerAuth, generateToken, maskToken } from "./middleware/auth.js";
import { createStatusRoutes } from "./routes/status.js";
import { createHandlersRoutes } from "./routes/handlers.js";

const log = createLogger("WebUI");

/** Local admin API: status, handler listing and forced reload */
export class WebUIServer {
  private app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private deps: WebUIServerDeps;
  private authToken: string;

  constructor(deps: WebUIServerDeps) {
    this.deps = deps;
    this.app = new Hono();

    // Generate or use configured auth token
    this.authToken = deps.config.auth_token || generateToken();

    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware() {
    if (this.deps.config.log_requests) {
      this.app.use("*", async (c, next) => {
        const start = Date.now();
        await next();
        const duration = Date.now() - start;
        log.info(`${c.req.method} ${c.req.path} → ${c.res.status} (${duration}ms)`);
      });
    }

    this.app.use(
      "*",
      bodyLimit({
        maxSize: 64 * 1024,
        onError: (c) => c.json({ success: false, error: "Request body too large" }, 413),
      })
    );

    this.app.use("*", async (c, next) => {
      await next();
      c.res.headers.set("X-Content-Type-Options", "nosniff");
      c.res.headers.set("X-Frame-Options", "DENY");
    });

    this.app.use(
      "/api/*",
      bearerAuth(() => this.authToken)
    );
  }

  private setupRoutes() {
    // Health check (no auth)
    this.app.get("/health", (c) => c.json({ status: "ok" }));

    this.app.route("/api/status", createStatusRoutes(this.deps));
    this.app.route("/api/handlers", createHandlersRoutes(this.deps));

    this.app.notFound((c) => c.json({ success: false, error: "Not found" }, 404));

    this.app.onError((err, c) => {
      log.error({ err }, "WebUI error");
      return c.json({ success: false, error: err.message || "Internal server error" }, 500);
    });
  }

  getApp(): Hono {
    return this.app;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.server = serve(
          {
            fetch: this.app.fetch,
            hostname: this.deps.config.host,
            port: this.deps.config.port,
          },
          (info) => {
            log.info(`WebUI server running at http://${info.address}:${info.port}`);
            log.info(`Token: ${maskToken(this.authToken)} (send as Bearer header)`);
            resolve();
          }
        );
      } catch (error) {
        reject(error);
      }
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve) => {
      server.close(() => {
        log.info("WebUI server stopped");
        resolve();
      });
    });
  }

  getToken(): string {
    return this.authToken;
  }
}
