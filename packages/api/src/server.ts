import express from "express";
import type { Server } from "node:http";
import { timingSafeEqual } from "node:crypto";
import type { ToolRegistry, ToolRuntime, SessionHost } from "@lantern/tools";
import { createRequest } from "@lantern/tools";
import type { ToolErrorCode, ToolExecutionResult } from "@lantern/schemas";
import { isToolCallBody, validateToolCallBodyData } from "@lantern/schemas";

const API_VERSION = "0.1.0";

/** Error logging without stack traces in production. */
function logError(label: string, err: unknown): void {
  if (process.env.NODE_ENV === "production") {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`[api] ${label}: ${msg}`);
  } else {
    console.error(`[api] ${label}:`, err);
  }
}

const STATUS_BY_CODE: Record<ToolErrorCode, number> = {
  TOOL_NOT_FOUND: 404,
  INVALID_INPUT: 400,
  INVALID_OUTPUT: 500,
  SESSION_FATAL: 500,
  TIMEOUT: 500,
  EXECUTION_ERROR: 500,
};

export function statusFor(result: ToolExecutionResult): number {
  if (result.ok) return 200;
  return result.error ? STATUS_BY_CODE[result.error.code] : 500;
}

function sameToken(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function hasStatus(err: unknown): err is { status: number } {
  return typeof err === "object" && err !== null && "status" in err && typeof err.status === "number";
}

export interface ApiServerConfig {
  toolRegistry: ToolRegistry;
  toolRuntime: ToolRuntime;
  sessionHost: SessionHost;
  apiToken?: string;
  /** Set to true to explicitly allow running without an API token. */
  insecure?: boolean;
}

export class ApiServer {
  private app: express.Application;
  private toolRegistry: ToolRegistry;
  private toolRuntime: ToolRuntime;
  private sessionHost: SessionHost;
  private apiToken?: string;
  private httpServer?: Server;

  constructor(config: ApiServerConfig) {
    this.toolRegistry = config.toolRegistry;
    this.toolRuntime = config.toolRuntime;
    this.sessionHost = config.sessionHost;
    this.apiToken = config.apiToken || undefined;
    if (!this.apiToken) {
      if (config.insecure !== true) {
        throw new Error(
          "API token is required. Set LANTERN_API_TOKEN or pass insecure: true (--insecure) to allow unauthenticated access."
        );
      }
      console.warn("[api] WARNING: Running in insecure mode; all endpoints are unauthenticated.");
    }

    this.app = express();
    this.app.use(express.json({ limit: "1mb" }));
    // Security headers
    this.app.use((_req, res, next) => {
      res.setHeader("X-Content-Type-Options", "nosniff");
      res.setHeader("X-Frame-Options", "DENY");
      res.setHeader("Cache-Control", "no-store");
      next();
    });
    this.setupRoutes();
    this.app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      const status = hasStatus(err) && err.status >= 400 && err.status < 500 ? err.status : 500;
      if (status === 500) logError("unhandled request error", err);
      res.status(status).json({
        ok: false,
        error: status === 500
          ? { code: "EXECUTION_ERROR", message: "Internal server error" }
          : { code: "INVALID_INPUT", message: "Malformed request body" },
      });
    });
  }

  listen(port: number): Server {
    const server = this.app.listen(port, () => {
      const addr = server.address();
      const actualPort = typeof addr === "object" && addr ? addr.port : port;
      console.log(`[api] Lantern API listening on http://localhost:${actualPort}`);
    });
    this.httpServer = server;
    return server;
  }

  async shutdown(): Promise<void> {
    await this.sessionHost.close();
    const server = this.httpServer;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
      this.httpServer = undefined;
    }
  }

  getExpressApp(): express.Application { return this.app; }

  private setupRoutes(): void {
    const router = express.Router();

    // Health check is always unauthenticated
    router.get("/health", (_req, res) => {
      res.json({
        status: "ok",
        version: API_VERSION,
        timestamp: new Date().toISOString(),
        tools: this.toolRegistry.list().length,
        session: this.sessionHost.snapshot(),
      });
    });

    // Bearer token auth for every route after /health
    if (this.apiToken) {
      const token = this.apiToken;
      router.use((req, res, next) => {
        const auth = req.headers.authorization;
        if (!auth || !auth.startsWith("Bearer ") || !sameToken(auth.slice(7), token)) {
          console.warn(`[api] AUTH_FAIL: ${req.method} ${req.path.replace(/[\r\n]/g, "")}`);
          res.status(401).json({ error: "Unauthorized" });
          return;
        }
        // Strip the raw token so it cannot leak in error handler logs
        delete req.headers.authorization;
        next();
      });
    }

    router.get("/tools", (_req, res) => {
      res.json({ tools: this.toolRegistry.summaries() });
    });

    router.get("/tools/:name", (req, res) => {
      const tool = this.toolRegistry.get(req.params.name ?? "");
      if (!tool) { res.status(404).json({ error: "Tool not found" }); return; }
      res.json(tool);
    });

    router.post("/tools/:name", async (req, res) => {
      const body: unknown = req.body ?? {};
      if (!isToolCallBody(body)) {
        const message = `Invalid request body: ${validateToolCallBodyData(body).errors.join(", ")}`;
        res.status(400).json({ ok: false, error: { code: "INVALID_INPUT", message } });
        return;
      }
      try {
        const request = createRequest(req.params.name ?? "", body.input ?? {}, body.mode ?? "live", body.request_id);
        const result = await this.toolRuntime.execute(request);
        res.status(statusFor(result)).json(result);
      } catch (err) {
        logError(`POST /tools/${req.params.name ?? ""}`, err);
        res.status(500).json({ ok: false, error: { code: "EXECUTION_ERROR", message: "Internal server error" } });
      }
    });

    this.app.use("/api", router);
  }
}
