import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import http from "node:http";
import { createServer } from "node:http";
import type { AddressInfo } from "node:net";
import { v4 as uuid } from "uuid";
import { ToolRegistry, ToolRuntime, SessionHost, createGameToolHandlers } from "@lantern/tools";
import { GameSession } from "@lantern/session";
import { FakeEngine, makeTransition, roomWorld, describeRoom } from "@lantern/session/testing";
import { ApiServer, statusFor } from "./server.js";

const TOKEN = "test-secret";

async function fetch(url: string, opts?: { method?: string; body?: unknown; raw?: string; headers?: Record<string, string> }) {
  const { method = "GET", body, raw, headers: extraHeaders } = opts ?? {};
  const payload = raw ?? (body !== undefined ? JSON.stringify(body) : undefined);
  const headers: Record<string, string> = { ...(payload ? { "Content-Type": "application/json" } : {}), ...extraHeaders };
  return new Promise<{ status: number; json: () => Promise<any> }>((resolve, reject) => {
    const req = http.request(url, { method, headers }, (res) => {
      let data = "";
      res.on("data", (chunk: string) => { data += chunk; });
      res.on("end", () => {
        resolve({ status: res.statusCode ?? 0, json: async () => JSON.parse(data) });
      });
    });
    req.on("error", reject);
    if (payload) req.write(payload);
    req.end();
  });
}

const rooms = roomWorld({ "West of House": { north: "North of House" } });

describe("ApiServer", () => {
  let apiServer: ApiServer;
  let httpServer: ReturnType<typeof createServer>;
  let baseUrl: string;
  const auth = { Authorization: `Bearer ${TOKEN}` };

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const registry = new ToolRegistry();
    await registry.loadFromDirectory();
    const runtime = new ToolRuntime(registry);
    const host = new SessionHost(() => GameSession.start(new FakeEngine({
      initial: makeTransition(describeRoom("West of House")),
      respond: (action, previous) => (action === "jump" ? new Error("pipe closed") : rooms(action, previous)),
    }), "zork1"));
    runtime.registerHandlers(createGameToolHandlers(host));
    apiServer = new ApiServer({ toolRegistry: registry, toolRuntime: runtime, sessionHost: host, apiToken: TOKEN });

    await new Promise<void>((resolve) => {
      httpServer = createServer(apiServer.getExpressApp());
      httpServer.listen(0, () => {
        const addr = httpServer.address() as AddressInfo;
        baseUrl = `http://127.0.0.1:${addr.port}`;
        resolve();
      });
    });
  });

  afterEach(async () => {
    await apiServer.shutdown();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    vi.restoreAllMocks();
  });

  it("reports health without authentication", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toMatchObject({ status: "ok", tools: 8, session: null });
  });

  it("rejects requests without a valid bearer token", async () => {
    expect((await fetch(`${baseUrl}/api/tools`)).status).toBe(401);
    const wrong = await fetch(`${baseUrl}/api/tools`, { headers: { Authorization: "Bearer wrong-secret" } });
    expect(wrong.status).toBe(401);
    expect(await wrong.json()).toEqual({ error: "Unauthorized" });
  });

  it("lists the tools", async () => {
    const res = await fetch(`${baseUrl}/api/tools`, { headers: auth });
    expect(res.status).toBe(200);
    const { tools } = await res.json();
    expect(tools).toHaveLength(8);
    expect(tools[0]).toMatchObject({ name: "check_vocabulary", version: "1.0.0" });
    expect(tools[0]).not.toHaveProperty("output_schema");
  });

  it("returns one manifest or 404", async () => {
    const found = await fetch(`${baseUrl}/api/tools/save_state`, { headers: auth });
    expect((await found.json()).timeout_ms).toBe(30000);
    expect((await fetch(`${baseUrl}/api/tools/nope`, { headers: auth })).status).toBe(404);
  });

  it("runs a tool against the live session", async () => {
    const res = await fetch(`${baseUrl}/api/tools/play_action`, {
      method: "POST", headers: auth, body: { input: { action: "north" } },
    });
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toMatchObject({ ok: true, mode: "live", result: { text: "North of House\nYou see nothing special.\n\n[Score: 0 | Moves: 1]" } });

    const health = await (await fetch(`${baseUrl}/api/health`)).json();
    expect(health.session).toMatchObject({ game: "zork1", location: "North of House", moves: 1, history_length: 1 });
  });

  it("keeps the caller's request id", async () => {
    const id = uuid();
    const res = await fetch(`${baseUrl}/api/tools/memory`, { method: "POST", headers: auth, body: { request_id: id } });
    expect((await res.json()).request_id).toBe(id);
  });

  it("answers mock mode without starting a session", async () => {
    const res = await fetch(`${baseUrl}/api/tools/get_map`, { method: "POST", headers: auth, body: { mode: "mock" } });
    expect(await res.json()).toMatchObject({ ok: true, mode: "mock", result: { text: "Map: No locations explored yet. Try moving around!" } });
    expect((await (await fetch(`${baseUrl}/api/health`)).json()).session).toBeNull();
  });

  it("maps tool errors to status codes", async () => {
    const missing = await fetch(`${baseUrl}/api/tools/teleport`, { method: "POST", headers: auth, body: {} });
    expect(missing.status).toBe(404);
    expect((await missing.json()).error.code).toBe("TOOL_NOT_FOUND");

    const invalid = await fetch(`${baseUrl}/api/tools/play_action`, { method: "POST", headers: auth, body: { input: {} } });
    expect(invalid.status).toBe(400);
    expect((await invalid.json()).error.code).toBe("INVALID_INPUT");

    const fatal = await fetch(`${baseUrl}/api/tools/play_action`, { method: "POST", headers: auth, body: { input: { action: "jump" } } });
    expect(fatal.status).toBe(500);
    expect((await fatal.json()).error).toEqual({ code: "SESSION_FATAL", message: 'Engine failed on "jump": pipe closed' });
  });

  it("rejects a malformed call body", async () => {
    const res = await fetch(`${baseUrl}/api/tools/memory`, { method: "POST", headers: auth, body: { mode: "dry_run" } });
    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body.ok).toBe(false);
    expect(body.error.message).toMatch(/^Invalid request body: \/mode/);
  });

  it("rejects JSON it cannot parse", async () => {
    const res = await fetch(`${baseUrl}/api/tools/memory`, { method: "POST", headers: auth, raw: "{not json" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: { code: "INVALID_INPUT", message: "Malformed request body" } });
  });
});

describe("ApiServer configuration", () => {
  const deps = () => {
    const registry = new ToolRegistry();
    return {
      toolRegistry: registry,
      toolRuntime: new ToolRuntime(registry),
      sessionHost: new SessionHost(() => GameSession.start(new FakeEngine(), "zork1")),
    };
  };

  it("refuses to start without a token unless insecure", () => {
    expect(() => new ApiServer(deps())).toThrow("API token is required");
  });

  it("starts without a token in insecure mode", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(() => new ApiServer({ ...deps(), insecure: true })).not.toThrow();
    expect(warn).toHaveBeenCalledWith("[api] WARNING: Running in insecure mode; all endpoints are unauthenticated.");
    warn.mockRestore();
  });
});

describe("statusFor", () => {
  it("maps result codes to HTTP statuses", () => {
    const base = { request_id: "r", duration_ms: 1, mode: "live" as const };
    expect(statusFor({ ...base, ok: true, result: { text: "" } })).toBe(200);
    expect(statusFor({ ...base, ok: false, error: { code: "INVALID_INPUT", message: "" } })).toBe(400);
    expect(statusFor({ ...base, ok: false, error: { code: "TOOL_NOT_FOUND", message: "" } })).toBe(404);
    expect(statusFor({ ...base, ok: false, error: { code: "TIMEOUT", message: "" } })).toBe(500);
  });
});
