import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Responder } from "@lantern/session/testing";
import { FakeEngine, makeTransition, roomWorld, describeRoom } from "@lantern/session/testing";
import { GameSession } from "@lantern/session";
import { ToolRegistry } from "./tool-registry.js";
import { ToolRuntime, createRequest } from "./tool-runtime.js";
import { SessionHost } from "./session-host.js";
import { createGameToolHandlers, GAME_TOOL_NAMES } from "./game-tools.js";

const rooms = roomWorld({
  "West of House": { north: "North of House" },
  "North of House": { south: "West of House" },
});
const respond: Responder = (action, previous) =>
  action === "jump" ? new Error("pipe closed") : rooms(action, previous);

describe("game tools", () => {
  let engines: FakeEngine[];
  let host: SessionHost;
  let runtime: ToolRuntime;

  const run = async (tool: string, input: Record<string, unknown> = {}) =>
    runtime.execute(createRequest(tool, input));
  const text = async (tool: string, input: Record<string, unknown> = {}) => {
    const result = await run(tool, input);
    const value = result.result;
    if (typeof value !== "object" || value === null || !("text" in value) || typeof value.text !== "string") {
      throw new Error(`${tool} gave no text: ${JSON.stringify(result)}`);
    }
    return value.text;
  };

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    engines = [];
    host = new SessionHost(() => {
      const engine = new FakeEngine({
        initial: makeTransition(describeRoom("West of House")),
        respond,
        validActions: () => ["north", "look"],
      });
      engines.push(engine);
      return GameSession.start(engine, "zork1");
    });
    const registry = new ToolRegistry();
    await registry.loadFromDirectory();
    runtime = new ToolRuntime(registry);
    runtime.registerHandlers(createGameToolHandlers(host));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("provides a handler for every game tool", () => {
    expect(Object.keys(createGameToolHandlers(host)).sort()).toEqual([...GAME_TOOL_NAMES].sort());
  });

  it("plays an action and reports score and moves", async () => {
    expect(await text("play_action", { action: "north" })).toBe(
      "North of House\nYou see nothing special.\n\n[Score: 0 | Moves: 1]",
    );
    expect(engines[0]?.actions).toEqual(["north"]);
  });

  it("answers the derived views", async () => {
    await text("play_action", { action: "north" });
    expect(await text("get_map")).toBe(
      "Explored Locations and Exits:\n\n* West of House\n    -> north -> North of House\n\n[Current] North of House",
    );
    expect(await text("inventory")).toBe("Inventory: You are empty-handed.");
    expect(await text("valid_actions")).toBe("Valid Actions:\n  - north\n  - look");
    expect(await text("memory")).toContain("- Location: North of House");
  });

  it("turns engine query failures into text", async () => {
    expect(await text("check_vocabulary", { word: "lamp" })).toBe("Could not check vocabulary: dictionary not scripted");
  });

  it("saves and loads slots by name", async () => {
    expect(await text("save_state", { slot_name: "start" })).toBe("Game saved successfully to slot: 'start'");
    await text("play_action", { action: "north" });
    expect(await text("load_state", { slot_name: "start" })).toBe(
      "Game loaded from slot: 'start'.\nCurrent location: West of House\nYou see nothing special.",
    );
    expect(await text("load_state", { slot_name: "nope" })).toBe("Error: No save found in slot 'nope'");
  });

  it("rejects input the manifest does not allow", async () => {
    expect((await run("play_action", {})).error?.code).toBe("INVALID_INPUT");
    expect((await run("play_action", { action: "" })).error?.code).toBe("INVALID_INPUT");
    expect((await run("memory", { verbose: true })).error?.code).toBe("INVALID_INPUT");
    expect(engines).toHaveLength(0);
  });

  it("answers mock mode from the manifest without starting a session", async () => {
    const result = await runtime.execute(createRequest("inventory", {}, "mock"));
    expect(result.result).toEqual({ text: "Inventory: You are empty-handed." });
    expect(engines).toHaveLength(0);
  });

  it("reports a failed step as SESSION_FATAL and starts a fresh session next time", async () => {
    await text("play_action", { action: "north" });
    const result = await run("play_action", { action: "jump" });
    expect(result.error).toEqual({ code: "SESSION_FATAL", message: 'Engine failed on "jump": pipe closed' });
    expect(engines[0]?.closed).toBe(true);
    expect(host.active).toBeNull();

    expect(await text("memory")).toContain("- Location: West of House");
    expect(engines).toHaveLength(2);
  });
});

describe("SessionHost", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts the session once for concurrent callers", async () => {
    const factory = vi.fn(() => GameSession.start(new FakeEngine(), "zork1"));
    const host = new SessionHost(factory);
    const [a, b] = await Promise.all([host.session(), host.session()]);
    expect(a).toBe(b);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith('[session] Started "zork1"');
  });

  it("has no snapshot until the session starts", async () => {
    const host = new SessionHost(() => GameSession.start(new FakeEngine(), "zork1"));
    expect(host.snapshot()).toBeNull();
    await host.session();
    expect(host.snapshot()).toMatchObject({ game: "zork1", location: "West of House", moves: 0 });
  });

  it("retries the factory after a failed start", async () => {
    const factory = vi.fn()
      .mockRejectedValueOnce(new Error("story file missing"))
      .mockImplementation(() => GameSession.start(new FakeEngine(), "zork1"));
    const host = new SessionHost(factory);
    await expect(host.session()).rejects.toThrow("story file missing");
    await expect(host.session()).resolves.toBeInstanceOf(GameSession);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it("closes the engine on close", async () => {
    const engine = new FakeEngine();
    const host = new SessionHost(() => GameSession.start(engine, "zork1"));
    await host.session();
    await host.close();
    expect(engine.closed).toBe(true);
    expect(host.active).toBeNull();
  });
});
