import { resolve } from "node:path";
import type { EngineKind } from "@lantern/schemas";

export const DEFAULT_GAME = "zork1";
export const DEFAULT_STORY_DIR = "games";
export const DEFAULT_DFROTZ_BIN = "dfrotz";
export const DEFAULT_SEED = 42;
export const DEFAULT_PORT = 3200;

export interface LanternConfig {
  game: string;
  engine: EngineKind;
  storyDir: string;
  dfrotzBin: string;
  seed: number;
  worldPath?: string;
  port: number;
  apiToken?: string;
}

/** Flag values as commander hands them over; every one is optional and wins over the environment. */
export interface ConfigOverrides {
  game?: string;
  engine?: string;
  storyDir?: string;
  seed?: string;
  world?: string;
  port?: string;
}

export function parsePort(value: string, label = "port"): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid ${label}: "${value}" (must be 1–65535)`);
  }
  return port;
}

export function parseSeed(value: string, label = "seed"): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n)) {
    throw new Error(`Invalid ${label}: "${value}" (must be a non-negative integer)`);
  }
  return n;
}

export function parseEngineKind(value: string, label = "engine"): EngineKind {
  if (value === "frotz" || value === "scripted") return value;
  throw new Error(`Invalid ${label}: "${value}" (must be "frotz" or "scripted")`);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== "" ? value : undefined;
}

/**
 * Merges flags over LANTERN_* environment variables over defaults.
 * Malformed numbers and engine names throw rather than fall back.
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): LanternConfig {
  const engine = overrides.engine ?? nonEmpty(env.LANTERN_ENGINE);
  const seed = overrides.seed ?? nonEmpty(env.LANTERN_SEED);
  const port = overrides.port ?? nonEmpty(env.LANTERN_PORT);
  const world = overrides.world ?? nonEmpty(env.LANTERN_WORLD);

  return {
    game: overrides.game ?? nonEmpty(env.GAME) ?? DEFAULT_GAME,
    engine: engine !== undefined ? parseEngineKind(engine, overrides.engine ? "--engine" : "LANTERN_ENGINE") : "frotz",
    storyDir: resolve(overrides.storyDir ?? nonEmpty(env.LANTERN_STORY_DIR) ?? DEFAULT_STORY_DIR),
    dfrotzBin: nonEmpty(env.LANTERN_DFROTZ_BIN) ?? DEFAULT_DFROTZ_BIN,
    seed: seed !== undefined ? parseSeed(seed, overrides.seed ? "--seed" : "LANTERN_SEED") : DEFAULT_SEED,
    worldPath: world !== undefined ? resolve(world) : undefined,
    port: port !== undefined ? parsePort(port, overrides.port ? "--port" : "LANTERN_PORT") : DEFAULT_PORT,
    apiToken: nonEmpty(env.LANTERN_API_TOKEN),
  };
}
