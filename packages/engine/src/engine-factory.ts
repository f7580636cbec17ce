import type { EngineKind, GameEngine } from "@lantern/schemas";
import { FrotzEngine } from "./frotz-engine.js";
import { ScriptedEngine } from "./scripted-engine.js";
import { resolveStoryFile } from "./game-catalog.js";

export interface EngineConfig {
  kind: EngineKind;
  game: string;
  storyDir: string;
  dfrotzBin?: string;
  seed?: number;
  worldPath?: string;
}

export async function createEngine(config: EngineConfig): Promise<GameEngine> {
  if (config.kind === "scripted") {
    return ScriptedEngine.fromFile(config.worldPath);
  }
  const storyPath = await resolveStoryFile(config.storyDir, config.game);
  console.log(`[engine] Using ${storyPath}`);
  return new FrotzEngine({ storyPath, binary: config.dfrotzBin, seed: config.seed });
}
