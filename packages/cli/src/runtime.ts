import { GameSession } from "@lantern/session";
import { createEngine } from "@lantern/engine";
import { ToolRegistry, ToolRuntime, SessionHost, createGameToolHandlers } from "@lantern/tools";
import type { SessionFactory } from "@lantern/tools";
import type { LanternConfig } from "./config.js";

export interface LanternRuntime {
  registry: ToolRegistry;
  runtime: ToolRuntime;
  host: SessionHost;
}

export function sessionFactory(config: LanternConfig): SessionFactory {
  return async () => {
    const engine = await createEngine({
      kind: config.engine,
      game: config.game,
      storyDir: config.storyDir,
      dfrotzBin: config.dfrotzBin,
      seed: config.seed,
      worldPath: config.worldPath,
    });
    return GameSession.start(engine, config.game);
  };
}

/** Loads the bundled manifests and binds every game tool to one lazily started session. */
export async function createRuntime(factory: SessionFactory, toolsDir?: string): Promise<LanternRuntime> {
  const registry = new ToolRegistry();
  await registry.loadFromDirectory(toolsDir);
  const runtime = new ToolRuntime(registry);
  const host = new SessionHost(factory);
  runtime.registerHandlers(createGameToolHandlers(host));
  return { registry, runtime, host };
}
