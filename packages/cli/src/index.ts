#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { ApiServer } from "@lantern/api";
import { listStoryFiles } from "@lantern/engine";
import { ToolRegistry } from "@lantern/tools";
import { resolveConfig } from "./config.js";
import type { ConfigOverrides } from "./config.js";
import { createRuntime, sessionFactory } from "./runtime.js";
import { PlayClient, RealTerminalIO } from "./play-client.js";

// Global error handlers
process.on("unhandledRejection", (reason) => {
  console.error("[lantern] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[lantern] Uncaught exception:", err);
  process.exit(1);
});

const program = new Command();
program.name("lantern").description("Play text adventures through a validated tool interface").version("0.1.0");

function gameOptions(cmd: Command): Command {
  return cmd
    .option("-g, --game <name>", "Game to load (defaults to GAME or zork1)")
    .option("-e, --engine <kind>", "Engine: frotz or scripted (defaults to LANTERN_ENGINE or frotz)")
    .option("--story-dir <dir>", "Directory of story files (defaults to LANTERN_STORY_DIR or ./games)")
    .option("--seed <n>", "Random seed passed to dfrotz (defaults to LANTERN_SEED or 42)")
    .option("--world <file>", "World file for the scripted engine (defaults to LANTERN_WORLD or the bundled world)");
}

// ─── Play Command ─────────────────────────────────────────────────

gameOptions(program.command("play").description("Play a game interactively"))
  .action(async (opts: ConfigOverrides) => {
    const config = resolveConfig(process.env, opts);
    const { runtime, host } = await createRuntime(sessionFactory(config));
    const client = new PlayClient({
      runtime,
      host,
      terminal: new RealTerminalIO(),
      game: config.game,
      engine: config.engine,
    });
    await client.start();
  });

// ─── Server Command ───────────────────────────────────────────────

gameOptions(program.command("serve").description("Serve the game tools over HTTP"))
  .option("-p, --port <port>", "Port number (defaults to LANTERN_PORT or 3200)")
  .option("--insecure", "Allow running without LANTERN_API_TOKEN")
  .action(async (opts: ConfigOverrides & { insecure?: boolean }) => {
    const config = resolveConfig(process.env, opts);
    const { registry, runtime, host } = await createRuntime(sessionFactory(config));
    console.log(`[lantern] Serving ${config.game} (${config.engine} engine); save slots are in memory only`);
    const apiServer = new ApiServer({
      toolRegistry: registry,
      toolRuntime: runtime,
      sessionHost: host,
      apiToken: config.apiToken,
      insecure: opts.insecure === true,
    });
    apiServer.listen(config.port);

    // Graceful shutdown
    const shutdown = async (): Promise<void> => {
      console.log("\nShutting down...");
      await apiServer.shutdown();
      process.exit(0);
    };
    const onSignal = (): void => {
      shutdown().catch((err: unknown) => {
        console.error("[lantern] Shutdown failed:", err);
        process.exit(1);
      });
    };
    process.on("SIGTERM", onSignal);
    process.on("SIGINT", onSignal);
  });

// ─── Catalog Command ──────────────────────────────────────────────

program.command("games").description("List the story files in the story directory")
  .option("--story-dir <dir>", "Directory of story files (defaults to LANTERN_STORY_DIR or ./games)")
  .action(async (opts: Pick<ConfigOverrides, "storyDir">) => {
    const { storyDir } = resolveConfig(process.env, opts);
    const files = await listStoryFiles(storyDir);
    if (files.length === 0) { console.log(`No story files in ${storyDir}.`); return; }
    for (const file of files) console.log(`${file.game}  ${file.path}`);
  });

// ─── Tool Commands ────────────────────────────────────────────────

const toolsCmd = program.command("tools").description("Tool manifests");
toolsCmd.command("list").description("List registered tools").action(async () => {
  const registry = new ToolRegistry();
  await registry.loadFromDirectory();
  const tools = registry.list();
  if (tools.length === 0) { console.log("No tools registered."); return; }
  for (const tool of tools) {
    console.log(`${tool.name} v${tool.version} (timeout ${tool.timeout_ms}ms)`);
    console.log(`  ${tool.description}\n`);
  }
});

await program.parseAsync(process.argv);
