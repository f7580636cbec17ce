export { ToolRegistry, DEFAULT_TOOLS_DIR } from "./tool-registry.js";
export type { ToolSummary } from "./tool-registry.js";
export { ToolRuntime, createRequest } from "./tool-runtime.js";
export type { ToolHandler } from "./tool-runtime.js";
export { SessionHost } from "./session-host.js";
export type { SessionFactory } from "./session-host.js";
export { createGameToolHandlers, GAME_TOOL_NAMES } from "./game-tools.js";
export type { GameToolName } from "./game-tools.js";
