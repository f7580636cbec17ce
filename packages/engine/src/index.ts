export { FrotzEngine, DFROTZ_BIN } from "./frotz-engine.js";
export type { FrotzEngineOptions, FrotzSnapshot } from "./frotz-engine.js";
export { parseFrotzOutput, isGameOver, InventoryTracker, NO_RESPONSE } from "./frotz-output.js";
export type { FrotzScreen } from "./frotz-output.js";
export { ScriptedEngine, loadWorld, checkReferences, DEFAULT_WORLD_PATH } from "./scripted-engine.js";
export type { ScriptedSnapshot } from "./scripted-engine.js";
export { readDictionary } from "./z-dictionary.js";
export { listStoryFiles, listAvailableGames, resolveStoryFile } from "./game-catalog.js";
export type { StoryFile } from "./game-catalog.js";
export { createEngine } from "./engine-factory.js";
export type { EngineConfig } from "./engine-factory.js";
