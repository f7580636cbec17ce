export { GameSession } from "./game-session.js";
export type { GameSessionOptions } from "./game-session.js";
export { HistoryLog, DEFAULT_HISTORY_CAPACITY } from "./history-log.js";
export { ExplorationGraph } from "./exploration-graph.js";
export { SaveSlotStore } from "./save-slot-store.js";
export { VocabularyIndex, findMatches, VOCABULARY_PREFIX_LENGTH } from "./vocabulary-index.js";
export type { VocabularyReport } from "./vocabulary-index.js";
export { parseItemName } from "./inventory-parser.js";
export { extractLocation, isMovementAction, MOVEMENT_ACTIONS } from "./location.js";
export { SerialQueue } from "./serial-queue.js";
export {
  formatStepResult,
  formatMemory,
  formatMap,
  formatInventory,
  formatValidActions,
  formatVocabulary,
} from "./format.js";
