export type {
  Transition,
  GameEngine,
  EngineKind,
  HistoryEntry,
  SessionSnapshot,
  ExecutionMode,
  ToolManifest,
  ToolExecutionRequest,
  ToolCallBody,
  ToolExecutionResult,
  ToolErrorCode,
  ToolHandler,
  WorldRoom,
  WorldItem,
  WorldDefinition,
} from "./types.js";
export {
  EngineFailureError,
  EngineCapabilityError,
  EngineTransitionError,
  SlotNotFoundError,
  GameNotFoundError,
  TimeoutError,
  errorMessage,
} from "./errors.js";
export { withTimeout } from "./timeout.js";
export { ToolManifestSchema } from "./tool-manifest.schema.js";
export { ToolCallBodySchema } from "./tool-call.schema.js";
export { WorldSchema } from "./world.schema.js";
export {
  validateToolManifestData,
  validateToolCallBodyData,
  validateWorldData,
  isToolManifest,
  isToolCallBody,
  isWorldDefinition,
  validateToolInput,
  validateToolOutput,
  clearSchemaCache,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
