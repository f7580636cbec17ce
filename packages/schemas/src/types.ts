/**
 * Lantern Core Types
 *
 * Shared data models for engines, the session core and the tool layer.
 */

// ─── Engine ─────────────────────────────────────────────────────────

/** One step's result as reported by a game engine. */
export interface Transition {
  readonly observation: string;
  readonly score: number;
  readonly moves: number;
  readonly reward: number;
  readonly done: boolean;
  /** Opaque per-item descriptors, in whatever shape the engine reports them. */
  readonly inventory: readonly string[];
}

/**
 * Contract every game-stepping engine satisfies. The snapshot type is owned by
 * the engine; callers store and replay it without looking inside.
 */
export interface GameEngine<TSnapshot = unknown> {
  reset(): Promise<Transition>;
  step(action: string): Promise<Transition>;
  getValidActions(): Promise<string[]>;
  getDictionary(): Promise<string[]>;
  getState(): Promise<TSnapshot>;
  setState(snapshot: TSnapshot): Promise<void>;
  close(): Promise<void>;
}

export type EngineKind = "frotz" | "scripted";

// ─── Session ────────────────────────────────────────────────────────

export interface HistoryEntry {
  readonly action: string;
  readonly result: string;
}

export interface SessionSnapshot {
  game: string;
  location: string;
  score: number;
  moves: number;
  done: boolean;
  history_length: number;
  locations_explored: number;
  save_slots: string[];
}

// ─── Tool Manifest ──────────────────────────────────────────────────

export type ExecutionMode = "live" | "mock";

export interface ToolManifest {
  name: string;
  version: string;
  description: string;
  input_schema: Record<string, unknown>;
  output_schema: Record<string, unknown>;
  timeout_ms: number;
  supports: {
    mock: true;
  };
  mock_responses?: Record<string, unknown>[];
}

// ─── Tool Execution ─────────────────────────────────────────────────

export interface ToolExecutionRequest {
  request_id: string;
  tool_name: string;
  input: Record<string, unknown>;
  mode: ExecutionMode;
}

/** Body of `POST /api/tools/:name`. */
export interface ToolCallBody {
  request_id?: string;
  input?: Record<string, unknown>;
  mode?: ExecutionMode;
}

export type ToolErrorCode =
  | "TOOL_NOT_FOUND"
  | "INVALID_INPUT"
  | "INVALID_OUTPUT"
  | "SESSION_FATAL"
  | "TIMEOUT"
  | "EXECUTION_ERROR";

export interface ToolExecutionResult {
  request_id: string;
  ok: boolean;
  result?: unknown;
  error?: { code: ToolErrorCode; message: string };
  duration_ms: number;
  mode: ExecutionMode;
}

export type ToolHandler = (input: Record<string, unknown>) => Promise<unknown>;

// ─── Scripted World ─────────────────────────────────────────────────

export interface WorldRoom {
  description: string;
  exits: Record<string, string>;
}

export interface WorldItem {
  name: string;
  /** Words the parser accepts for this item, besides the last word of its name. */
  aliases?: string[];
  location: string;
  points?: number;
  /** Fixed scenery can be examined in descriptions but never taken. */
  fixed?: boolean;
}

export interface WorldDefinition {
  title: string;
  start: string;
  final_room: string;
  final_points?: number;
  rooms: Record<string, WorldRoom>;
  items: WorldItem[];
}
