/**
 * GameSession owns one engine and the telemetry derived from its transitions.
 *
 * Every public operation goes through a single serial queue, so engine calls
 * and the state updates that follow them never interleave even when the
 * transport above accepts requests concurrently.
 *
 * Failure policy: read-side queries (valid actions, vocabulary, save) turn
 * engine errors into text. A failed step, or a failed restore during load,
 * throws EngineTransitionError; the session's cached state is then suspect and
 * the owner should recreate it.
 */

import type { GameEngine, HistoryEntry, SessionSnapshot, Transition } from "@lantern/schemas";
import { EngineTransitionError, SlotNotFoundError, errorMessage } from "@lantern/schemas";
import { ExplorationGraph } from "./exploration-graph.js";
import { HistoryLog, DEFAULT_HISTORY_CAPACITY } from "./history-log.js";
import { SaveSlotStore } from "./save-slot-store.js";
import { VocabularyIndex } from "./vocabulary-index.js";
import { SerialQueue } from "./serial-queue.js";
import { extractLocation } from "./location.js";
import {
  formatStepResult,
  formatMemory,
  formatMap,
  formatInventory,
  formatValidActions,
  formatVocabulary,
} from "./format.js";

const SYNC_ACTION = "look";
const MEMORY_RECENT_COUNT = 5;

export interface GameSessionOptions {
  historyCapacity?: number;
}

export class GameSession<TSnapshot = unknown> {
  readonly gameName: string;
  private engine: GameEngine<TSnapshot>;
  private current: Transition;
  private location: string;
  private history: HistoryLog;
  private exploration = new ExplorationGraph();
  private slots = new SaveSlotStore<TSnapshot>();
  private vocabulary: VocabularyIndex;
  private queue = new SerialQueue();

  private constructor(engine: GameEngine<TSnapshot>, gameName: string, initial: Transition, opts: GameSessionOptions) {
    this.engine = engine;
    this.gameName = gameName;
    this.current = initial;
    this.location = extractLocation(initial.observation);
    this.history = new HistoryLog(opts.historyCapacity ?? DEFAULT_HISTORY_CAPACITY);
    this.vocabulary = new VocabularyIndex(engine);
  }

  /** Resets the engine and wraps it in a fresh session. */
  static async start<TSnapshot>(
    engine: GameEngine<TSnapshot>,
    gameName: string,
    opts: GameSessionOptions = {},
  ): Promise<GameSession<TSnapshot>> {
    let initial: Transition;
    try {
      initial = await engine.reset();
    } catch (err) {
      // A half-started engine may still hold a child process.
      await engine.close().catch((closeErr: unknown) => {
        console.warn(`[session] Closing "${gameName}" after a failed start failed: ${errorMessage(closeErr)}`);
      });
      throw new EngineTransitionError(`Failed to start "${gameName}": ${errorMessage(err)}`, { cause: err });
    }
    return new GameSession(engine, gameName, initial, opts);
  }

  get transition(): Transition {
    return this.current;
  }

  get currentLocation(): string {
    return this.location;
  }

  get historyEntries(): HistoryEntry[] {
    return this.history.toArray();
  }

  // ─── Play ───────────────────────────────────────────────────────────

  takeAction(action: string): Promise<string> {
    return this.queue.run(async () => {
      let next: Transition;
      try {
        next = await this.engine.step(action);
      } catch (err) {
        throw new EngineTransitionError(`Engine failed on "${action}": ${errorMessage(err)}`, { cause: err });
      }
      this.current = next;
      this.history.append(action, next.observation);
      const destination = extractLocation(next.observation);
      this.exploration.record(this.location, action, destination);
      this.location = destination;
      return formatStepResult(next);
    });
  }

  // ─── Derived views ──────────────────────────────────────────────────

  getMemorySummary(): Promise<string> {
    return this.queue.run(async () => formatMemory({
      location: this.location,
      gameName: this.gameName,
      transition: this.current,
      recent: this.history.recent(MEMORY_RECENT_COUNT),
    }));
  }

  getMap(): Promise<string> {
    return this.queue.run(async () => formatMap(this.exploration.entries(), this.location));
  }

  getInventory(): Promise<string> {
    return this.queue.run(async () => formatInventory(this.current.inventory));
  }

  // ─── Live engine queries ────────────────────────────────────────────

  getValidActions(): Promise<string> {
    return this.queue.run(async () => {
      try {
        return formatValidActions(await this.engine.getValidActions());
      } catch (err) {
        console.warn(`[session] valid actions unavailable: ${errorMessage(err)}`);
        return `Could not retrieve valid actions: ${errorMessage(err)}`;
      }
    });
  }

  checkVocabulary(word: string): Promise<string> {
    return this.queue.run(async () => {
      try {
        return formatVocabulary(await this.vocabulary.lookup(word));
      } catch (err) {
        console.warn(`[session] vocabulary lookup failed: ${errorMessage(err)}`);
        return `Could not check vocabulary: ${errorMessage(err)}`;
      }
    });
  }

  // ─── Save slots ─────────────────────────────────────────────────────

  save(slotName: string): Promise<string> {
    return this.queue.run(async () => {
      try {
        this.slots.put(slotName, await this.engine.getState());
        return `Game saved successfully to slot: '${slotName}'`;
      } catch (err) {
        console.warn(`[session] save to "${slotName}" failed: ${errorMessage(err)}`);
        return `Error saving game to slot '${slotName}': ${errorMessage(err)}`;
      }
    });
  }

  /**
   * Restores a slot, then issues a `look` so the cached transition and
   * location match the restored engine. History and the map keep everything
   * recorded since the save; they are not rewound.
   */
  load(slotName: string): Promise<string> {
    return this.queue.run(async () => {
      let snapshot: TSnapshot;
      try {
        snapshot = this.slots.require(slotName);
      } catch (err) {
        if (err instanceof SlotNotFoundError) return `Error: ${err.message}`;
        throw err;
      }
      let refreshed: Transition;
      try {
        await this.engine.setState(snapshot);
        refreshed = await this.engine.step(SYNC_ACTION);
      } catch (err) {
        throw new EngineTransitionError(`Failed to restore slot '${slotName}': ${errorMessage(err)}`, { cause: err });
      }
      this.current = refreshed;
      this.location = extractLocation(refreshed.observation);
      return `Game loaded from slot: '${slotName}'.\nCurrent location: ${refreshed.observation}`;
    });
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  snapshot(): SessionSnapshot {
    return {
      game: this.gameName,
      location: this.location,
      score: this.current.score,
      moves: this.current.moves,
      done: this.current.done,
      history_length: this.history.length,
      locations_explored: this.exploration.size,
      save_slots: this.slots.names(),
    };
  }

  close(): Promise<void> {
    return this.queue.run(() => this.engine.close());
  }
}
