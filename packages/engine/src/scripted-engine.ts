import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { GameEngine, Transition, WorldDefinition, WorldItem } from "@lantern/schemas";
import { validateWorldData, isWorldDefinition, EngineFailureError, errorMessage } from "@lantern/schemas";

export const DEFAULT_WORLD_PATH = fileURLToPath(new URL("../worlds/cellar.json", import.meta.url));

const PLAYER_OBJECT = 1;
const CARRIED = "\u0000player";
const DICTIONARY_WORD_LENGTH = 6;

const DIRECTIONS: Record<string, string> = {
  n: "north", s: "south", e: "east", w: "west",
  ne: "northeast", nw: "northwest", se: "southeast", sw: "southwest",
  u: "up", d: "down",
};
const MOVES = new Set([...Object.values(DIRECTIONS), "enter", "exit"]);
const VERBS = ["look", "l", "inventory", "i", "take", "get", "drop", "score", "wait", "z", "go", "enter", "exit"];

// ─── World loading ────────────────────────────────────────────────────────────

/** Reads and validates a world file, including cross-references between rooms and items. */
export async function loadWorld(path: string = DEFAULT_WORLD_PATH): Promise<WorldDefinition> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    throw new Error(`Cannot read world file "${path}": ${errorMessage(err)}`, { cause: err });
  }
  if (!isWorldDefinition(data)) {
    throw new Error(`Invalid world file "${path}": ${validateWorldData(data).errors.join(", ")}`);
  }
  const problems = checkReferences(data);
  if (problems.length > 0) {
    throw new Error(`Invalid world file "${path}": ${problems.join(", ")}`);
  }
  return data;
}

export function checkReferences(world: WorldDefinition): string[] {
  const problems: string[] = [];
  const known = (room: string): boolean => Object.prototype.hasOwnProperty.call(world.rooms, room);
  if (!known(world.start)) problems.push(`start room "${world.start}" does not exist`);
  if (!known(world.final_room)) problems.push(`final room "${world.final_room}" does not exist`);
  for (const [name, room] of Object.entries(world.rooms)) {
    for (const [dir, dest] of Object.entries(room.exits)) {
      if (!known(dest)) problems.push(`exit ${dir} from "${name}" leads to unknown room "${dest}"`);
    }
  }
  for (const item of world.items) {
    if (!known(item.location)) problems.push(`item "${item.name}" is in unknown room "${item.location}"`);
  }
  return problems;
}

// ─── Engine ───────────────────────────────────────────────────────────────────

export interface ScriptedSnapshot {
  readonly room: string;
  readonly score: number;
  readonly moves: number;
  readonly done: boolean;
  /** Per item, its room name or the carried marker. */
  readonly itemLocations: readonly string[];
  readonly scored: readonly boolean[];
}

/**
 * Small in-process world for mock mode, demos and tests. Speaks just enough
 * of the classic two-word parser to walk around, pick things up and score.
 */
export class ScriptedEngine implements GameEngine<ScriptedSnapshot> {
  private world: WorldDefinition;
  private room: string;
  private score = 0;
  private moves = 0;
  private done = false;
  private itemLocations: string[];
  private scored: boolean[];

  constructor(world: WorldDefinition) {
    this.world = world;
    this.room = world.start;
    this.itemLocations = world.items.map((i) => i.location);
    this.scored = world.items.map(() => false);
  }

  static async fromFile(path?: string): Promise<ScriptedEngine> {
    return new ScriptedEngine(await loadWorld(path));
  }

  get maxScore(): number {
    return this.world.items.reduce((sum, i) => sum + (i.points ?? 0), 0) + (this.world.final_points ?? 0);
  }

  async reset(): Promise<Transition> {
    this.room = this.world.start;
    this.score = 0;
    this.moves = 0;
    this.done = false;
    this.itemLocations = this.world.items.map((i) => i.location);
    this.scored = this.world.items.map(() => false);
    return this.transition(this.describe(), 0);
  }

  async step(action: string): Promise<Transition> {
    const before = this.score;
    const words = action.trim().toLowerCase().split(/\s+/).filter((w) => w.length > 0);
    if (words.length === 0) return this.transition("I beg your pardon?", 0);
    if (this.done) return this.transition(`The game is over. Thanks for playing ${this.world.title}.`, 0);

    this.moves++;
    const text = this.perform(words);
    return this.transition(text, this.score - before);
  }

  async getValidActions(): Promise<string[]> {
    const actions = Object.keys(this.world.rooms[this.room]?.exits ?? {});
    this.world.items.forEach((item, idx) => {
      if (item.fixed) return;
      if (this.itemLocations[idx] === this.room) actions.push(`take ${keyword(item)}`);
      if (this.itemLocations[idx] === CARRIED) actions.push(`drop ${keyword(item)}`);
    });
    actions.push("look", "inventory");
    return actions;
  }

  async getDictionary(): Promise<string[]> {
    const words = new Set<string>([...VERBS, ...Object.keys(DIRECTIONS), ...Object.values(DIRECTIONS)]);
    for (const item of this.world.items) {
      for (const w of item.name.toLowerCase().split(/\s+/)) words.add(w);
      for (const a of item.aliases ?? []) words.add(a.toLowerCase());
    }
    const truncated = new Set([...words].map((w) => w.slice(0, DICTIONARY_WORD_LENGTH)));
    return [...truncated].sort();
  }

  async getState(): Promise<ScriptedSnapshot> {
    return {
      room: this.room,
      score: this.score,
      moves: this.moves,
      done: this.done,
      itemLocations: [...this.itemLocations],
      scored: [...this.scored],
    };
  }

  async setState(snapshot: ScriptedSnapshot): Promise<void> {
    if (!Object.prototype.hasOwnProperty.call(this.world.rooms, snapshot.room)) {
      throw new EngineFailureError(`Snapshot refers to unknown room "${snapshot.room}"`);
    }
    if (snapshot.itemLocations.length !== this.world.items.length) {
      throw new EngineFailureError("Snapshot was taken from a different world");
    }
    this.room = snapshot.room;
    this.score = snapshot.score;
    this.moves = snapshot.moves;
    this.done = snapshot.done;
    this.itemLocations = [...snapshot.itemLocations];
    this.scored = [...snapshot.scored];
  }

  async close(): Promise<void> {}

  // ── command handling ───────────────────────────────────────────────────────

  private perform(words: string[]): string {
    const [verb = "", ...rest] = words;
    const object = rest.join(" ");

    const direction = DIRECTIONS[verb] ?? verb;
    if (isDirection(direction) && rest.length === 0) return this.go(direction);
    if (verb === "go" && rest.length === 1) return this.go(DIRECTIONS[object] ?? object);

    switch (verb) {
      case "look":
      case "l":
        return this.describe();
      case "inventory":
      case "i":
        return this.listInventory();
      case "take":
      case "get":
        return object ? this.take(object) : "What do you want to take?";
      case "drop":
        return object ? this.drop(object) : "What do you want to drop?";
      case "score":
        return `Your score is ${this.score} (total of ${this.maxScore} points), in ${this.moves} moves.`;
      case "wait":
      case "z":
        return "Time passes...";
      default:
        return `I don't know the word "${verb}".`;
    }
  }

  private go(direction: string): string {
    const dest = this.world.rooms[this.room]?.exits[direction];
    if (!dest) return "You can't go that way.";
    this.room = dest;
    if (dest === this.world.final_room) {
      this.done = true;
      this.score += this.world.final_points ?? 0;
      return `${this.describe()}\n\n*** You have won ***`;
    }
    return this.describe();
  }

  private take(object: string): string {
    const idx = this.findItem(object, (loc) => loc === this.room || loc === CARRIED);
    if (idx === -1) return "You can't see any such thing.";
    const item = this.world.items[idx];
    if (!item || item.fixed) return "It is securely anchored.";
    if (this.itemLocations[idx] === CARRIED) return "You already have that!";
    this.itemLocations[idx] = CARRIED;
    if (!this.scored[idx]) {
      this.scored[idx] = true;
      this.score += item.points ?? 0;
    }
    return "Taken.";
  }

  private drop(object: string): string {
    const idx = this.findItem(object, (loc) => loc === CARRIED);
    if (idx === -1) return "You're not carrying that.";
    this.itemLocations[idx] = this.room;
    return "Dropped.";
  }

  private findItem(object: string, where: (location: string) => boolean): number {
    return this.world.items.findIndex((item, idx) =>
      where(this.itemLocations[idx] ?? "") && refersTo(item, object));
  }

  private describe(): string {
    const room = this.world.rooms[this.room];
    const lines = [this.room, room?.description ?? ""];
    this.world.items.forEach((item, idx) => {
      if (!item.fixed && this.itemLocations[idx] === this.room) lines.push(`There is a ${item.name} here.`);
    });
    return lines.join("\n");
  }

  private listInventory(): string {
    const carried = this.world.items.filter((_, idx) => this.itemLocations[idx] === CARRIED);
    if (carried.length === 0) return "You are empty-handed.";
    return ["You are carrying:", ...carried.map((i) => `  A ${i.name}`)].join("\n");
  }

  private transition(observation: string, reward: number): Transition {
    const inventory: string[] = [];
    this.world.items.forEach((item, idx) => {
      if (this.itemLocations[idx] === CARRIED) {
        inventory.push(`Obj${idx + PLAYER_OBJECT + 1}: ${item.name} Parent${PLAYER_OBJECT} Sibling0 Child0`);
      }
    });
    return { observation, score: this.score, moves: this.moves, reward, done: this.done, inventory };
  }
}

function isDirection(word: string): boolean {
  return MOVES.has(word);
}

function keyword(item: WorldItem): string {
  const words = item.name.split(/\s+/);
  return words[words.length - 1] ?? item.name;
}

function refersTo(item: WorldItem, object: string): boolean {
  const name = item.name.toLowerCase();
  if (object === name) return true;
  if (name.split(/\s+/).includes(object)) return true;
  return (item.aliases ?? []).some((a) => a.toLowerCase() === object);
}
