/**
 * FrotzEngine drives a Z-machine story file through dfrotz.
 *
 * Spawns dfrotz as a child process and talks to it over stdin / stdout; no
 * terminal, no screen memory. Score and moves come from the status line, the
 * observation is everything between the status line and the next prompt.
 *
 * Snapshots are replays: the command history since reset. Restoring launches
 * a fresh dfrotz with the same RNG seed and replays every command, which
 * yields an identical game state (~5ms per command).
 *
 * Requires: dfrotz on PATH (or LANTERN_DFROTZ_BIN), plus a story file.
 */

import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import { readFile } from "node:fs/promises";
import type { GameEngine, Transition } from "@lantern/schemas";
import { EngineCapabilityError, EngineFailureError, errorMessage } from "@lantern/schemas";
import { parseFrotzOutput, isGameOver, InventoryTracker } from "./frotz-output.js";
import { readDictionary } from "./z-dictionary.js";

export const DFROTZ_BIN = "dfrotz";
const DEFAULT_SEED = 42;
const DEFAULT_READ_TIMEOUT_MS = 10_000;

export interface FrotzEngineOptions {
  storyPath: string;
  binary?: string;
  seed?: number;
  readTimeoutMs?: number;
}

export interface FrotzSnapshot {
  readonly commands: readonly string[];
  readonly transition: Transition;
  readonly inventory: readonly string[];
}

const NOT_STARTED: Transition = { observation: "", score: 0, moves: 0, reward: 0, done: false, inventory: [] };

export class FrotzEngine implements GameEngine<FrotzSnapshot> {
  readonly storyPath: string;
  private binary: string;
  private seed: number;
  private readTimeoutMs: number;

  private proc: ChildProcessWithoutNullStreams | null = null;
  private buffer = "";
  private waiters: Array<() => void> = [];
  private failure: Error | null = null;

  private commands: string[] = [];
  private last: Transition = NOT_STARTED;
  private inventory = new InventoryTracker();
  private dictionary: string[] | null = null;

  constructor(opts: FrotzEngineOptions) {
    this.storyPath = opts.storyPath;
    this.binary = opts.binary ?? DFROTZ_BIN;
    this.seed = opts.seed ?? DEFAULT_SEED;
    this.readTimeoutMs = opts.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
  }

  // ── lifecycle ────────────────────────────────────────────────────────────────

  async reset(): Promise<Transition> {
    const banner = await this.launch();
    this.commands = [];
    this.inventory.clear();
    const screen = parseFrotzOutput(banner);
    this.last = {
      observation: screen.body,
      score: screen.score ?? 0,
      moves: screen.moves ?? 0,
      reward: 0,
      done: false,
      inventory: [],
    };
    return this.last;
  }

  async close(): Promise<void> {
    const proc = this.proc;
    if (!proc) return;
    // Handlers below check `this.proc === proc`, so the dying process is ignored from here on.
    this.proc = null;
    this.buffer = "";
    if (proc.stdin.writable) proc.stdin.end("quit\ny\n");
    proc.kill();
  }

  // ── game I/O ─────────────────────────────────────────────────────────────────

  async step(action: string): Promise<Transition> {
    const raw = await this.send(action);
    const screen = parseFrotzOutput(raw);
    const score = screen.score ?? this.last.score;
    this.inventory.update(action, screen.body);
    this.commands.push(action);
    this.last = {
      observation: screen.body,
      score,
      moves: screen.moves ?? this.last.moves,
      reward: score - this.last.score,
      done: isGameOver(screen.body),
      inventory: this.inventory.list,
    };
    return this.last;
  }

  async getValidActions(): Promise<string[]> {
    throw new EngineCapabilityError("dfrotz cannot enumerate valid actions; try check_vocabulary instead");
  }

  async getDictionary(): Promise<string[]> {
    if (!this.dictionary) {
      try {
        this.dictionary = readDictionary(await readFile(this.storyPath));
      } catch (err) {
        throw new EngineFailureError(`Cannot read dictionary from ${this.storyPath}: ${errorMessage(err)}`, { cause: err });
      }
    }
    return [...this.dictionary];
  }

  async getState(): Promise<FrotzSnapshot> {
    if (!this.proc) throw new EngineFailureError("dfrotz is not running");
    return {
      commands: [...this.commands],
      transition: this.last,
      inventory: this.inventory.list,
    };
  }

  async setState(snapshot: FrotzSnapshot): Promise<void> {
    await this.launch();
    if (snapshot.commands.length > 0) {
      console.log(`[engine] Replaying ${snapshot.commands.length} commands...`);
    }
    for (const cmd of snapshot.commands) {
      await this.send(cmd);
    }
    this.commands = [...snapshot.commands];
    this.inventory.restore(snapshot.inventory);
    this.last = snapshot.transition;
  }

  // ── internal: process + prompt detection ────────────────────────────────────

  private async launch(): Promise<string> {
    await this.close();
    this.failure = null;
    const proc = spawn(this.binary, ["-m", "-s", String(this.seed), this.storyPath]);
    this.proc = proc;

    proc.stdout.on("data", (chunk: Buffer) => {
      if (this.proc !== proc) return;
      this.buffer += chunk.toString();
      this.notify();
    });
    // dfrotz writes "Using normal formatting. / Loading ..." to stderr
    proc.stderr.on("data", () => {});
    proc.stdin.on("error", (err) => {
      if (this.proc === proc) this.fail(new Error(`dfrotz stdin closed: ${err.message}`));
    });
    proc.on("error", (err) => {
      if (this.proc === proc) this.fail(new Error(`dfrotz process error: ${err.message} (is ${this.binary} installed?)`));
    });
    proc.on("exit", (code) => {
      if (this.proc === proc) this.fail(new Error(`dfrotz exited with code ${code ?? "null"}`));
    });

    return this.readUntilPrompt();
  }

  private async send(command: string): Promise<string> {
    const proc = this.proc;
    if (!proc) throw new Error("dfrotz is not running; call reset() first");
    if (this.failure) throw this.failure;
    proc.stdin.write(command + "\n");
    return this.readUntilPrompt();
  }

  private fail(err: Error): void {
    this.failure = err;
    this.notify();
  }

  private notify(): void {
    for (const w of [...this.waiters]) w();
  }

  /**
   * Resolves with everything dfrotz printed before its "> " prompt.
   *
   * The prompt shows up as "\n> " at the end of the buffer (or a bare "> " at
   * the very first startup). Responses may arrive in several chunks, so the
   * check reruns on every data event.
   */
  private readUntilPrompt(): Promise<string> {
    return new Promise((resolve, reject) => {
      const finish = (): void => {
        clearTimeout(timer);
        this.waiters = this.waiters.filter((w) => w !== check);
      };
      const check = (): void => {
        if (this.failure) {
          finish();
          reject(this.failure);
          return;
        }
        if (/\n> *$/.test(this.buffer) || /^> *$/.test(this.buffer.trim())) {
          finish();
          const promptIdx = this.buffer.lastIndexOf("\n>");
          const text = promptIdx !== -1
            ? this.buffer.slice(0, promptIdx)
            : this.buffer.replace(/> *$/, "").trim();
          this.buffer = "";
          resolve(text);
        }
      };
      const timer = setTimeout(() => {
        finish();
        reject(new Error(`dfrotz did not answer within ${this.readTimeoutMs}ms`));
      }, this.readTimeoutMs);
      timer.unref();

      this.waiters.push(check);
      check();
    });
  }
}
