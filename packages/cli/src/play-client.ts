import * as readline from "node:readline";
import type { ToolRuntime, SessionHost, GameToolName } from "@lantern/tools";
import { createRequest } from "@lantern/tools";
import { errorMessage } from "@lantern/schemas";
import { banner, helpText, playPrompt, formatToolResult, red, dim, SLASH_COMMANDS } from "./play-formatter.js";

// ─── Command parsing ──────────────────────────────────────────────

export type PlayCommand =
  | { kind: "empty" }
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "tool"; tool: GameToolName; input: Record<string, unknown> }
  | { kind: "error"; message: string };

const NO_ARGUMENT: Record<string, GameToolName> = {
  "/memory": "memory",
  "/map": "get_map",
  "/inventory": "inventory",
  "/actions": "valid_actions",
};

const ONE_ARGUMENT: Record<string, { tool: GameToolName; field: string; usage: string }> = {
  "/vocab": { tool: "check_vocabulary", field: "word", usage: "/vocab <word>" },
  "/save": { tool: "save_state", field: "slot_name", usage: "/save <slot>" },
  "/load": { tool: "load_state", field: "slot_name", usage: "/load <slot>" },
};

export function parseCommand(line: string): PlayCommand {
  const trimmed = line.trim();
  if (trimmed === "") return { kind: "empty" };
  if (!trimmed.startsWith("/")) return { kind: "tool", tool: "play_action", input: { action: trimmed } };

  const [name = "", ...args] = trimmed.split(/\s+/);
  const command = name.toLowerCase();
  const argument = args.join(" ");

  if (command === "/help") return { kind: "help" };
  if (command === "/quit" || command === "/exit") return { kind: "quit" };

  const bare = NO_ARGUMENT[command];
  if (bare) return { kind: "tool", tool: bare, input: {} };

  const withArg = ONE_ARGUMENT[command];
  if (withArg) {
    if (!argument) return { kind: "error", message: `Usage: ${withArg.usage}` };
    return { kind: "tool", tool: withArg.tool, input: { [withArg.field]: argument } };
  }
  return { kind: "error", message: `Unknown command ${name}. Type /help for the list.` };
}

// ─── DI Interfaces ────────────────────────────────────────────────

/** Terminal I/O abstraction (wraps readline + stdout). */
export interface TerminalIO {
  createReadline(): void;
  closeReadline(): void;
  setPrompt(prompt: string): void;
  prompt(): void;
  onLine(handler: (line: string) => void): void;
  onClose(handler: () => void): void;
  writeLine(text: string): void;
}

export interface ProcessControl {
  exit(code: number): void;
}

// ─── PlayClient ───────────────────────────────────────────────────

export interface PlayClientConfig {
  runtime: ToolRuntime;
  host: SessionHost;
  terminal: TerminalIO;
  game: string;
  engine: string;
  process?: ProcessControl;
}

/**
 * Interactive loop over the tool runtime. Lines are handled strictly in the
 * order typed; each one waits for the previous tool call to answer.
 */
export class PlayClient {
  private readonly runtime: ToolRuntime;
  private readonly host: SessionHost;
  private readonly terminal: TerminalIO;
  private readonly game: string;
  private readonly engine: string;
  private readonly process: ProcessControl;
  private pending: Promise<void> = Promise.resolve();
  private stopping = false;

  constructor(config: PlayClientConfig) {
    this.runtime = config.runtime;
    this.host = config.host;
    this.terminal = config.terminal;
    this.game = config.game;
    this.engine = config.engine;
    this.process = config.process ?? process;
  }

  /** Starts the game, prints the opening text and begins reading lines. */
  async start(): Promise<void> {
    this.terminal.writeLine(banner(this.game, this.engine));
    try {
      const session = await this.host.session();
      this.terminal.writeLine("");
      this.terminal.writeLine(session.transition.observation);
    } catch (err) {
      this.terminal.writeLine(red(`Could not start ${this.game}: ${errorMessage(err)}`));
      this.process.exit(1);
      return;
    }

    this.terminal.createReadline();
    this.terminal.onLine((line) => this.enqueue(line));
    this.terminal.onClose(() => this.enqueueStop());
    this.showPrompt();
  }

  /** Resolves once every line received so far has been answered. */
  idle(): Promise<void> {
    return this.pending;
  }

  async handleLine(line: string): Promise<void> {
    if (this.stopping) return;
    const command = parseCommand(line);
    switch (command.kind) {
      case "empty":
        break;
      case "help":
        this.terminal.writeLine(helpText());
        break;
      case "quit":
        await this.stop();
        return;
      case "error":
        this.terminal.writeLine(red(command.message));
        break;
      case "tool": {
        const result = await this.runtime.execute(createRequest(command.tool, command.input));
        this.terminal.writeLine(formatToolResult(result));
        break;
      }
    }
    this.showPrompt();
  }

  async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    this.terminal.closeReadline();
    await this.host.close();
    this.terminal.writeLine(dim("Goodbye."));
    this.process.exit(0);
  }

  private enqueue(line: string): void {
    this.pending = this.pending.then(() => this.handleLine(line)).catch((err: unknown) => {
      this.terminal.writeLine(red(`Error: ${errorMessage(err)}`));
      this.showPrompt();
    });
  }

  private enqueueStop(): void {
    this.pending = this.pending.then(() => this.stop()).catch((err: unknown) => {
      console.error("[lantern] Shutdown failed:", err);
      this.process.exit(1);
    });
  }

  private showPrompt(): void {
    if (this.stopping) return;
    this.terminal.setPrompt(playPrompt(this.host.snapshot()));
    this.terminal.prompt();
  }
}

// ─── RealTerminalIO ───────────────────────────────────────────────

function completer(line: string): [string[], string] {
  const hits = SLASH_COMMANDS.filter((c) => c.startsWith(line));
  return [line.startsWith("/") ? hits : [], line];
}

export class RealTerminalIO implements TerminalIO {
  private rl: readline.Interface | null = null;

  createReadline(): void {
    this.closeReadline();
    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      completer,
    });
  }

  closeReadline(): void {
    if (this.rl) {
      this.rl.removeAllListeners();
      this.rl.close();
      this.rl = null;
    }
  }

  setPrompt(prompt: string): void {
    this.rl?.setPrompt(prompt);
  }

  prompt(): void {
    this.rl?.prompt(true);
  }

  onLine(handler: (line: string) => void): void {
    this.rl?.on("line", handler);
  }

  onClose(handler: () => void): void {
    this.rl?.on("close", handler);
  }

  writeLine(text: string): void {
    process.stdout.write(text + "\n");
  }
}
