// Formatting for the play loop. No I/O here.

import type { SessionSnapshot, ToolExecutionResult } from "@lantern/schemas";

// ANSI color helpers
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

export const SLASH_COMMANDS = [
  "/memory", "/map", "/inventory", "/actions", "/vocab", "/save", "/load", "/help", "/quit",
];

export function playPrompt(snapshot: SessionSnapshot | null): string {
  if (!snapshot) return "> ";
  return `${dim(`[${snapshot.location} | ${snapshot.score} pts, ${snapshot.moves} moves]`)}\n> `;
}

export function banner(game: string, engine: string): string {
  return [
    bold(`Lantern: ${game}`) + dim(` (${engine})`),
    dim("Type a command to play, or /help for the session commands."),
    dim("Save slots are kept in memory only and are lost when you quit."),
  ].join("\n");
}

export function helpText(): string {
  return [
    bold("Commands:"),
    "  <text>          Send an action to the game",
    "  /memory         Location, score and recent actions",
    "  /map            Rooms explored and the exits taken",
    "  /inventory      What you are carrying",
    "  /actions        Actions the engine accepts here",
    "  /vocab <word>   Ask whether the game knows a word",
    "  /save <slot>    Save to an in-memory slot",
    "  /load <slot>    Restore an in-memory slot",
    "  /help           Show this help",
    "  /quit           Exit",
  ].join("\n");
}

function hasText(value: unknown): value is { text: string } {
  return typeof value === "object" && value !== null && "text" in value && typeof value.text === "string";
}

export function formatToolResult(result: ToolExecutionResult): string {
  if (result.ok) {
    return hasText(result.result) ? result.result.text : JSON.stringify(result.result, null, 2);
  }
  const error = result.error ?? { code: "EXECUTION_ERROR", message: "Unknown error" };
  const line = red(`[${error.code}] ${error.message}`);
  if (error.code === "SESSION_FATAL") {
    return `${line}\n${yellow("The game session ended. Your next command starts a new game.")}`;
  }
  return line;
}
