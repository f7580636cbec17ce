import type { HistoryEntry, Transition } from "@lantern/schemas";
import { parseItemName } from "./inventory-parser.js";
import type { VocabularyReport } from "./vocabulary-index.js";

const EXCERPT_LENGTH = 60;
const MEMORY_INDENT = "    ";

export function formatStepResult(t: Transition): string {
  const summary = t.reward > 0
    ? `\n\n+${t.reward} points! (Total: ${t.score})`
    : `\n\n[Score: ${t.score} | Moves: ${t.moves}]`;
  const terminal = t.done ? "\n\nGAME OVER" : "";
  return t.observation + summary + terminal;
}

export interface MemoryView {
  location: string;
  gameName: string;
  transition: Transition;
  recent: HistoryEntry[];
}

/**
 * Every non-blank line after the heading is indented by MEMORY_INDENT, except
 * the continuation lines of the recent-actions block and of the observation.
 */
export function formatMemory(view: MemoryView): string {
  const recent = view.recent.length > 0
    ? view.recent.map((e) => `  > ${e.action} -> ${e.result.slice(0, EXCERPT_LENGTH)}...`).join("\n")
    : "  (none yet)";
  const pad = MEMORY_INDENT;
  return [
    "Current State:",
    `${pad}- Location: ${view.location}`,
    `${pad}- Score: ${view.transition.score} points`,
    `${pad}- Moves: ${view.transition.moves}`,
    `${pad}- Game: ${view.gameName}`,
    "",
    `${pad}Recent Actions:`,
    `${pad}${recent}`,
    "",
    `${pad}Current Observation:`,
    `${pad}${view.transition.observation}`,
  ].join("\n");
}

export function formatMap(entries: Array<[string, string[]]>, current: string): string {
  if (entries.length === 0) return "Map: No locations explored yet. Try moving around!";
  const lines = ["Explored Locations and Exits:"];
  for (const [location, exits] of entries) {
    lines.push(`\n* ${location}`);
    for (const exit of exits) lines.push(`    -> ${exit}`);
  }
  lines.push(`\n[Current] ${current}`);
  return lines.join("\n");
}

export function formatInventory(descriptors: readonly string[]): string {
  if (descriptors.length === 0) return "Inventory: You are empty-handed.";
  return `Inventory: ${descriptors.map(parseItemName).join(", ")}`;
}

export function formatValidActions(actions: readonly string[]): string {
  if (actions.length === 0) return "No valid actions available.";
  return "Valid Actions:\n" + actions.map((a) => `  - ${a}`).join("\n");
}

export function formatVocabulary(report: VocabularyReport): string {
  if (report.matches.length > 0) {
    return `Yes, the game understands '${report.word}' (matches: ${report.matches.join(", ")}).`;
  }
  return `No, the game does NOT understand the word '${report.word}'. Try a different synonym.`;
}
