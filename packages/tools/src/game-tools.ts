import type { ToolHandler } from "@lantern/schemas";
import type { GameSession } from "@lantern/session";
import type { SessionHost } from "./session-host.js";

export const GAME_TOOL_NAMES = [
  "play_action",
  "memory",
  "get_map",
  "inventory",
  "valid_actions",
  "check_vocabulary",
  "save_state",
  "load_state",
] as const;

export type GameToolName = (typeof GAME_TOOL_NAMES)[number];

function stringField(input: Record<string, unknown>, field: string): string {
  const value = input[field];
  if (typeof value !== "string") throw new Error(`input.${field} must be a string`);
  return value;
}

/** One handler per game tool, each answering `{ text }` from the host's session. */
export function createGameToolHandlers(host: SessionHost): Record<GameToolName, ToolHandler> {
  const text = async (op: (session: GameSession) => Promise<string>): Promise<{ text: string }> => ({
    text: await host.run(op),
  });

  return {
    play_action: (input) => text((s) => s.takeAction(stringField(input, "action"))),
    memory: () => text((s) => s.getMemorySummary()),
    get_map: () => text((s) => s.getMap()),
    inventory: () => text((s) => s.getInventory()),
    valid_actions: () => text((s) => s.getValidActions()),
    check_vocabulary: (input) => text((s) => s.checkVocabulary(stringField(input, "word"))),
    save_state: (input) => text((s) => s.save(stringField(input, "slot_name"))),
    load_state: (input) => text((s) => s.load(stringField(input, "slot_name"))),
  };
}
