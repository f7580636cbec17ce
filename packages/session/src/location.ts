/**
 * Location identity is derived from text: the first non-empty line of an
 * observation. Two rooms whose descriptions open with the same line collapse
 * into one map node.
 */
export function extractLocation(observation: string): string {
  for (const line of observation.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.length > 0) return trimmed;
  }
  return "Unknown";
}

export const MOVEMENT_ACTIONS: ReadonlySet<string> = new Set([
  "north", "south", "east", "west",
  "northeast", "northwest", "southeast", "southwest",
  "up", "down", "enter", "exit",
  "n", "s", "e", "w", "ne", "nw", "se", "sw", "u", "d",
]);

export function isMovementAction(action: string): boolean {
  return MOVEMENT_ACTIONS.has(action.trim().toLowerCase());
}
