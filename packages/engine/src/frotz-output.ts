// ─── dfrotz output format ─────────────────────────────────────────────────────
//
// dfrotz (-m suppresses [MORE] pauses) prints each turn as:
//
//   " West of House                              Score: 0        Moves: 3\n"
//   "\n"
//   "Opening the small mailbox reveals a leaflet.\n"
//   "\n"
//   "> "          ← prompt, no trailing newline; the process blocks here
//
// The status line always carries "Score:" and "Moves:". Some turns (startup
// banner, save prompts) have no status line at all.
// ─────────────────────────────────────────────────────────────────────────────

const STATUS_LINE = /Score:\s*(-?\d+).*?Moves:\s*(\d+)/i;
export const NO_RESPONSE = "(no visible response)";

export interface FrotzScreen {
  statusRoom: string;
  score: number | null;
  moves: number | null;
  body: string;
}

export function parseFrotzOutput(raw: string): FrotzScreen {
  const lines = raw.split("\n");
  const statusIdx = lines.findIndex((l) => STATUS_LINE.test(l));

  let statusRoom = "";
  let score: number | null = null;
  let moves: number | null = null;
  let bodyLines = lines;

  if (statusIdx !== -1) {
    const status = lines[statusIdx] ?? "";
    const match = STATUS_LINE.exec(status);
    if (match) {
      score = Number(match[1]);
      moves = Number(match[2]);
    }
    statusRoom = status.replace(/\s{2,}Score:.*$/i, "").trim();
    bodyLines = lines.slice(statusIdx + 1);
  }

  const body = bodyLines
    .map((l) => l.trim())
    .filter((l) => l.length > 0)
    .join("\n")
    .trim();

  return { statusRoom, score, moves, body: body || NO_RESPONSE };
}

const GAME_OVER_PATTERNS = [
  /\*{2,}\s*you have (died|won)\s*\*{2,}/i,
  /would you like to restart, restore/i,
  /restart,?\s+restore,?\s+or\s+quit/i,
];

export function isGameOver(body: string): boolean {
  return GAME_OVER_PATTERNS.some((p) => p.test(body));
}

// ─── Inventory tracking ──────────────────────────────────────────────────────
// dfrotz exposes no object table, so the carried list is inferred from the
// game's answers to take / drop / inventory.

const TAKE = /^(?:take|get|pick up)\s+(.+)$/;
const DROP = /^(?:drop|put down)\s+(.+)$/;
const ARTICLE = /^(?:a|an|the|some)\s+/i;

export class InventoryTracker {
  private items: string[] = [];

  get list(): string[] {
    return [...this.items];
  }

  restore(items: readonly string[]): void {
    this.items = [...items];
  }

  clear(): void {
    this.items = [];
  }

  update(action: string, body: string): void {
    const command = action.trim().toLowerCase();
    if (command === "i" || command === "inventory") {
      this.readListing(body);
      return;
    }
    const take = TAKE.exec(command);
    if (take?.[1]) {
      for (const name of this.acknowledged(take[1], body, "taken")) this.add(name);
      return;
    }
    const drop = DROP.exec(command);
    if (drop?.[1]) {
      for (const name of this.acknowledged(drop[1], body, "dropped")) this.remove(name);
    }
  }

  /** Objects the game confirmed, either as a bare "Taken." or as "lamp: Taken." lines. */
  private acknowledged(object: string, body: string, verb: string): string[] {
    const lines = body.split("\n").map((l) => l.trim());
    if (lines.some((l) => l.toLowerCase() === `${verb}.`)) return [object];
    const names: string[] = [];
    const perObject = new RegExp(`^(.+?):\\s*${verb}\\.?$`, "i");
    for (const line of lines) {
      const match = perObject.exec(line);
      if (match?.[1]) names.push(match[1].trim());
    }
    return names;
  }

  private readListing(body: string): void {
    const lines = body.split("\n").map((l) => l.trim()).filter((l) => l.length > 0);
    if (lines.some((l) => /empty[- ]handed/i.test(l))) {
      this.items = [];
      return;
    }
    const header = lines.findIndex((l) => /you are carrying/i.test(l));
    if (header === -1) return;
    this.items = lines.slice(header + 1).map((l) => l.replace(ARTICLE, ""));
  }

  private add(name: string): void {
    if (!this.items.some((i) => i.toLowerCase() === name.toLowerCase())) this.items.push(name);
  }

  private remove(name: string): void {
    const lower = name.toLowerCase();
    this.items = this.items.filter((i) => i.toLowerCase() !== lower && !i.toLowerCase().endsWith(` ${lower}`));
  }
}
