import { readdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join, extname, basename } from "node:path";
import { GameNotFoundError } from "@lantern/schemas";

const STORY_EXTENSION = /^\.z[1-8]$/i;

export interface StoryFile {
  game: string;
  path: string;
}

/** Story files in `dir`, by game name in lexical order. A missing directory has none. */
export async function listStoryFiles(dir: string): Promise<StoryFile[]> {
  if (!existsSync(dir)) return [];
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && STORY_EXTENSION.test(extname(e.name)))
    .map((e) => ({ game: basename(e.name, extname(e.name)), path: join(dir, e.name) }))
    .sort((a, b) => (a.game < b.game ? -1 : a.game > b.game ? 1 : 0));
}

export async function listAvailableGames(dir: string): Promise<string[]> {
  return [...new Set((await listStoryFiles(dir)).map((s) => s.game))];
}

export async function resolveStoryFile(dir: string, game: string): Promise<string> {
  const stories = await listStoryFiles(dir);
  const match = stories.find((s) => s.game === game) ?? stories.find((s) => s.game.toLowerCase() === game.toLowerCase());
  if (!match) throw new GameNotFoundError(game, [...new Set(stories.map((s) => s.game))]);
  return match.path;
}
