import type { GameEngine } from "@lantern/schemas";

// Z-machine dictionaries store words truncated (6 chars in v1–3, 9 in v4+),
// so a longer word can only be matched on its prefix.
export const VOCABULARY_PREFIX_LENGTH = 6;

export function findMatches(word: string, dictionary: readonly string[]): string[] {
  const prefix = word.toLowerCase().slice(0, VOCABULARY_PREFIX_LENGTH);
  return dictionary.filter((token) => token.startsWith(prefix));
}

export interface VocabularyReport {
  word: string;
  matches: string[];
}

/** Answers "does the game understand this word" against the live dictionary. */
export class VocabularyIndex {
  private engine: Pick<GameEngine, "getDictionary">;

  constructor(engine: Pick<GameEngine, "getDictionary">) {
    this.engine = engine;
  }

  async lookup(word: string): Promise<VocabularyReport> {
    const dictionary = await this.engine.getDictionary();
    return { word, matches: findMatches(word, dictionary) };
  }
}
