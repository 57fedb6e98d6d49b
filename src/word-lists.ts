import { readFileSync } from "node:fs";

export type WordListName = "stop-words" | "technical-terms";

const cache = new Map<WordListName, ReadonlySet<string>>();

export function loadWordList(name: WordListName): ReadonlySet<string> {
  const cached = cache.get(name);
  if (cached) return cached;
  const raw: unknown = JSON.parse(readFileSync(new URL(`./data/${name}.json`, import.meta.url), "utf8"));
  if (!Array.isArray(raw) || !raw.every((entry): entry is string => typeof entry === "string")) {
    throw new Error(`Word list ${name} must be a JSON array of strings`);
  }
  const words = new Set(raw.map((entry) => entry.toLowerCase()));
  cache.set(name, words);
  return words;
}

export function tokenizeWords(text: string): string[] {
  return text.toLowerCase().match(/\p{L}+/gu) ?? [];
}
