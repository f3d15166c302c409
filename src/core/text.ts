import fs from "node:fs";
import { z } from "zod";

const stopwordsPath = new URL("../../data/stopwords.json", import.meta.url);
const STOPWORDS: ReadonlySet<string> = new Set(
  z.array(z.string()).parse(JSON.parse(fs.readFileSync(stopwordsPath, "utf-8")))
);

const MIN_TOKEN_LENGTH = 3;

function foldPlural(word: string) {
  if (word.length > 4 && word.endsWith("ies")) return `${word.slice(0, -3)}y`;
  if (word.length > 3 && word.endsWith("s") && !word.endsWith("ss")) return word.slice(0, -1);
  return word;
}

/** Meaningful tokens of a free-text description, deduplicated. */
export function tokenize(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const raw of text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []) {
    if (raw.length < MIN_TOKEN_LENGTH || STOPWORDS.has(raw)) continue;
    const token = foldPlural(raw);
    if (!STOPWORDS.has(token)) tokens.add(token);
  }
  return tokens;
}

/**
 * Share of the query's tokens found in the vocabulary. Grows with every additional shared token;
 * 0 when the query has no meaningful tokens.
 */
export function containment(query: ReadonlySet<string>, vocabulary: ReadonlySet<string>) {
  if (query.size === 0) return 0;
  let shared = 0;
  for (const token of query) {
    if (vocabulary.has(token)) shared++;
  }
  return shared / query.size;
}
