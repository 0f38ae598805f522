import type { Token, Transcript, TranscriptWord } from "../../src/services/business/homily/types.js";

export type WordEntry = [word: string, start: number, end: number];

export function wordsOf(entries: readonly WordEntry[]): TranscriptWord[] {
  return entries.map(([word, start, end]) => ({ word, start, end }));
}

/** One segment per entry group, spanning its words. */
export function transcriptOf(...groups: ReadonlyArray<readonly WordEntry[]>): Transcript {
  return {
    segments: groups
      .filter((group) => group.length > 0)
      .map((group, id) => ({
        id,
        start: group[0][1],
        end: group[group.length - 1][2],
        text: group.map(([word]) => word).join(" "),
        words: wordsOf(group),
      })),
  };
}

/** Tokens one second apart: token i spans [i, i + 1]. */
export function tokensOf(...words: string[]): Token[] {
  return words.map((token, position) => ({ token, start: position, end: position + 1, position }));
}

/** Filler speech: one 0.5s word every 0.5s across [from, to). */
export function speech(from: number, to: number, word = "word"): WordEntry[] {
  const entries: WordEntry[] = [];
  for (let t = from; t < to; t += 0.5) {
    entries.push([word, t, t + 0.5]);
  }
  return entries;
}
