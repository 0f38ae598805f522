import { describe, expect, it } from "vitest";
import {
  collectWords,
  flattenTranscript,
  normalizeText,
} from "../../../../src/services/business/homily/tokenizer.js";
import { transcriptOf } from "../../../helpers/transcript.js";

describe("normalizeText", () => {
  it("drops punctuation and lowercases", () => {
    expect(normalizeText("Ghost.")).toBe("ghost");
    expect(normalizeText("Spirit, Amen!")).toBe("spirit amen");
    expect(normalizeText("don't")).toBe("dont");
  });

  it("keeps letters with diacritics and the alternation bar", () => {
    expect(normalizeText("Café")).toBe("café");
    expect(normalizeText("Ghost|Spirit.")).toBe("ghost|spirit");
  });
});

describe("collectWords", () => {
  it("prefers segment words over the top-level list", () => {
    const transcript = {
      ...transcriptOf([["Holy", 0, 1]], [["Ghost", 1, 2]]),
      words: [{ word: "ignored", start: 0, end: 1 }],
    };
    expect(collectWords(transcript).map((w) => w.word)).toEqual(["Holy", "Ghost"]);
  });

  it("falls back to top-level words when there are no segments", () => {
    const transcript = { words: [{ word: "Amen", start: 3, end: 4 }] };
    expect(collectWords(transcript)).toEqual([{ word: "Amen", start: 3, end: 4 }]);
  });
});

describe("flattenTranscript", () => {
  const transcript = transcriptOf([
    [" Holy", 0, 1],
    ["Ghost.", 1, 2],
    ["Amen", 2, 3],
  ]);

  it("normalizes and trims tokens and records their position", () => {
    expect(flattenTranscript(transcript)).toEqual([
      { token: "holy", start: 0, end: 1, position: 0 },
      { token: "ghost", start: 1, end: 2, position: 1 },
      { token: "amen", start: 2, end: 3, position: 2 },
    ]);
  });

  it("skips forward by start time", () => {
    expect(flattenTranscript(transcript, { skip: 1 }).map((t) => t.position)).toEqual([1, 2]);
  });

  it("skips backwards from the last end time", () => {
    expect(
      flattenTranscript(transcript, { skip: 1, backwards: true }).map((t) => t.position)
    ).toEqual([0, 1]);
  });

  it("skips backwards over a very long recording", () => {
    const words = Array.from({ length: 300_000 }, (_, i) => ({ word: "amen", start: i, end: i + 1 }));
    const tokens = flattenTranscript({ words }, { skip: 2, backwards: true });
    expect(tokens).toHaveLength(299_998);
    expect(tokens[tokens.length - 1]).toEqual({ token: "amen", start: 299_997, end: 299_998, position: 299_997 });
  });

  it("returns no tokens for an empty transcript", () => {
    expect(flattenTranscript({ segments: [] })).toEqual([]);
  });
});
