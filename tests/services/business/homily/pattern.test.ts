import { describe, expect, it } from "vitest";
import { compilePattern, describePattern } from "../../../../src/services/business/homily/pattern.js";

describe("compilePattern", () => {
  it("marks tokens with a trailing ? as optional", () => {
    expect(compilePattern("in? the name")).toEqual([
      { kind: "word", word: "in", optional: true },
      { kind: "word", word: "the", optional: false },
      { kind: "word", word: "name", optional: false },
    ]);
  });

  it("splits alternatives and strips punctuation", () => {
    expect(compilePattern("Holy Ghost|Spirit. Amen.")).toEqual([
      { kind: "word", word: "holy", optional: false },
      { kind: "alternatives", alternatives: ["ghost", "spirit"], optional: false },
      { kind: "word", word: "amen", optional: false },
    ]);
  });

  it("returns an empty pattern for blank input", () => {
    expect(compilePattern("   ")).toEqual([]);
  });
});

describe("describePattern", () => {
  it("renders the normalized expression", () => {
    expect(describePattern(compilePattern("In? the Father|Lord"))).toBe("in? the father|lord");
  });
});
