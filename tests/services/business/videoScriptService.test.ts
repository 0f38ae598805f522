import { describe, expect, it } from "vitest";
import { generateVideoScript } from "../../../src/services/business/videoScriptService.js";
import { transcriptOf } from "../../helpers/transcript.js";

describe("generateVideoScript", () => {
  const transcript = transcriptOf(
    [
      ["Amen.", 9, 10],
      ["Brethren,", 10, 11],
    ],
    [
      ["rejoice", 11, 12],
      ["always.", 19.5, 20.5],
    ]
  );

  it("keeps words that start inside the homily and re-times them", () => {
    const script = generateVideoScript(transcript, 10, 20);

    expect(script.homily_start).toBe(10);
    expect(script.homily_end).toBe(20);
    expect(script.homily_text).toBe("Brethren, rejoice always.");
    expect(script.segments.map(({ start, end, text }) => ({ start, end, text }))).toEqual([
      { start: 0, end: 1, text: "Brethren," },
      { start: 1, end: 10.5, text: "rejoice always." },
    ]);
  });
});
