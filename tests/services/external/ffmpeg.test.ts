import { describe, expect, it } from "vitest";
import {
  concatListEntry,
  escapeFilterPath,
  resolveClipWindow,
} from "../../../src/services/external/ffmpeg.js";

describe("resolveClipWindow", () => {
  it("clips to the end when no end is given", () => {
    expect(resolveClipWindow(100, 10, null)).toEqual({ start: 10, end: 100 });
  });

  it("drops seconds from the end for a negative end", () => {
    const window = resolveClipWindow(100, 6.4, -6.4);
    expect(window.start).toBe(6.4);
    expect(window.end).toBeCloseTo(93.6, 9);
  });

  it("clamps both ends into the file", () => {
    expect(resolveClipWindow(100, -5, 200)).toEqual({ start: 0, end: 100 });
    expect(resolveClipWindow(100, 150, null)).toEqual({ start: 100, end: 100 });
  });

  it("never ends before it starts", () => {
    expect(resolveClipWindow(100, 50, 20)).toEqual({ start: 50, end: 50 });
    expect(resolveClipWindow(10, 6.4, -6.4)).toEqual({ start: 6.4, end: 6.4 });
  });
});

describe("ffmpeg argument escaping", () => {
  it("escapes filter separators in subtitle paths", () => {
    expect(escapeFilterPath("C:\\mass files\\it's,1.srt")).toBe("C\\:\\\\mass\\ files\\\\it\\'s\\,1.srt");
  });

  it("quotes concat list entries", () => {
    expect(concatListEntry("/tmp/intro.mp4")).toBe("file '/tmp/intro.mp4'");
    expect(concatListEntry("/tmp/it's.mp4")).toBe("file '/tmp/it'\\''s.mp4'");
  });
});
