import { describe, expect, it } from "vitest";
import { getRequiredEnv, loadEnv } from "../../src/config/env.js";
import { createBoundaryResolver, detectorOptionsFromEnv } from "../../src/config/detector.js";
import { MarkerConfigError } from "../../src/utils/errors.js";

describe("loadEnv", () => {
  it("applies defaults to an empty environment", () => {
    const env = loadEnv({});
    expect(env.HOMILY_MARKER).toBe("Holy Ghost|Spirit. Amen.");
    expect(env.HOMILY_END_STRATEGY).toBe("repeated-marker");
    expect(env.HOMILY_START_AT).toBe("next-word");
    expect(env.HOMILY_SILENCE_THRESHOLD_SEC).toBe(8);
    expect(env.SRT_SHIFT_SEC).toBe(11);
    expect(env.FINAL_TRIM_SEC).toBe(6.4);
    expect(env.YOUTUBE_PRIVACY_STATUS).toBe("public");
    expect(env.CONTENT_REPO_SUBDIR).toBe("src/mds/lectures");
  });

  it("coerces numbers and treats blank strings as unset", () => {
    const env = loadEnv({ SRT_SHIFT_SEC: "9.5", AUPHONIC_PRESET: "  ", INTRO_VIDEO_PATH: " intro.mp4 " });
    expect(env.SRT_SHIFT_SEC).toBe(9.5);
    expect(env.AUPHONIC_PRESET).toBeUndefined();
    expect(env.INTRO_VIDEO_PATH).toBe("intro.mp4");
  });

  it("lists every invalid variable", () => {
    expect(() => loadEnv({ HOMILY_END_STRATEGY: "guess", HOMILY_SILENCE_THRESHOLD_SEC: "0" })).toThrow(
      /HOMILY_END_STRATEGY: .*; HOMILY_SILENCE_THRESHOLD_SEC: /
    );
  });
});

describe("getRequiredEnv", () => {
  it("returns the trimmed value", () => {
    expect(getRequiredEnv("GROQ_API_KEY", { GROQ_API_KEY: " test-secret " })).toBe("test-secret");
  });

  it("throws when the value is blank", () => {
    expect(() => getRequiredEnv("GROQ_API_KEY", { GROQ_API_KEY: "" })).toThrow(
      "Missing required environment variable: GROQ_API_KEY"
    );
  });
});

describe("detector configuration", () => {
  it("maps environment variables to detector options", () => {
    const env = loadEnv({ HOMILY_END_STRATEGY: "silence-gap", HOMILY_SILENCE_THRESHOLD_SEC: "5" });
    expect(detectorOptionsFromEnv(env)).toEqual({
      marker: "Holy Ghost|Spirit. Amen.",
      endStrategy: "silence-gap",
      startAt: "next-word",
      silenceThresholdSec: 5,
    });
  });

  it("refuses a marker whose Amen is optional", () => {
    const env = loadEnv({ HOMILY_MARKER: "Holy Ghost Amen?" });
    expect(() => createBoundaryResolver(env)).toThrow(MarkerConfigError);
  });
});
