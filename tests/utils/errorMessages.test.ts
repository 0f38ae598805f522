import { describe, expect, it } from "vitest";
import { getGenericErrorMessage } from "../../src/utils/errorMessages.js";
import { ExternalServiceError, MarkerConfigError } from "../../src/utils/errors.js";

describe("getGenericErrorMessage", () => {
  it("passes configuration errors through unchanged", () => {
    const error = new MarkerConfigError("Amen?", "the marker has no tokens");
    expect(getGenericErrorMessage(error)).toBe("Homily marker 'Amen?' is misconfigured: the marker has no tokens");
  });

  it("classifies service failures", () => {
    expect(getGenericErrorMessage(new ExternalServiceError("Auphonic", "Status check failed (500): oops"))).toBe(
      "Audio cleanup failed"
    );
    expect(getGenericErrorMessage(new Error("YouTube API error (upload): 401"))).toBe("YouTube publishing failed");
    expect(getGenericErrorMessage(new Error("ffprobe exited with code 1"))).toBe("Audio/video processing failed");
    expect(getGenericErrorMessage(new Error("Groq request rejected"))).toBe("Transcription failed");
    expect(getGenericErrorMessage(new Error("git push rejected"))).toBe("Content repository push failed");
  });

  it("falls back to a generic message", () => {
    expect(getGenericErrorMessage("something else")).toBe("Processing failed");
  });
});
