import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseTimeInput, resolveManually } from "../../../../src/services/business/homily/manualFallback.js";
import type { Transcript } from "../../../../src/services/business/homily/types.js";
import { InvalidTimeInputError } from "../../../../src/utils/errors.js";
import { PromptCancelled, type Prompter } from "../../../../src/utils/prompter.js";

function scriptedPrompter(answers: string[]): Prompter & { messages: string[] } {
  const queue = [...answers];
  const messages: string[] = [];
  return {
    messages,
    async input(message) {
      messages.push(message);
      const next = queue.shift();
      if (next === undefined) throw new Error(`Unexpected prompt: ${message}`);
      return next;
    },
  };
}

const transcript: Transcript = {
  segments: [
    { start: 100, end: 110, text: "Dominus vobiscum." },
    { start: 125, end: 150, text: " My dear faithful," },
    { start: 150, end: 180, text: "today we hear the Gospel." },
    { start: 181, end: 200, text: "Credo in unum Deum." },
  ],
};

describe("parseTimeInput", () => {
  it("reads seconds, mm:ss and h:mm:ss", () => {
    expect(parseTimeInput("123")).toBe(123);
    expect(parseTimeInput("12.5")).toBe(12.5);
    expect(parseTimeInput("2:03")).toBe(123);
    expect(parseTimeInput(" 1:02:03 ")).toBe(3723);
  });

  it.each(["", "abc", "-5", "1:2:3:4", "2:", "2:75", "1:60:00"])("rejects %j", (value) => {
    expect(() => parseTimeInput(value)).toThrow(InvalidTimeInputError);
  });
});

describe("resolveManually", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("re-prompts after an invalid time and keeps segments inside the range", async () => {
    const prompter = scriptedPrompter(["abc", "2:03", "3:00"]);
    const probeDuration = vi.fn(async (_audioPath: string) => 999);

    const selection = await resolveManually({ transcript, prompter, audioPath: "mass.mp3", probeDuration });

    expect(prompter.messages).toEqual([
      "Enter START time (e.g., 123 or 2:03):",
      "Enter START time (e.g., 123 or 2:03):",
      "Enter END time (or press Enter for end of file):",
    ]);
    expect(console.warn).toHaveBeenCalledWith("[homily] ✗ Invalid start time. Try again.");
    expect(selection).toEqual({
      first: 123,
      last: 180,
      homilyText: "My dear faithful, today we hear the Gospel.",
      videoSegments: [
        { start: 2, end: 27, text: "My dear faithful," },
        { start: 27, end: 57, text: "today we hear the Gospel." },
      ],
    });
    expect(probeDuration).not.toHaveBeenCalled();
  });

  it("ends at the last segment when the end is left blank", async () => {
    const selection = await resolveManually({
      transcript,
      prompter: scriptedPrompter(["180", ""]),
      audioPath: "mass.mp3",
      probeDuration: async () => 999,
    });
    expect(selection.last).toBe(200);
    expect(selection.homilyText).toBe("Credo in unum Deum.");
  });

  it("probes the audio when the transcript has no segments", async () => {
    const probeDuration = vi.fn(async (_audioPath: string) => 300);
    const selection = await resolveManually({
      transcript: { segments: [] },
      prompter: scriptedPrompter(["10", ""]),
      audioPath: "mass.mp3",
      probeDuration,
    });
    expect(probeDuration).toHaveBeenCalledWith("mass.mp3");
    expect(selection).toEqual({ first: 10, last: 300, homilyText: "", videoSegments: [] });
  });

  it("re-prompts for an invalid end time", async () => {
    const selection = await resolveManually({
      transcript,
      prompter: scriptedPrompter(["100", "later", "110"]),
      audioPath: "mass.mp3",
      probeDuration: async () => 999,
    });
    expect(console.warn).toHaveBeenCalledWith("[homily] ✗ Invalid end time. Try again.");
    expect(selection.videoSegments).toEqual([{ start: 0, end: 10, text: "Dominus vobiscum." }]);
  });

  it("re-prompts when the end is not after the start", async () => {
    const prompter = scriptedPrompter(["600", "100", "600", "10:30"]);
    const selection = await resolveManually({
      transcript: { segments: [] },
      prompter,
      audioPath: "mass.mp3",
      probeDuration: async () => 999,
    });

    expect(prompter.messages).toHaveLength(4);
    expect(console.warn).toHaveBeenCalledWith("[homily] ✗ END (100s) must be after START (600s). Try again.");
    expect(console.warn).toHaveBeenCalledWith("[homily] ✗ END (600s) must be after START (600s). Try again.");
    expect(selection).toEqual({ first: 600, last: 630, homilyText: "", videoSegments: [] });
  });

  it("re-prompts when a blank end falls before the start", async () => {
    const selection = await resolveManually({
      transcript,
      prompter: scriptedPrompter(["250", "", "4:20"]),
      audioPath: "mass.mp3",
      probeDuration: async () => 999,
    });
    expect(console.warn).toHaveBeenCalledWith("[homily] ✗ END (200s) must be after START (250s). Try again.");
    expect(selection.last).toBe(260);
  });

  it("passes prompt cancellation through", async () => {
    const prompter: Prompter = {
      input: async () => {
        throw new PromptCancelled();
      },
    };
    await expect(
      resolveManually({ transcript, prompter, audioPath: "mass.mp3", probeDuration: async () => 0 })
    ).rejects.toBeInstanceOf(PromptCancelled);
  });

  describe("with an artifact path", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), "homily-manual-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("saves the selection as JSON", async () => {
      const artifactPath = path.join(dir, "homily.json");
      await resolveManually({
        transcript,
        prompter: scriptedPrompter(["125", "150"]),
        audioPath: "mass.mp3",
        probeDuration: async () => 0,
        artifactPath,
      });

      expect(JSON.parse(await readFile(artifactPath, "utf-8"))).toEqual({
        first: 125,
        last: 150,
        text: "My dear faithful,",
        segments: [{ start: 0, end: 25, text: "My dear faithful," }],
      });
    });
  });
});
