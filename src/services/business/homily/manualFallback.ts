/**
 * Manual Homily Selection
 * Used when the marker cannot be found: asks for start/end times instead.
 */

import { writeFile } from "fs/promises";
import { InvalidTimeInputError } from "../../../utils/errors.js";
import type { Prompter } from "../../../utils/prompter.js";
import type { HomilyBoundary, Transcript, VideoSegment } from "./types.js";

/**
 * Parses "123", "123.5", "2:03" or "1:02:03" into seconds.
 * Throws InvalidTimeInputError for anything else.
 */
export function parseTimeInput(value: string): number {
  const trimmed = value.trim();
  const parts = trimmed.split(":");
  if (trimmed === "" || parts.length > 3) {
    throw new InvalidTimeInputError(value);
  }

  const numbers = parts.map((part) => (/^\d+(\.\d+)?$/.test(part) ? Number(part) : NaN));
  if (numbers.some((n) => Number.isNaN(n))) {
    throw new InvalidTimeInputError(value);
  }
  // minutes and seconds after a colon stay below 60
  if (numbers.slice(1).some((n) => n >= 60)) {
    throw new InvalidTimeInputError(value);
  }
  return numbers.reduce((total, n) => total * 60 + n, 0);
}

export interface ManualSelectionInput {
  transcript: Transcript;
  prompter: Prompter;
  audioPath: string;
  /** Measures the source audio when neither the user nor the transcript gives an end. */
  probeDuration: (audioPath: string) => Promise<number>;
  /** Where to save the selection as JSON for later steps. */
  artifactPath?: string;
}

export interface ManualSelection extends HomilyBoundary {
  homilyText: string;
  videoSegments: VideoSegment[];
}

async function promptUntilValid<T>(
  prompter: Prompter,
  message: string,
  label: string,
  parse: (answer: string) => T
): Promise<T> {
  for (;;) {
    const answer = await prompter.input(message);
    try {
      return parse(answer);
    } catch (error) {
      if (!(error instanceof InvalidTimeInputError)) {
        throw error;
      }
      console.warn(`[homily] ✗ Invalid ${label} time. Try again.`);
    }
  }
}

function parseOptionalTime(answer: string): number | undefined {
  return answer.trim() === "" ? undefined : parseTimeInput(answer);
}

/**
 * END time, falling back to the last segment end, then to the probed audio
 * duration. Re-prompts until it lies after `first`.
 */
async function promptForEnd(input: ManualSelectionInput, first: number): Promise<number> {
  const segments = input.transcript.segments ?? [];
  for (;;) {
    const manualEnd = await promptUntilValid(
      input.prompter,
      "Enter END time (or press Enter for end of file):",
      "end",
      parseOptionalTime
    );

    let last: number;
    if (manualEnd !== undefined) {
      last = manualEnd;
    } else if (segments.length > 0) {
      last = segments[segments.length - 1].end;
    } else {
      last = await input.probeDuration(input.audioPath);
    }

    if (last > first) {
      return last;
    }
    console.warn(`[homily] ✗ END (${last}s) must be after START (${first}s). Try again.`);
  }
}

/**
 * Prompts until valid times are entered and cuts the transcript at
 * segment granularity (a TXT-derived transcript has no word timings).
 */
export async function resolveManually(input: ManualSelectionInput): Promise<ManualSelection> {
  const { transcript, prompter } = input;
  console.log("[homily] Could not locate the homily; enter the start and end times manually.");

  const first = await promptUntilValid(
    prompter,
    "Enter START time (e.g., 123 or 2:03):",
    "start",
    parseTimeInput
  );
  const allSegments = transcript.segments ?? [];
  const last = await promptForEnd(input, first);

  const videoSegments: VideoSegment[] = allSegments
    .filter((seg) => seg.start >= first && seg.end <= last)
    .map((seg) => ({ start: seg.start - first, end: seg.end - first, text: seg.text.trim() }));
  const homilyText = videoSegments.map((seg) => seg.text).join(" ");

  if (input.artifactPath) {
    await writeFile(
      input.artifactPath,
      JSON.stringify({ first, last, text: homilyText, segments: videoSegments }, null, 2),
      "utf-8"
    );
    console.log(`[homily] ✓ Saved manual selection to ${input.artifactPath}`);
  }

  console.log(`[homily] Manual selection: ${first}s → ${last}s (${videoSegments.length} segments)`);
  return { first, last, homilyText, videoSegments };
}
