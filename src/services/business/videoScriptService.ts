/**
 * Video Script Service
 * Produces the timed text the captioned video is rendered from.
 */

import { extractHomily } from "./homily/segmentExtractor.js";
import type { HomilySegment, Transcript } from "./homily/types.js";

export interface VideoScript {
  segments: HomilySegment[];
  homily_start: number;
  homily_end: number;
  homily_text: string;
}

/**
 * Keeps every word that starts inside the homily, including one that runs
 * past its end.
 */
export function generateVideoScript(
  transcript: Transcript,
  homilyStart: number,
  homilyEnd: number
): VideoScript {
  const { segments, homilyText } = extractHomily(transcript, homilyStart, homilyEnd, "start-only");
  return {
    segments,
    homily_start: homilyStart,
    homily_end: homilyEnd,
    homily_text: homilyText,
  };
}
