/**
 * Caption Service
 * Writes SRT captions for the homily video.
 */

import { writeFile } from "fs/promises";
import type { VideoSegment } from "./homily/types.js";

/** Seconds of intro video prepended before the homily. */
export const DEFAULT_SRT_SHIFT_SEC = 11;

/**
 * Formats seconds as HH:MM:SS,mmm. Rounded to the nearest millisecond;
 * negative values clamp to zero.
 */
export function formatSrtTimestamp(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const ms = totalMs % 1000;
  const totalSec = Math.floor(totalMs / 1000);
  const s = totalSec % 60;
  const m = Math.floor(totalSec / 60) % 60;
  const h = Math.floor(totalSec / 3600);
  return `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}:${String(s).padStart(2, "0")},${String(ms).padStart(3, "0")}`;
}

export function buildSrt(
  segments: readonly VideoSegment[],
  shiftSec: number = DEFAULT_SRT_SHIFT_SEC
): string {
  return segments
    .map(
      (seg, i) =>
        `${i + 1}\n` +
        `${formatSrtTimestamp(seg.start + shiftSec)} --> ${formatSrtTimestamp(seg.end + shiftSec)}\n` +
        `${seg.text.trim()}\n\n`
    )
    .join("");
}

export async function writeSrtFile(
  segments: readonly VideoSegment[],
  outputPath: string,
  shiftSec: number = DEFAULT_SRT_SHIFT_SEC
): Promise<void> {
  await writeFile(outputPath, buildSrt(segments, shiftSec), "utf-8");
  console.log(`[captions] ✓ Wrote ${segments.length} captions to ${outputPath} (shift ${shiftSec}s)`);
}
