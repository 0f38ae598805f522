/**
 * Homily Segment Extractor
 * Cuts the homily out of the transcript and re-times it so the homily starts at 0.
 */

import type {
  ExtractedHomily,
  HomilySegment,
  Transcript,
  TranscriptSegment,
  TranscriptWord,
  WordInclusion,
} from "./types.js";

/** The transcript's segments, or its top-level words wrapped as one segment. */
function segmentsOf(transcript: Transcript): TranscriptSegment[] {
  const segments = transcript.segments ?? [];
  const words = transcript.words ?? [];
  if (segments.length > 0 || words.length === 0) {
    return segments;
  }
  return [
    {
      start: words[0].start,
      end: words[words.length - 1].end,
      text: joinWords(words),
      words,
    },
  ];
}

export function isWordInRange(
  word: TranscriptWord,
  first: number,
  last: number,
  inclusion: WordInclusion
): boolean {
  switch (inclusion) {
    case "strict":
      return first <= word.start && word.start <= word.end && word.end <= last;
    case "bounded":
      return word.start >= first && word.end <= last;
    case "start-only":
      return first <= word.start && word.start <= last;
  }
}

export function joinWords(words: readonly TranscriptWord[]): string {
  return words
    .map((w) => w.word.trim())
    .filter((w) => w.length > 0)
    .join(" ");
}

/**
 * Keeps each segment's words inside [first, last], shifted by -first.
 * Segments left without words are dropped. Words may sit outside their
 * segment's own range, so only word timestamps are consulted.
 */
export function extractHomily(
  transcript: Transcript,
  first: number,
  last: number,
  inclusion: WordInclusion = "strict"
): ExtractedHomily {
  const segments: HomilySegment[] = [];

  for (const segment of segmentsOf(transcript)) {
    const kept = (segment.words ?? []).filter((w) =>
      isWordInRange(w, first, last, inclusion)
    );
    if (kept.length === 0) {
      continue;
    }

    const words = kept.map((w) => ({ ...w, start: w.start - first, end: w.end - first }));
    segments.push({
      start: words[0].start,
      end: words[words.length - 1].end,
      text: joinWords(words),
      words,
    });
  }

  return {
    homilyText: joinWords(segments.flatMap((s) => s.words)),
    segments,
    videoSegments: segments.map(({ start, end, text }) => ({ start, end, text })),
  };
}
