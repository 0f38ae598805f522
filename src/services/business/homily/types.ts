/**
 * Homily Detection Types
 * Transcript shapes consumed by the detector and the values it produces.
 */

import { z } from "zod";

export const TranscriptWordSchema = z.object({
  word: z.string(),
  start: z.number(),
  end: z.number(),
  probability: z.number().optional(),
});
export type TranscriptWord = z.infer<typeof TranscriptWordSchema>;

export const TranscriptSegmentSchema = z.object({
  id: z.number().optional(),
  start: z.number(),
  end: z.number(),
  text: z.string(),
  words: z.array(TranscriptWordSchema).optional(),
});
export type TranscriptSegment = z.infer<typeof TranscriptSegmentSchema>;

/**
 * Full speech-to-text result. Segments carry their words; a bare top-level
 * word list is accepted when there are no segments.
 */
export const TranscriptSchema = z.object({
  text: z.string().optional(),
  language: z.string().optional(),
  duration: z.number().optional(),
  segments: z.array(TranscriptSegmentSchema).optional(),
  words: z.array(TranscriptWordSchema).optional(),
});
export type Transcript = z.infer<typeof TranscriptSchema>;

/** Normalized view of one transcript word. `position` indexes the unfiltered word sequence. */
export interface Token {
  token: string;
  start: number;
  end: number;
  position: number;
}

export type MatchToken =
  | { kind: "word"; word: string; optional: boolean }
  | { kind: "alternatives"; alternatives: string[]; optional: boolean };

export type Pattern = readonly MatchToken[];

/** Token-array indices of one occurrence; `endIndex` is exclusive. */
export interface PhraseMatch {
  startIndex: number;
  endIndex: number;
}

export interface PhraseTimestamps {
  start: number;
  end: number;
}

export interface HomilyBoundary {
  first: number;
  last: number;
}

export interface HomilySegment {
  start: number;
  end: number;
  text: string;
  words: TranscriptWord[];
}

export interface VideoSegment {
  start: number;
  end: number;
  text: string;
}

export type EndStrategy = "repeated-marker" | "silence-gap";
export type StartAt = "next-word" | "marker-end";

/**
 * Word filter applied when cutting the homily out of the transcript.
 * - strict: first <= start <= end <= last
 * - bounded: start >= first && end <= last
 * - start-only: first <= start <= last
 */
export type WordInclusion = "strict" | "bounded" | "start-only";

export type NotFoundReason =
  | "no-words"
  | "opening-marker-not-found"
  | "no-words-after-marker"
  | "closing-marker-not-found";

export interface BoundaryNotFound {
  status: "not-found";
  reason: NotFoundReason;
  message: string;
}

export type BoundaryResolution =
  | ({
      status: "found";
      markerStart: number;
      markerEnd: number;
      endStrategy: EndStrategy;
      inclusion: WordInclusion;
    } & HomilyBoundary)
  | BoundaryNotFound;

export interface ExtractedHomily {
  homilyText: string;
  segments: HomilySegment[];
  videoSegments: VideoSegment[];
}

export type HomilyResult =
  | ({ status: "found" } & HomilyBoundary & ExtractedHomily)
  | BoundaryNotFound;
