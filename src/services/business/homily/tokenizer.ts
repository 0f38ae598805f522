/**
 * Transcript Tokenizer
 * Normalizes transcript words into comparable tokens.
 */

import type { Token, Transcript, TranscriptWord } from "./types.js";

const NON_TOKEN_CHARS = /[^\p{L}\p{M}\p{N}_\s|]/gu;

/**
 * Strips everything except word characters, whitespace and the `|`
 * alternation separator, then lowercases.
 * "Ghost." and "ghost" both become "ghost".
 */
export function normalizeText(text: string): string {
  return text.replace(NON_TOKEN_CHARS, "").toLowerCase();
}

/**
 * Words in transcript order: every segment's words, or the top-level
 * word list when the transcript has no segments.
 */
export function collectWords(transcript: Transcript): TranscriptWord[] {
  const segments = transcript.segments ?? [];
  if (segments.length > 0) {
    return segments.flatMap((segment) => segment.words ?? []);
  }
  return transcript.words ?? [];
}

export interface FlattenOptions {
  /** Seconds to skip from the start (forward) or from the end (backwards). */
  skip?: number;
  backwards?: boolean;
}

/**
 * Flattens a transcript into normalized tokens.
 * Forward keeps tokens starting at or after `skip`; backwards keeps tokens
 * ending at or before `maxEnd - skip`.
 */
export function flattenTranscript(
  transcript: Transcript,
  options: FlattenOptions = {}
): Token[] {
  const skip = options.skip ?? 0;
  const tokens: Token[] = collectWords(transcript).map((word, position) => ({
    token: normalizeText(word.word).trim(),
    start: word.start,
    end: word.end,
    position,
  }));

  if (tokens.length === 0) {
    return tokens;
  }

  if (options.backwards) {
    const maxEnd = tokens.reduce((max, t) => Math.max(max, t.end), -Infinity);
    const threshold = maxEnd - skip;
    return tokens.filter((t) => t.end <= threshold);
  }

  return tokens.filter((t) => t.start >= skip);
}
