/**
 * Phrase Matcher
 * Finds a compiled pattern inside a flattened token sequence.
 */

import { compilePattern } from "./pattern.js";
import { flattenTranscript } from "./tokenizer.js";
import type {
  MatchToken,
  Pattern,
  PhraseMatch,
  PhraseTimestamps,
  Token,
  Transcript,
} from "./types.js";

export function tokenMatches(token: string, matchToken: MatchToken): boolean {
  if (matchToken.kind === "word") {
    return token === matchToken.word;
  }
  return matchToken.alternatives.includes(token);
}

/**
 * Tries to match `pattern[patternIndex..]` starting at `tokens[tokenIndex]`.
 * Returns the exclusive end index of the match, or null.
 *
 * Optional tokens are skipped first and only consumed when skipping fails.
 * A failed mandatory token fails the attempt outright.
 */
export function matchAt(
  tokens: readonly Token[],
  tokenIndex: number,
  pattern: Pattern,
  patternIndex: number
): number | null {
  if (patternIndex === pattern.length) {
    return tokenIndex;
  }

  if (tokenIndex >= tokens.length) {
    const rest = pattern.slice(patternIndex);
    return rest.every((t) => t.optional) ? tokenIndex : null;
  }

  const current = tokens[tokenIndex].token;
  const matchToken = pattern[patternIndex];

  if (matchToken.optional) {
    const skipped = matchAt(tokens, tokenIndex, pattern, patternIndex + 1);
    if (skipped !== null) {
      return skipped;
    }
    if (tokenMatches(current, matchToken)) {
      return matchAt(tokens, tokenIndex + 1, pattern, patternIndex + 1);
    }
    return null;
  }

  if (tokenMatches(current, matchToken)) {
    return matchAt(tokens, tokenIndex + 1, pattern, patternIndex + 1);
  }
  return null;
}

/** Every occurrence of the pattern, overlapping ones included, by start index. */
export function searchPattern(tokens: readonly Token[], pattern: Pattern): PhraseMatch[] {
  const matches: PhraseMatch[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const endIndex = matchAt(tokens, i, pattern, 0);
    if (endIndex !== null) {
      matches.push({ startIndex: i, endIndex });
    }
  }
  return matches;
}

export interface LocatedPhrase extends PhraseMatch, PhraseTimestamps {}

/**
 * First occurrence (or last, when `backwards`) with its timestamps.
 * Null for an empty pattern, and for matches that consume no tokens.
 */
export function findPhrase(
  tokens: readonly Token[],
  pattern: Pattern,
  options: { backwards?: boolean } = {}
): LocatedPhrase | null {
  if (pattern.length === 0) {
    return null;
  }

  const matches = searchPattern(tokens, pattern).filter(
    (m) => m.endIndex > m.startIndex
  );
  if (matches.length === 0) {
    return null;
  }

  const match = options.backwards ? matches[matches.length - 1] : matches[0];
  return {
    ...match,
    start: tokens[match.startIndex].start,
    end: tokens[match.endIndex - 1].end,
  };
}

export interface FindPhraseOptions {
  backwards?: boolean;
  skip?: number;
}

/**
 * Start of the first token and end of the last token of the first match
 * (last match when searching backwards), or null when nothing matches.
 */
export function findPhraseTimestamps(
  transcript: Transcript,
  phrase: string | Pattern,
  options: FindPhraseOptions = {}
): PhraseTimestamps | null {
  const tokens = flattenTranscript(transcript, {
    skip: options.skip,
    backwards: options.backwards,
  });
  if (tokens.length === 0) {
    return null;
  }

  const pattern = typeof phrase === "string" ? compilePattern(phrase) : phrase;
  const found = findPhrase(tokens, pattern, { backwards: options.backwards });
  return found ? { start: found.start, end: found.end } : null;
}
