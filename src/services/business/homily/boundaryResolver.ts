/**
 * Homily Boundary Resolver
 * Locates the homily inside a full liturgical transcript.
 *
 * The opening boundary is the configured marker phrase (a trinitarian
 * blessing ending in "Amen"). The closing boundary comes from exactly one
 * end strategy per configuration:
 *   - repeated-marker: just before the last later occurrence of the marker
 *   - silence-gap: the first pause of at least `silenceThresholdSec`
 */

import { MarkerConfigError } from "../../../utils/errors.js";
import { findPhrase } from "./matcher.js";
import { compilePattern, describePattern } from "./pattern.js";
import { extractHomily } from "./segmentExtractor.js";
import { flattenTranscript } from "./tokenizer.js";
import type {
  BoundaryNotFound,
  BoundaryResolution,
  EndStrategy,
  HomilyResult,
  NotFoundReason,
  Pattern,
  StartAt,
  Token,
  Transcript,
  WordInclusion,
} from "./types.js";

export const DEFAULT_HOMILY_MARKER = "Holy Ghost|Spirit. Amen.";

export interface DetectorOptions {
  marker: string;
  endStrategy: EndStrategy;
  startAt: StartAt;
  silenceThresholdSec: number;
}

export const DEFAULT_DETECTOR_OPTIONS: DetectorOptions = {
  marker: DEFAULT_HOMILY_MARKER,
  endStrategy: "repeated-marker",
  startAt: "next-word",
  silenceThresholdSec: 8,
};

const INCLUSION_BY_STRATEGY: Record<EndStrategy, WordInclusion> = {
  "repeated-marker": "strict",
  "silence-gap": "bounded",
};

/** "Holy Ghost" without the trailing "Amen"; a usable marker must not match it. */
const BARE_BLESSING: Transcript = {
  segments: [
    {
      start: 0,
      end: 1,
      text: "Holy Ghost",
      words: [
        { word: "Holy", start: 0.0, end: 0.5 },
        { word: "Ghost", start: 0.5, end: 1.0 },
      ],
    },
  ],
};

function notFound(reason: NotFoundReason, message: string): BoundaryNotFound {
  return { status: "not-found", reason, message };
}

/**
 * Compiles the marker and rejects patterns that are empty or that accept
 * a bare "Holy Ghost". Throws MarkerConfigError.
 */
export function compileMarker(marker: string): Pattern {
  const pattern = compilePattern(marker);
  if (pattern.length === 0) {
    throw new MarkerConfigError(marker, "the marker has no tokens");
  }

  const tokens = flattenTranscript(BARE_BLESSING);
  if (findPhrase(tokens, pattern) !== null) {
    throw new MarkerConfigError(
      marker,
      "it matches a bare 'Holy Ghost'; make the trailing 'Amen' mandatory"
    );
  }
  return pattern;
}

export class HomilyBoundaryResolver {
  readonly options: DetectorOptions;
  readonly pattern: Pattern;

  constructor(options: Partial<DetectorOptions> = {}) {
    this.options = { ...DEFAULT_DETECTOR_OPTIONS, ...options };
    if (!(this.options.silenceThresholdSec > 0)) {
      throw new MarkerConfigError(
        this.options.marker,
        `silence threshold must be positive (got ${this.options.silenceThresholdSec})`
      );
    }
    this.pattern = compileMarker(this.options.marker);
  }

  resolve(transcript: Transcript): BoundaryResolution {
    // -Infinity keeps every word, so token index === token position
    const tokens = flattenTranscript(transcript, { skip: -Infinity });
    if (tokens.length === 0) {
      return notFound("no-words", "Transcript has no timestamped words");
    }

    const opening = findPhrase(tokens, this.pattern);
    if (!opening) {
      return notFound(
        "opening-marker-not-found",
        `Opening marker '${this.options.marker}' not found`
      );
    }

    let first: number;
    let startIndex: number;
    if (this.options.startAt === "next-word") {
      if (opening.endIndex >= tokens.length) {
        return notFound("no-words-after-marker", "No words follow the opening marker");
      }
      startIndex = opening.endIndex;
      first = tokens[startIndex].start;
    } else {
      first = opening.end;
      startIndex = tokens.findIndex(
        (t, i) => i >= opening.endIndex && t.start >= first
      );
    }

    const last =
      this.options.endStrategy === "repeated-marker"
        ? this.findLastMarkerBoundary(tokens, opening.end, opening.endIndex)
        : this.findSilenceGapBoundary(tokens, startIndex);

    if (last === null || last < first) {
      return this.options.endStrategy === "repeated-marker"
        ? notFound(
            "closing-marker-not-found",
            `Closing marker '${this.options.marker}' not found after ${opening.end}s`
          )
        : notFound("no-words-after-marker", `No words follow the homily start at ${first}s`);
    }

    console.log(
      `[homily] marker '${describePattern(this.pattern)}' at ${opening.start}s → ${opening.end}s; ` +
        `homily ${first}s → ${last}s (${this.options.endStrategy})`
    );

    return {
      status: "found",
      first,
      last,
      markerStart: opening.start,
      markerEnd: opening.end,
      endStrategy: this.options.endStrategy,
      inclusion: INCLUSION_BY_STRATEGY[this.options.endStrategy],
    };
  }

  /** Boundary detection plus segment extraction in one call. */
  findHomily(transcript: Transcript): HomilyResult {
    const resolution = this.resolve(transcript);
    if (resolution.status === "not-found") {
      return resolution;
    }

    const extracted = extractHomily(
      transcript,
      resolution.first,
      resolution.last,
      resolution.inclusion
    );
    return {
      status: "found",
      first: resolution.first,
      last: resolution.last,
      ...extracted,
    };
  }

  /**
   * Re-searches forward past each occurrence. Every later occurrence moves
   * `last` to the end of the word right before it. The search resumes after
   * the last token of the previous match, so words sharing one timestamp
   * cannot be matched twice.
   */
  private findLastMarkerBoundary(
    tokens: Token[],
    openingEnd: number,
    openingEndIndex: number
  ): number | null {
    let last: number | null = null;
    let fromIndex = openingEndIndex;

    while (fromIndex < tokens.length) {
      const remaining = tokens.slice(fromIndex).filter((t) => t.start >= openingEnd);
      const next = findPhrase(remaining, this.pattern);
      if (!next) {
        break;
      }

      const precedingPosition = remaining[next.startIndex].position - 1;
      if (precedingPosition >= 0) {
        last = tokens[precedingPosition].end;
      }
      fromIndex = remaining[next.endIndex - 1].position + 1;
    }
    return last;
  }

  /** End of the word before the first long enough pause, else of the final word. */
  private findSilenceGapBoundary(tokens: Token[], startIndex: number): number | null {
    if (startIndex < 0 || startIndex >= tokens.length) {
      return null;
    }

    for (let i = startIndex; i < tokens.length - 1; i++) {
      const gap = tokens[i + 1].start - tokens[i].end;
      if (gap >= this.options.silenceThresholdSec) {
        return tokens[i].end;
      }
    }
    return tokens[tokens.length - 1].end;
  }
}
