/**
 * Search Pattern Compiler
 * Turns an expression like "in? the name of the Father|Lord" into match tokens.
 *
 * Syntax: whitespace-separated tokens, a trailing `?` marks a token
 * optional, `|` separates alternatives inside one token.
 */

import { normalizeText } from "./tokenizer.js";
import type { MatchToken, Pattern } from "./types.js";

export function compilePattern(expression: string): Pattern {
  const rawTokens = expression.split(/\s+/).filter((raw) => raw.length > 0);

  return rawTokens.map((raw): MatchToken => {
    const optional = raw.endsWith("?");
    const body = optional ? raw.slice(0, -1) : raw;
    const normalized = normalizeText(body).trim();

    if (normalized.includes("|")) {
      return {
        kind: "alternatives",
        alternatives: normalized.split("|").map((alt) => alt.trim()),
        optional,
      };
    }
    return { kind: "word", word: normalized, optional };
  });
}

/** Renders a compiled pattern back to its expression form, for log lines. */
export function describePattern(pattern: Pattern): string {
  return pattern
    .map((t) => {
      const body = t.kind === "word" ? t.word : t.alternatives.join("|");
      return t.optional ? `${body}?` : body;
    })
    .join(" ");
}
