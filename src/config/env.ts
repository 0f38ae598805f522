/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Fails fast at startup if a variable is present but invalid; API secrets
 * are read on first use so that offline commands run without them.
 */

import { z } from "zod";

/** Treats blank values from .env files as unset. */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== "" ? value.trim() : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),

  /** Homily detection */
  HOMILY_MARKER: z.string().min(1).default("Holy Ghost|Spirit. Amen."),
  HOMILY_END_STRATEGY: z.enum(["repeated-marker", "silence-gap"]).default("repeated-marker"),
  HOMILY_START_AT: z.enum(["next-word", "marker-end"]).default("next-word"),
  HOMILY_SILENCE_THRESHOLD_SEC: z.coerce.number().positive().default(8),

  /** Captions are shifted by the length of the intro clip */
  SRT_SHIFT_SEC: z.coerce.number().min(0).default(11),

  /** Cleaned audio: seconds cut from each end, seconds of silence appended */
  FINAL_TRIM_SEC: z.coerce.number().min(0).default(6.4),
  FINAL_SILENCE_SEC: z.coerce.number().min(0).default(1),

  INTRO_VIDEO_PATH: optionalString,
  VIDEO_WIDTH: z.coerce.number().int().positive().default(2560),
  VIDEO_HEIGHT: z.coerce.number().int().positive().default(1440),

  AUPHONIC_PRESET: optionalString,
  AUPHONIC_POLL_INTERVAL_SEC: z.coerce.number().positive().default(10),

  YOUTUBE_CATEGORY_ID: z.string().default("22"),
  YOUTUBE_PRIVACY_STATUS: z.enum(["public", "unlisted", "private"]).default("public"),

  /** Contribution link placed at the top of the YouTube description */
  DONATION_URL: optionalString,

  CONTENT_REPO_DIR: optionalString,
  CONTENT_REPO_SUBDIR: z.string().default("src/mds/lectures"),
  CONTENT_REPO_BRANCH: optionalString,
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Parses the given environment (process.env by default).
 * Throws with every invalid variable listed.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}

/**
 * Helper to safely retrieve required environment variables.
 * Throws immediately if variable is missing.
 */
export function getRequiredEnv(key: string, source: NodeJS.ProcessEnv = process.env): string {
  const value = source[key];
  if (!value || value.trim() === "") {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value.trim();
}
