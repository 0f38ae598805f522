/**
 * Zod Schemas for AI Agent Outputs
 */

import { z } from "zod";

const nullableSeconds = z.number().min(0).nullish().transform((v) => v ?? null);

// MDX writer: page structure for the homily post. The homily body itself is
// assembled locally and never round-trips through the model.
export const MdxHeadingSchema = z.object({
  para_index: z.number().int(),
  level: z.string().default("h2"),
  title: z.string().default(""),
});
export type MdxHeading = z.infer<typeof MdxHeadingSchema>;

export const MdxShortSchema = z.object({
  title: z.string().default(""),
  quote: z.string().default(""),
  start: nullableSeconds,
  end: nullableSeconds,
  keywords: z.array(z.string()).default([]),
});
export type MdxShort = z.infer<typeof MdxShortSchema>;

export const MdxChapterSchema = z.object({
  title: z.string().default(""),
  anchor: z.string().nullish(),
  start: nullableSeconds,
});
export type MdxChapter = z.infer<typeof MdxChapterSchema>;

export const MdxPayloadSchema = z.object({
  front_matter: z
    .record(z.string(), z.union([z.string(), z.number(), z.null()]))
    .nullish()
    .transform((v) => v ?? {}),
  toc: z.array(z.string()).nullish().transform((v) => v ?? []),
  headings: z.array(MdxHeadingSchema).nullish().transform((v) => v ?? []),
  summary_paragraphs: z.array(z.string()).nullish().transform((v) => v ?? []),
  shorts: z.array(MdxShortSchema).nullish().transform((v) => v ?? []),
  chapters: z.array(MdxChapterSchema).nullish().transform((v) => v ?? []),
});
export type MdxPayload = z.infer<typeof MdxPayloadSchema>;
