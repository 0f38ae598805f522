/**
 * MDX Service
 * Turns the homily text into a blog post: the agent supplies structure and
 * metadata; the body is assembled here from the untouched homily text.
 */

import { runJsonAgent } from "../external/openai/runJsonAgent.js";
import { MdxPayloadSchema, type MdxPayload } from "../external/openai/agentSchemas.js";
import { buildMdxWriterPrompt } from "./agents/mdxWriter.js";
import type { VideoSegment } from "./homily/types.js";

export const FRONT_MATTER_KEYS = [
  "title",
  "description",
  "keywords",
  "youtube_category",
  "youtube_description",
  "youtube_hash",
  "mdx_file",
  "category",
  "slug",
  "date",
  "modDate",
  "author",
  "media_type",
  "media_path",
  "media_title",
  "media_alt",
  "media_aria",
  "prev_topic_label",
  "prev_topic_path",
  "next_topic_label",
  "next_topic_path",
] as const;

export type FrontMatterKey = (typeof FRONT_MATTER_KEYS)[number];
export type FrontMatter = Record<FrontMatterKey, string>;

export interface PageDates {
  date: string;
  modDate: string;
}

const FEASTS: ReadonlyArray<readonly [string, string]> = [
  ["immaculate conception", "immaculate-conception"],
  ["christ the king", "christ-the-king"],
  ["sacred heart", "sacred-heart"],
  ["epiphany", "epiphany"],
  ["ascension", "ascension"],
  ["corpus christi", "corpus-christi"],
  ["annunciation", "annunciation"],
  ["assumption", "assumption"],
  ["purification", "purification"],
  ["presentation", "presentation"],
  ["nativity of our lord", "christmas-day"],
  ["christmas", "christmas-day"],
  ["all saints", "all-saints"],
];

const NUMBERED_SUNDAYS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\b(\d{1,2})(?:st|nd|rd|th)\s+sunday\s+after\s+pentecost\b/, "sunday-after-pentecost"],
  [/\b(\d{1,2})(?:st|nd|rd|th)\s+sunday\s+of\s+advent\b/, "sunday-of-advent"],
  [/\b(\d{1,2})(?:st|nd|rd|th)\s+sunday\s+in\s+lent\b/, "sunday-in-lent"],
];

/** Same day when it is a Sunday, else the Sunday before. */
export function getPreviousSunday(date: Date): Date {
  const sunday = new Date(date.getFullYear(), date.getMonth(), date.getDate());
  sunday.setDate(sunday.getDate() - sunday.getDay());
  return sunday;
}

/** Local calendar date as YYYY-MM-DD. */
export function formatIsoDate(date: Date): string {
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${mm}-${dd}`;
}

export function ordinalSuffix(n: number): string {
  if (n % 100 >= 11 && n % 100 <= 13) return "th";
  switch (n % 10) {
    case 1:
      return "st";
    case 2:
      return "nd";
    case 3:
      return "rd";
    default:
      return "th";
  }
}

/**
 * Mass or feast named aloud in the homily, as a kebab key
 * ("20th-sunday-after-pentecost", "christ-the-king"). Null if none.
 */
export function inferMassHint(homilyText: string): string | null {
  const text = homilyText.toLowerCase();

  for (const [pattern, key] of NUMBERED_SUNDAYS) {
    const m = pattern.exec(text);
    if (m) {
      const n = Number(m[1]);
      return `${n}${ordinalSuffix(n)}-${key}`;
    }
  }

  for (const [needle, key] of FEASTS) {
    if (text.includes(needle)) return key;
  }
  return null;
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/** Double-quoted YAML scalar body. */
export function yamlEscape(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\r?\n/g, "\\n");
}

function yamlUnescape(value: string): string {
  return value.replace(/\\(["\\n])/g, (_, ch: string) => (ch === "n" ? "\n" : ch));
}

function frontMatterValue(payload: MdxPayload, key: string): string {
  const value = payload.front_matter[key];
  return value === null || value === undefined ? "" : String(value).trim();
}

export function resolveFrontMatter(payload: MdxPayload, dates: PageDates): FrontMatter {
  const get = (key: FrontMatterKey) => frontMatterValue(payload, key);
  const title = get("title") || "Untitled Homily";
  const kebab = slugify(get("title") || "homily");

  return {
    title,
    description: get("description"),
    keywords: get("keywords") || "Latin Mass, Tridentine Mass, Traditional Catholic",
    youtube_category: get("youtube_category") || "Education",
    youtube_description: get("youtube_description"),
    youtube_hash: get("youtube_hash"),
    mdx_file: get("mdx_file") || `src/mds/lectures/${kebab}.mdx`,
    category: get("category") || "lectures",
    slug: get("slug") || `/${kebab}`,
    date: get("date") || dates.date,
    modDate: get("modDate") || dates.modDate,
    author: get("author"),
    media_type: get("media_type") || "video",
    media_path: get("media_path"),
    media_title: get("media_title") || title,
    media_alt: get("media_alt") || (get("title") || "Homily video"),
    media_aria: get("media_aria") || (get("title") || "Homily video"),
    prev_topic_label: get("prev_topic_label"),
    prev_topic_path: get("prev_topic_path"),
    next_topic_label: get("next_topic_label"),
    next_topic_path: get("next_topic_path"),
  };
}

/** Homily split on blank lines, with headings placed before their paragraph. */
export function insertHeadings(homilyText: string, payload: MdxPayload): string {
  const paragraphs = homilyText
    .trim()
    .split(/\n\s*\n/)
    .filter((p) => p.trim() !== "");

  const byIndex = new Map<number, string[]>();
  for (const heading of payload.headings) {
    const index = Math.max(0, heading.para_index);
    const tag = heading.level.toLowerCase() === "h2" ? "##" : "###";
    byIndex.set(index, [...(byIndex.get(index) ?? []), `${tag} ${heading.title}`]);
  }

  return paragraphs.flatMap((p, i) => [...(byIndex.get(i) ?? []), p]).join("\n\n");
}

/**
 * Full MDX page: YAML front matter (with shorts and chapters), H1, TOC,
 * the homily with headings, then the summary.
 */
export function assembleMdx(payload: MdxPayload, homilyText: string, dates: PageDates): string {
  const fm = resolveFrontMatter(payload, dates);

  const yaml = ["---"];
  for (const key of FRONT_MATTER_KEYS) {
    yaml.push(`${key}: "${yamlEscape(fm[key])}"`);
  }

  yaml.push("shorts:");
  for (const clip of payload.shorts) {
    yaml.push(
      `  - {"title": "${yamlEscape(clip.title)}", "quote": "${yamlEscape(clip.quote)}", ` +
        `"start": ${JSON.stringify(clip.start)}, "end": ${JSON.stringify(clip.end)}, ` +
        `"keywords": ${JSON.stringify(clip.keywords)} }`
    );
  }

  yaml.push("chapters:");
  for (const chapter of payload.chapters) {
    const anchor = chapter.anchor || slugify(chapter.title);
    yaml.push(
      `  - {"title": "${yamlEscape(chapter.title)}", "anchor": "${yamlEscape(anchor)}", ` +
        `"start": ${JSON.stringify(chapter.start)} }`
    );
  }
  yaml.push("---\n");

  const body = [`# ${fm.title}\n`];

  if (payload.toc.length > 0) {
    body.push("## Summary of Headings\n");
    for (const title of payload.toc) {
      body.push(`- [${title}](#${slugify(title)})`);
    }
    body.push("");
  }

  body.push(insertHeadings(homilyText, payload));
  body.push("");

  if (payload.summary_paragraphs.length > 0) {
    body.push("\n## Summary\n");
    body.push(...payload.summary_paragraphs);
  }

  return [...yaml, ...body].join("\n").trim();
}

const FRONT_MATTER_LINE = /^([A-Za-z_]+): "((?:[^"\\]|\\.)*)"$/;

/** Scalar `key: "value"` fields of the leading front-matter block. */
export function parseFrontMatter(mdx: string): Record<string, string> {
  const lines = mdx.split(/\r?\n/);
  const fields: Record<string, string> = {};
  if (lines[0]?.trim() !== "---") return fields;

  for (const line of lines.slice(1)) {
    if (line.trim() === "---") break;
    const m = FRONT_MATTER_LINE.exec(line);
    if (m) fields[m[1]] = yamlUnescape(m[2]);
  }
  return fields;
}

/** Replaces (or appends) one scalar field in the front matter. */
export function setFrontMatterField(mdx: string, key: FrontMatterKey, value: string): string {
  const lines = mdx.split("\n");
  const close = lines.indexOf("---", 1);
  if (lines[0] !== "---" || close === -1) return mdx;

  const entry = `${key}: "${yamlEscape(value)}"`;
  const existing = lines.slice(1, close).findIndex((line) => line.startsWith(`${key}: `));
  if (existing === -1) {
    lines.splice(close, 0, entry);
  } else {
    lines[existing + 1] = entry;
  }
  return lines.join("\n");
}

/** Segment text trimmed to 120 chars, at most 2000 segments. */
export function compactSegments(segments: readonly VideoSegment[]): VideoSegment[] {
  return segments.slice(0, 2000).map((s) => ({ start: s.start, end: s.end, text: s.text.trim().slice(0, 120) }));
}

export interface GenerateMdxOptions {
  now?: Date;
  donationUrl?: string;
}

export async function generateMdx(
  homilyText: string,
  segments: readonly VideoSegment[],
  options: GenerateMdxOptions = {}
): Promise<string> {
  const now = options.now ?? new Date();
  const dates: PageDates = {
    date: formatIsoDate(getPreviousSunday(now)),
    modDate: formatIsoDate(now),
  };
  const massHint = inferMassHint(homilyText);
  console.log(`[mdx] Page date ${dates.date}${massHint ? ` (${massHint})` : ""}`);

  const payload = await runJsonAgent({
    agentName: "MdxWriter",
    systemPrompt: buildMdxWriterPrompt({ ...dates, donationUrl: options.donationUrl }),
    input: {
      mass_hint: massHint,
      homily_text: homilyText,
      segments: compactSegments(segments),
    },
    schema: MdxPayloadSchema,
  });

  const mdx = assembleMdx(payload, homilyText, dates);
  console.log(`[mdx] ✓ Page assembled: ${payload.headings.length} headings, ${payload.chapters.length} chapters`);
  return mdx;
}
