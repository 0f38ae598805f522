/**
 * Transcription Service
 * Compress → route by size:
 *   ≤24MB → one Groq request
 *   >24MB → chunk, transcribe each, merge with cumulative offsets
 * Also reads and writes the transcript files kept in the working directory.
 */

import { access, readFile, stat, unlink, writeFile } from "fs/promises";
import { transcribeWithGroq, DIRECT_UPLOAD_LIMIT_MB } from "../external/whisperGroq.js";
import { compressForStt, getAudioDuration } from "../../utils/audioCompression.js";
import { splitIntoChunks } from "../../utils/audioChunking.js";
import { BadRequestError, NotFoundError } from "../../utils/errors.js";
import { TranscriptSchema, type Transcript, type TranscriptSegment } from "./homily/types.js";

export interface ChunkTranscript {
  transcript: Transcript;
  /** Length of the chunk's audio in seconds. */
  durationSec: number;
}

/**
 * Shifts every chunk by the total duration of the chunks before it and
 * concatenates segments, words and text.
 */
export function mergeTranscripts(chunks: readonly ChunkTranscript[]): Transcript {
  let offset = 0;
  const segments: TranscriptSegment[] = [];
  const texts: string[] = [];

  for (const { transcript, durationSec } of chunks) {
    for (const seg of transcript.segments ?? []) {
      segments.push({
        ...seg,
        id: segments.length,
        start: seg.start + offset,
        end: seg.end + offset,
        words: seg.words?.map((w) => ({ ...w, start: w.start + offset, end: w.end + offset })),
      });
    }
    if (transcript.text) texts.push(transcript.text.trim());
    offset += durationSec;
  }

  console.log(`[merging] ✓ ${chunks.length} chunks → ${segments.length} segments, ${(offset / 60).toFixed(1)}min`);
  return {
    text: texts.join(" "),
    language: chunks[0]?.transcript.language ?? "en",
    duration: offset,
    segments,
  };
}

/**
 * Transcribes a recording of any length.
 */
export async function transcribe(audioPath: string): Promise<Transcript> {
  const cleanupPaths: string[] = [];

  try {
    const compressedPath = await compressForStt(audioPath);
    cleanupPaths.push(compressedPath);

    const compressedMB = (await stat(compressedPath)).size / (1024 * 1024);
    if (compressedMB <= DIRECT_UPLOAD_LIMIT_MB) {
      return await transcribeWithGroq(compressedPath);
    }

    console.log(`[transcribe] ${compressedMB.toFixed(2)}MB exceeds ${DIRECT_UPLOAD_LIMIT_MB}MB, chunking`);
    const chunkPaths = await splitIntoChunks(audioPath, await getAudioDuration(audioPath));
    cleanupPaths.push(...chunkPaths);

    const chunks: ChunkTranscript[] = [];
    for (const [index, chunkPath] of chunkPaths.entries()) {
      console.log(`[transcribe] Transcribing chunk ${index + 1}/${chunkPaths.length}...`);
      chunks.push({
        transcript: await transcribeWithGroq(chunkPath),
        durationSec: await getAudioDuration(chunkPath),
      });
    }
    return mergeTranscripts(chunks);
  } finally {
    for (const tempPath of cleanupPaths) {
      await unlink(tempPath).catch((err: Error) => {
        console.warn(`[transcribe] Failed to cleanup ${tempPath}:`, err.message);
      });
    }
  }
}

/** Whole seconds as H:MM:SS. */
export function formatClockTime(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const h = Math.floor(total / 3600);
  const m = Math.floor(total / 60) % 60;
  const s = total % 60;
  return `${h}:${String(m).padStart(2, "0")}:${String(s).padStart(2, "0")}`;
}

/** One "[H:MM:SS - H:MM:SS] text" line per segment. */
export function formatTranscriptLines(transcript: Transcript): string {
  return (transcript.segments ?? [])
    .map((seg) => `[${formatClockTime(seg.start)} - ${formatClockTime(seg.end)}] ${seg.text.trim()}`)
    .join("\n");
}

const TRANSCRIPT_LINE = /^\[(\d+):(\d+):(\d+)\s*-\s*(\d+):(\d+):(\d+)\]\s*(.*)$/;

/**
 * Reads "[H:MM:SS - H:MM:SS] text" lines back into a segments-only
 * transcript. Other lines are ignored; ids are the source line numbers.
 */
export function parseTranscriptText(content: string): Transcript {
  const segments: TranscriptSegment[] = [];

  content.split(/\r?\n/).forEach((line, lineIndex) => {
    const m = TRANSCRIPT_LINE.exec(line);
    if (!m) return;
    const [h1, m1, s1, h2, m2, s2] = m.slice(1, 7).map(Number);
    segments.push({
      id: lineIndex,
      start: h1 * 3600 + m1 * 60 + s1,
      end: h2 * 3600 + m2 * 60 + s2,
      text: m[7],
    });
  });

  return { text: segments.map((s) => s.text).join("\n"), segments };
}

export async function readTranscriptJson(jsonPath: string): Promise<Transcript> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(jsonPath, "utf-8"));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new BadRequestError(`Transcript ${jsonPath} is not valid JSON: ${error.message}`);
    }
    throw new NotFoundError("Transcript", jsonPath);
  }

  const parsed = TranscriptSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BadRequestError(`Transcript ${jsonPath} has an unexpected shape: ${parsed.error.message}`);
  }
  return parsed.data;
}

async function exists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

export interface TranscriptPaths {
  txtPath: string;
  jsonPath: string;
}

/**
 * JSON if present, else the TXT lines (written back as JSON), else a fresh
 * transcription written as both.
 */
export async function loadOrCreateTranscript(
  paths: TranscriptPaths,
  audioPath: string
): Promise<Transcript> {
  if (await exists(paths.jsonPath)) {
    console.log("[transcribe] ✓ JSON transcript already exists. Loading…");
    return readTranscriptJson(paths.jsonPath);
  }

  if (await exists(paths.txtPath)) {
    console.log("[transcribe] TXT exists but JSON missing, parsing TXT");
    const transcript = parseTranscriptText(await readFile(paths.txtPath, "utf-8"));
    await writeFile(paths.jsonPath, JSON.stringify(transcript, null, 2), "utf-8");
    return transcript;
  }

  console.log("[transcribe] No transcript found. Transcribing…");
  const transcript = await transcribe(audioPath);
  await writeFile(paths.txtPath, formatTranscriptLines(transcript), "utf-8");
  await writeFile(paths.jsonPath, JSON.stringify(transcript, null, 2), "utf-8");
  console.log(`[transcribe] ✓ Transcript saved to ${paths.jsonPath}`);
  return transcript;
}
