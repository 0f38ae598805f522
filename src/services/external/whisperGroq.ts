/**
 * Groq Whisper Transcription Service
 * Word- and segment-level timestamps for one audio file of at most 25MB.
 */

import { createReadStream } from "fs";
import { stat } from "fs/promises";
import { z } from "zod";
import { getGroqClient, groqConfig } from "../../config/groq.js";
import { ExternalServiceError } from "../../utils/errors.js";
import type { Transcript, TranscriptWord } from "../business/homily/types.js";

export const DIRECT_UPLOAD_LIMIT_MB = 24; // Groq hard limit: 25MB

/** Biases recognition toward the liturgical vocabulary the detector looks for. */
export const LITURGICAL_PROMPT =
  "A Catholic homily recorded during a Traditional Latin Mass. " +
  "It includes phrases such as 'In the name of the Father, and of the Son, and of the Holy Ghost. Amen.', " +
  "readings from the liturgy of the day, and occasional Ecclesiastical Latin.";

// The SDK types the response as `{ text }` only; verbose_json carries more.
const VerboseTranscriptionSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
  duration: z.number().optional(),
  segments: z
    .array(
      z.object({
        id: z.number().optional(),
        start: z.number(),
        end: z.number(),
        text: z.string(),
      })
    )
    .default([]),
  words: z
    .array(
      z.object({
        word: z.string(),
        start: z.number(),
        end: z.number(),
      })
    )
    .default([]),
});

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

/**
 * Transcribe audio file using Groq's Whisper.
 * Words come back as a flat list; `attachWordsToSegments` files them under segments.
 */
export async function transcribeWithGroq(audioPath: string): Promise<Transcript> {
  const fileSizeMB = (await stat(audioPath)).size / (1024 * 1024);
  if (fileSizeMB > DIRECT_UPLOAD_LIMIT_MB) {
    throw new Error(
      `File ${fileSizeMB.toFixed(2)}MB exceeds the ${DIRECT_UPLOAD_LIMIT_MB}MB Groq limit; chunk it first`
    );
  }

  console.log(`[groq] Transcribing ${fileSizeMB.toFixed(2)}MB with ${groqConfig.model}`);
  const startTime = Date.now();

  try {
    const response = await getGroqClient().audio.transcriptions.create({
      file: createReadStream(audioPath),
      model: groqConfig.model,
      language: groqConfig.language,
      prompt: LITURGICAL_PROMPT,
      response_format: "verbose_json",
      timestamp_granularities: ["word", "segment"],
      temperature: 0.0,
    });

    const parsed = VerboseTranscriptionSchema.safeParse(response);
    if (!parsed.success) {
      throw new ExternalServiceError("groq", `unexpected response: ${parsed.error.message}`);
    }

    const { text, language, duration, segments, words } = parsed.data;
    console.log(
      `[groq] ✓ ${segments.length} segments, ${words.length} words in ${((Date.now() - startTime) / 1000).toFixed(1)}s`
    );

    return attachWordsToSegments({ text, language, duration, segments, words });
  } catch (error) {
    if (error instanceof ExternalServiceError) throw error;

    const status = statusOf(error);
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[groq] ✗ Transcription failed:`, message);

    if (status === 401) throw new Error("Invalid Groq API key. Check GROQ_API_KEY environment variable.");
    if (status === 429) throw new Error("Groq rate limit exceeded. Try again in a moment.");
    throw new Error(`Groq transcription failed: ${message}`);
  }
}

/**
 * Moves top-level words into the segment that was running when each word
 * started: the last segment whose start is at or before the word's start
 * (the first segment for words before it). Segments keep their order.
 */
export function attachWordsToSegments(transcript: Transcript): Transcript {
  const segments = transcript.segments ?? [];
  const words = transcript.words ?? [];
  if (segments.length === 0 || words.length === 0) {
    return transcript;
  }

  const buckets: TranscriptWord[][] = segments.map(() => []);
  let segIndex = 0;
  for (const word of [...words].sort((a, b) => a.start - b.start)) {
    while (segIndex + 1 < segments.length && segments[segIndex + 1].start <= word.start) {
      segIndex++;
    }
    buckets[segIndex].push(word);
  }

  return {
    text: transcript.text,
    language: transcript.language,
    duration: transcript.duration,
    segments: segments.map((seg, i) => ({ ...seg, words: buckets[i] })),
  };
}
