/**
 * Audio Chunking Utility
 * Splits long recordings into fixed-length pieces with one FFmpeg run.
 */

import ffmpeg from "fluent-ffmpeg";
import { readdir } from "fs/promises";
import path from "path";
import { ffmpegRun } from "../services/external/ffmpeg.js";

const DEFAULT_CHUNK_MINUTES = 45;

/** Number of chunks a recording of the given length splits into. */
export function chunkCount(durationSec: number, chunkMinutes = DEFAULT_CHUNK_MINUTES): number {
  return Math.max(1, Math.ceil(durationSec / (chunkMinutes * 60)));
}

/**
 * Splits audio with the segment muxer. Returns chunk paths in
 * chronological order (zero-padded names sort lexically).
 */
export async function splitIntoChunks(
  audioPath: string,
  durationSec: number,
  chunkMinutes = DEFAULT_CHUNK_MINUTES
): Promise<string[]> {
  const chunkSeconds = chunkMinutes * 60;
  const audioDir = path.dirname(audioPath);
  const base = path.basename(audioPath, path.extname(audioPath));

  console.log(
    `[chunking] Splitting ${(durationSec / 60).toFixed(1)}min audio into ` +
      `${chunkCount(durationSec, chunkMinutes)} chunks of ${chunkMinutes}min`
  );

  const command = ffmpeg(audioPath)
    .audioCodec("libmp3lame")
    .audioBitrate("64k")
    .audioChannels(1)
    .audioFrequency(16000)
    .outputOptions([
      "-f segment",
      `-segment_time ${chunkSeconds}`,
      "-reset_timestamps 1",
      "-segment_time_delta 0.5",
    ])
    .output(path.join(audioDir, `${base}_chunk%03d.mp3`));

  await ffmpegRun(command, "chunking");

  const files = await readdir(audioDir);
  const chunks = files
    .filter((f) => f.startsWith(`${base}_chunk`) && f.endsWith(".mp3"))
    .sort()
    .map((f) => path.join(audioDir, f));

  console.log(`[chunking] ✓ ${chunks.length} chunks written`);
  return chunks;
}
