/**
 * Audio Compression Utility
 * Speech-optimised MP3 encoding ahead of transcription, and duration probing.
 */

import ffmpeg from "fluent-ffmpeg";
import { access, stat } from "fs/promises";
import path from "path";

type CompressOptions = {
  bitrateKbps?: number; // default 64
  sampleRate?: number; // default 16000
  speechFilters?: boolean; // default true
};

async function exists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get audio duration in seconds (0 when ffprobe reports none).
 */
export async function getAudioDuration(audioPath: string): Promise<number> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(audioPath, (err, metadata) => {
      if (err) return reject(err);
      const dur = metadata?.format?.duration;
      resolve(typeof dur === "number" ? dur : 0);
    });
  });
}

/** Output name for a compressed copy; encodes the settings so variants never collide. */
export function compressedPathFor(audioPath: string, bitrateKbps: number, sampleRate: number): string {
  const ext = path.extname(audioPath);
  const base = path.basename(audioPath, ext);
  return path.join(path.dirname(audioPath), `${base}-stt-${bitrateKbps}k-${sampleRate}hz.mp3`);
}

/**
 * Compress audio for speech-to-text: mono MP3 with highpass/lowpass and
 * loudness normalisation. Reuses an existing non-empty output.
 */
export async function compressForStt(
  audioPath: string,
  opts: CompressOptions = {}
): Promise<string> {
  const bitrateKbps = opts.bitrateKbps ?? 64;
  const sampleRate = opts.sampleRate ?? 16000;
  const speechFilters = opts.speechFilters ?? true;
  const outputPath = compressedPathFor(audioPath, bitrateKbps, sampleRate);

  if (await exists(outputPath)) {
    const s = await stat(outputPath);
    if (s.size > 0) {
      console.log(`[compress] Using existing compressed file: ${path.basename(outputPath)}`);
      return outputPath;
    }
  }

  console.log(`[compress] Compressing for STT: ${bitrateKbps}kbps, ${sampleRate}Hz mono`);

  let lastLoggedPercent = -10;

  await new Promise<void>((resolve, reject) => {
    const cmd = ffmpeg(audioPath)
      .audioCodec("libmp3lame")
      .audioBitrate(`${bitrateKbps}k`)
      .audioFrequency(sampleRate)
      .audioChannels(1)
      .format("mp3");

    if (speechFilters) {
      cmd.audioFilters(["highpass=f=80", "lowpass=f=8000", "loudnorm=I=-16:LRA=11:TP=-1.5"].join(","));
    }

    cmd
      .on("progress", (p: { percent?: number }) => {
        if (typeof p.percent === "number") {
          const rounded = Math.floor(p.percent / 10) * 10;
          if (rounded >= lastLoggedPercent + 10) {
            lastLoggedPercent = rounded;
            console.log(`[compress] Progress: ~${rounded}%`);
          }
        }
      })
      .on("end", () => resolve())
      .on("error", (err: Error) => reject(err))
      .outputOptions(["-y"])
      .save(outputPath);
  });

  const s = await stat(outputPath);
  console.log(`[compress] ✓ Output: ${(s.size / 1024 / 1024).toFixed(2)}MB → ${path.basename(outputPath)}`);
  return outputPath;
}
