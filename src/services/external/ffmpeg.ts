/**
 * FFmpeg Service
 * Clips audio, renders the captioned video and prepends the intro.
 */

import ffmpeg from "fluent-ffmpeg";
import { writeFile, unlink } from "fs/promises";
import path from "path";
import { getAudioDuration } from "../../utils/audioCompression.js";

/**
 * Helper to promisify FFmpeg command execution
 */
export function ffmpegRun(command: ffmpeg.FfmpegCommand, tag = "ffmpeg"): Promise<void> {
  return new Promise((resolve, reject) => {
    command
      .on("start", (line: string) => console.log(`[${tag}] ${line}`))
      .on("end", () => resolve())
      .on("error", (err: Error) => reject(err))
      .run();
  });
}

export interface ClipWindow {
  start: number;
  end: number;
}

/**
 * Resolves a clip range against the file's duration.
 * `endSec` null clips to the end; a negative `endSec` drops that many
 * seconds from the end. Both ends are clamped to [0, total] with end >= start.
 */
export function resolveClipWindow(
  totalSec: number,
  startSec: number,
  endSec: number | null
): ClipWindow {
  const start = Math.max(0, Math.min(startSec, totalSec));
  let end: number;
  if (endSec === null) {
    end = totalSec;
  } else if (endSec >= 0) {
    end = endSec;
  } else {
    end = totalSec + endSec;
  }
  end = Math.max(start, Math.min(end, totalSec));
  return { start, end };
}

export interface ClipAudioOptions {
  inputPath: string;
  outputPath: string;
  startSec?: number;
  endSec?: number | null;
  appendSilenceSec?: number;
}

/**
 * Cuts [start, end] out of an audio file into an MP3, optionally padding
 * the result with silence.
 */
export async function clipAudio(options: ClipAudioOptions): Promise<string> {
  const totalSec = await getAudioDuration(options.inputPath);
  const window = resolveClipWindow(totalSec, options.startSec ?? 0, options.endSec ?? null);
  const appendSilenceSec = options.appendSilenceSec ?? 0;

  console.log(
    `[ffmpeg] Clipping ${path.basename(options.inputPath)} ${window.start.toFixed(2)}s → ${window.end.toFixed(2)}s` +
      (appendSilenceSec > 0 ? ` (+${appendSilenceSec}s silence)` : "")
  );

  const command = ffmpeg(options.inputPath)
    .setStartTime(window.start)
    .setDuration(window.end - window.start)
    .audioCodec("libmp3lame")
    .format("mp3");

  if (appendSilenceSec > 0) {
    command.audioFilters(`apad=pad_dur=${appendSilenceSec}`);
  }

  await ffmpegRun(command.outputOptions(["-y"]).output(options.outputPath));
  console.log(`[ffmpeg] ✓ Clip saved to ${options.outputPath}`);
  return options.outputPath;
}

/** Escapes a path for use inside an ffmpeg filter argument. */
export function escapeFilterPath(input: string): string {
  return input
    .replace(/\\/g, "\\\\")
    .replace(/:/g, "\\:")
    .replace(/,/g, "\\,")
    .replace(/'/g, "\\'")
    .replace(/ /g, "\\ ");
}

export interface RenderVideoOptions {
  imagePath: string;
  audioPath: string;
  captionsPath: string;
  outputPath: string;
  width: number;
  height: number;
}

/**
 * Renders the background image for the length of the audio with the
 * captions burned in.
 */
export async function renderCaptionedVideo(options: RenderVideoOptions): Promise<string> {
  const { width, height } = options;
  const fontSize = Math.round(height * 0.045);

  const command = ffmpeg()
    .input(options.imagePath)
    .inputOptions(["-loop 1"])
    .input(options.audioPath)
    .videoFilters([
      `scale=${width}:${height}:force_original_aspect_ratio=increase`,
      `crop=${width}:${height}`,
      `subtitles=${escapeFilterPath(options.captionsPath)}:force_style='Alignment=10,Fontsize=${fontSize},BorderStyle=4,BackColour=&H80000000'`,
    ])
    .videoCodec("libx264")
    .audioCodec("aac")
    .outputOptions(["-tune stillimage", "-pix_fmt yuv420p", "-shortest", "-y"])
    .output(options.outputPath);

  console.log(`[ffmpeg] Rendering ${width}x${height} captioned video`);
  await ffmpegRun(command);
  console.log(`[ffmpeg] ✓ Video saved to ${options.outputPath}`);
  return options.outputPath;
}

/** Quotes a path for an ffmpeg concat list. */
export function concatListEntry(filePath: string): string {
  return `file '${filePath.replace(/'/g, "'\\''")}'`;
}

/**
 * Joins media files with the concat demuxer (streams are copied, so the
 * inputs must share codecs).
 */
export async function concatenateMedia(inputPaths: string[], outputPath: string): Promise<string> {
  if (inputPaths.length === 0) {
    throw new Error("No media files to concatenate");
  }

  const listPath = path.join(path.dirname(outputPath), "concat_list.txt");
  await writeFile(listPath, inputPaths.map(concatListEntry).join("\n") + "\n", "utf-8");

  const command = ffmpeg()
    .input(listPath)
    .inputOptions(["-f concat", "-safe 0"])
    .outputOptions(["-c copy", "-y"])
    .output(outputPath);

  try {
    await ffmpegRun(command);
  } finally {
    await unlink(listPath).catch((err: Error) => {
      console.warn(`[ffmpeg] Failed to remove ${listPath}:`, err.message);
    });
  }

  console.log(`[ffmpeg] ✓ Concatenated ${inputPaths.length} files → ${outputPath}`);
  return outputPath;
}
