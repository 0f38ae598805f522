/**
 * Homily Workflow
 * Recording → published homily. Every step writes one file under
 * <audio dir>/working or <audio dir>/final and is skipped when that file
 * already exists, so a failed run resumes where it stopped.
 */

import { access, copyFile, mkdir, readFile, rename, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import type { Env } from "../../config/env.js";
import { clipAudio, concatenateMedia, renderCaptionedVideo } from "../external/ffmpeg.js";
import { cleanAudio } from "../external/auphonic.js";
import { getAudioDuration } from "../../utils/audioCompression.js";
import { createThumbnail } from "../../utils/imageProcessing.js";
import { ExternalServiceError } from "../../utils/errors.js";
import type { Prompter } from "../../utils/prompter.js";
import type { HomilyBoundaryResolver } from "./homily/boundaryResolver.js";
import { resolveManually, type ManualSelection } from "./homily/manualFallback.js";
import { collectWords } from "./homily/tokenizer.js";
import type { Transcript, VideoSegment } from "./homily/types.js";
import { buildSrt, writeSrtFile } from "./captionService.js";
import { generateVideoScript, type VideoScript } from "./videoScriptService.js";
import { loadOrCreateTranscript, parseTranscriptText, readTranscriptJson } from "./transcriptionService.js";
import { generateMdx, parseFrontMatter } from "./mdxService.js";
import { publishMdxToContentRepo, publishToYouTube } from "./publishService.js";

export interface WorkflowPaths {
  workingDir: string;
  finalDir: string;
  transcriptTxt: string;
  transcriptJson: string;
  homilyJson: string;
  homilyAudio: string;
  videoScript: string;
  cleanAudio: string;
  finalAudio: string;
  bodyCaptions: string;
  bodyVideo: string;
  finalVideo: string;
  captions: string;
  mdx: string;
  thumbnail: string;
}

export function workflowPaths(audioPath: string): WorkflowPaths {
  const dir = path.dirname(audioPath);
  const workingDir = path.join(dir, "working");
  const finalDir = path.join(dir, "final");
  const transcriptTxt = path.join(workingDir, "transcription.txt");
  return {
    workingDir,
    finalDir,
    transcriptTxt,
    transcriptJson: `${transcriptTxt}.json`,
    homilyJson: path.join(workingDir, "homily.json"),
    homilyAudio: path.join(workingDir, "homily.mp3"),
    videoScript: path.join(workingDir, "video_script.json"),
    cleanAudio: path.join(workingDir, "homily_clean.mp3"),
    finalAudio: path.join(workingDir, "homily_final.mp3"),
    bodyCaptions: path.join(workingDir, "video_body.srt"),
    bodyVideo: path.join(workingDir, "video-with-text.mp4"),
    finalVideo: path.join(finalDir, "final-video.mp4"),
    captions: path.join(workingDir, "video_captions.srt"),
    mdx: path.join(finalDir, "homily.mdx"),
    thumbnail: path.join(finalDir, "thumbnail.jpg"),
  };
}

const VideoSegmentSchema = z.object({ start: z.number(), end: z.number(), text: z.string() });

const HomilySelectionSchema = z.object({
  first: z.number(),
  last: z.number(),
  text: z.string(),
  segments: z.array(VideoSegmentSchema),
});

const VideoScriptFileSchema = z.object({ segments: z.array(VideoSegmentSchema) });
export type HomilySelection = z.infer<typeof HomilySelectionSchema>;

export async function pathExists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

async function runStep(label: string, outputPath: string, action: () => Promise<unknown>): Promise<void> {
  if (await pathExists(outputPath)) {
    console.log(`[workflow] ✓ ${label}: ${path.basename(outputPath)} exists, skipping`);
    return;
  }
  console.log(`[workflow] ${label}...`);
  await action();
}

/**
 * Marker detection first; the manual prompt only when it comes back empty.
 */
export async function selectHomily(
  transcript: Transcript,
  resolver: HomilyBoundaryResolver,
  fallback: () => Promise<ManualSelection>
): Promise<HomilySelection> {
  const result = resolver.findHomily(transcript);
  if (result.status === "found") {
    return { first: result.first, last: result.last, text: result.homilyText, segments: result.videoSegments };
  }

  console.warn(`[homily] ✗ ${result.message} (${result.reason})`);
  const manual = await fallback();
  return { first: manual.first, last: manual.last, text: manual.homilyText, segments: manual.videoSegments };
}

/**
 * Word-level script when the transcript has word timings; otherwise the
 * selected segments as they are.
 */
export function buildVideoScript(transcript: Transcript, selection: HomilySelection): VideoScript {
  if (collectWords(transcript).length > 0) {
    return generateVideoScript(transcript, selection.first, selection.last);
  }
  return {
    segments: selection.segments.map((seg) => ({ ...seg, words: [] })),
    homily_start: selection.first,
    homily_end: selection.last,
    homily_text: selection.text,
  };
}

/** Script segments moved onto the trimmed audio's timeline. */
export function shiftSegments(segments: readonly VideoSegment[], offsetSec: number): VideoSegment[] {
  return segments
    .map((seg) => ({ start: seg.start + offsetSec, end: seg.end + offsetSec, text: seg.text }))
    .filter((seg) => seg.end > 0);
}

async function readJson<T, I>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, I>): Promise<T> {
  return schema.parse(JSON.parse(await readFile(filePath, "utf-8")));
}

export interface WorkflowInput {
  audioPath: string;
  imagePath: string;
}

export interface WorkflowDeps {
  env: Env;
  resolver: HomilyBoundaryResolver;
  prompter: Prompter;
  /** Skip YouTube and the content repo */
  skipPublish?: boolean;
}

export interface WorkflowResult {
  paths: WorkflowPaths;
  selection: HomilySelection;
  videoId?: string;
}

export async function runHomilyWorkflow(input: WorkflowInput, deps: WorkflowDeps): Promise<WorkflowResult> {
  const { env, resolver, prompter } = deps;
  const paths = workflowPaths(input.audioPath);
  await mkdir(paths.workingDir, { recursive: true });
  await mkdir(paths.finalDir, { recursive: true });

  // 1. Transcript
  const transcript = await loadOrCreateTranscript(
    { txtPath: paths.transcriptTxt, jsonPath: paths.transcriptJson },
    input.audioPath
  );

  // 2. Homily boundary
  let selection: HomilySelection;
  if (await pathExists(paths.homilyJson)) {
    console.log("[workflow] ✓ Homily selection: homily.json exists, loading");
    selection = await readJson(paths.homilyJson, HomilySelectionSchema);
  } else {
    selection = await selectHomily(transcript, resolver, () =>
      resolveManually({ transcript, prompter, audioPath: input.audioPath, probeDuration: getAudioDuration })
    );
    await writeFile(paths.homilyJson, JSON.stringify(selection, null, 2), "utf-8");
  }
  console.log(`[workflow] Homily ${selection.first}s → ${selection.last}s (${selection.segments.length} segments)`);

  // 3. Clip
  await runStep("Clipping homily audio", paths.homilyAudio, () =>
    clipAudio({
      inputPath: input.audioPath,
      outputPath: paths.homilyAudio,
      startSec: selection.first,
      endSec: selection.last,
    })
  );

  // 4. Video script
  await runStep("Generating video script", paths.videoScript, () =>
    writeFile(paths.videoScript, JSON.stringify(buildVideoScript(transcript, selection), null, 2), "utf-8")
  );

  // 5. Cleanup
  await runStep("Cleaning audio", paths.cleanAudio, async () => {
    if (!env.AUPHONIC_PRESET) {
      console.warn("[workflow] AUPHONIC_PRESET not set; using the uncleaned clip");
      await copyFile(paths.homilyAudio, paths.cleanAudio);
      return;
    }
    const downloaded = await cleanAudio(paths.homilyAudio, env.AUPHONIC_PRESET, paths.workingDir, {
      pollIntervalSec: env.AUPHONIC_POLL_INTERVAL_SEC,
    });
    if (!downloaded) {
      throw new ExternalServiceError("Auphonic", "Production produced no output file");
    }
    await rename(downloaded, paths.cleanAudio);
  });

  // 6. Final trim
  await runStep("Trimming cleaned audio", paths.finalAudio, () =>
    clipAudio({
      inputPath: paths.cleanAudio,
      outputPath: paths.finalAudio,
      startSec: env.FINAL_TRIM_SEC,
      endSec: -env.FINAL_TRIM_SEC,
      appendSilenceSec: env.FINAL_SILENCE_SEC,
    })
  );

  // 7. Render + intro
  const introPath = env.INTRO_VIDEO_PATH;
  const captionShift = introPath ? env.SRT_SHIFT_SEC : 0;

  await runStep("Rendering captioned video", paths.finalVideo, async () => {
    const script = await readJson(paths.videoScript, VideoScriptFileSchema);
    await writeFile(paths.bodyCaptions, buildSrt(shiftSegments(script.segments, -env.FINAL_TRIM_SEC), 0), "utf-8");

    await runStep("Rendering video body", paths.bodyVideo, () =>
      renderCaptionedVideo({
        imagePath: input.imagePath,
        audioPath: paths.finalAudio,
        captionsPath: paths.bodyCaptions,
        outputPath: paths.bodyVideo,
        width: env.VIDEO_WIDTH,
        height: env.VIDEO_HEIGHT,
      })
    );

    if (introPath) {
      await concatenateMedia([introPath, paths.bodyVideo], paths.finalVideo);
    } else {
      console.warn("[workflow] INTRO_VIDEO_PATH not set; publishing without the intro");
      await copyFile(paths.bodyVideo, paths.finalVideo);
    }
  });

  // 8. Captions
  await runStep("Writing captions", paths.captions, () =>
    writeSrtFile(selection.segments, paths.captions, captionShift)
  );

  // 9. MDX
  await runStep("Generating MDX", paths.mdx, async () => {
    const mdx = await generateMdx(selection.text, selection.segments, { donationUrl: env.DONATION_URL });
    await writeFile(paths.mdx, mdx, "utf-8");
  });

  // 10. Publish
  if (deps.skipPublish) {
    console.log("[workflow] Publishing skipped");
    return { paths, selection };
  }

  let videoId = parseFrontMatter(await readFile(paths.mdx, "utf-8")).media_path || undefined;
  if (videoId) {
    console.log(`[workflow] ✓ Already on YouTube as ${videoId}, skipping upload`);
  } else {
    await runStep("Creating thumbnail", paths.thumbnail, () => createThumbnail(input.imagePath, paths.thumbnail));
    videoId = await publishToYouTube({
      videoPath: paths.finalVideo,
      thumbnailPath: paths.thumbnail,
      captionsPath: paths.captions,
      mdxPath: paths.mdx,
      categoryId: env.YOUTUBE_CATEGORY_ID,
      privacyStatus: env.YOUTUBE_PRIVACY_STATUS,
    });
  }

  if (env.CONTENT_REPO_DIR) {
    await publishMdxToContentRepo(paths.mdx, {
      repoDir: env.CONTENT_REPO_DIR,
      subdir: env.CONTENT_REPO_SUBDIR,
      branch: env.CONTENT_REPO_BRANCH,
    });
  } else {
    console.log("[workflow] CONTENT_REPO_DIR not set; post left in final/");
  }

  console.log(`[workflow] ✓ Done: ${paths.finalVideo}`);
  return { paths, selection, videoId };
}

/** JSON transcripts by extension, bracketed TXT lines otherwise. */
export async function readTranscriptFile(transcriptPath: string): Promise<Transcript> {
  if (transcriptPath.toLowerCase().endsWith(".json")) {
    return readTranscriptJson(transcriptPath);
  }
  return parseTranscriptText(await readFile(transcriptPath, "utf-8"));
}

function snippet(text: string, max = 240): string {
  const trimmed = text.trim();
  return trimmed.length <= max ? trimmed : `${trimmed.slice(0, max)}…`;
}

export interface DryRunOptions {
  srtShiftSec: number;
  /** Also asks the agent for the MDX page and prints its front matter */
  withMdx?: boolean;
  donationUrl?: string;
}

/**
 * Detector only, console output only. Returns the selection, or null when
 * the marker was not found.
 */
export async function dryRun(
  transcriptPath: string,
  resolver: HomilyBoundaryResolver,
  options: DryRunOptions
): Promise<HomilySelection | null> {
  const transcript = await readTranscriptFile(transcriptPath);
  const result = resolver.findHomily(transcript);

  if (result.status === "not-found") {
    console.log(`[dry-run] ✗ ${result.message} (${result.reason})`);
    return null;
  }

  const selection: HomilySelection = {
    first: result.first,
    last: result.last,
    text: result.homilyText,
    segments: result.videoSegments,
  };

  console.log(`[dry-run] ✓ Homily ${selection.first}s → ${selection.last}s (${(selection.last - selection.first).toFixed(1)}s)`);
  console.log(`[dry-run] Segments: ${selection.segments.length}`);
  console.log(`[dry-run] Text: ${snippet(selection.text)}`);
  console.log(`[dry-run] First captions:\n${buildSrt(selection.segments.slice(0, 3), options.srtShiftSec)}`);

  if (options.withMdx) {
    const mdx = await generateMdx(selection.text, selection.segments, { donationUrl: options.donationUrl });
    const fm = parseFrontMatter(mdx);
    console.log(`[dry-run] Title: ${fm.title ?? ""}`);
    console.log(`[dry-run] Keywords: ${fm.keywords ?? ""}`);
    console.log(`[dry-run] Slug: ${fm.slug ?? ""}`);
  }
  return selection;
}
