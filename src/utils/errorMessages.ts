/**
 * Error Message Utility
 * Converts technical errors into short messages for the console.
 */

import { AppError } from "./errors.js";

/**
 * Converts technical error to a short user-facing message.
 */
export function getGenericErrorMessage(error: unknown): string {
  if (error instanceof AppError && !error.isOperational) {
    return error.message;
  }

  const errorStr = String(error).toLowerCase();

  if (errorStr.includes("youtube") || errorStr.includes("googleapis")) {
    return "YouTube publishing failed";
  }
  if (errorStr.includes("auphonic")) {
    return "Audio cleanup failed";
  }
  if (errorStr.includes("ffmpeg") || errorStr.includes("ffprobe") || errorStr.includes("audio")) {
    return "Audio/video processing failed";
  }
  if (errorStr.includes("transcri") || errorStr.includes("groq") || errorStr.includes("whisper")) {
    return "Transcription failed";
  }
  if (errorStr.includes("agent") || errorStr.includes("openai") || errorStr.includes("json")) {
    return "Metadata generation failed";
  }
  if (errorStr.includes("git")) {
    return "Content repository push failed";
  }
  if (errorStr.includes("timeout") || errorStr.includes("timed out")) {
    return "Processing timeout";
  }

  return "Processing failed";
}
