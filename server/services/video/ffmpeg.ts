/**
 * Video Compression — ffmpeg
 *
 * Re-encodes an upload to H.264 MP4 at a constant rate factor. ffmpeg runs
 * as a child process, so the event loop only waits on its exit.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import logger from "../../logger";
import { TRANSCODE_STDERR_TAIL_BYTES } from "../../config/constants";
import { TranscodeFailure } from "./errors";
import type { CompressOptions } from "./types";

const execFileAsync = promisify(execFile);

const DEFAULT_CRF = 30;
const MAX_BUFFER_BYTES = 10 * 1024 * 1024;

export function buildCompressArgs(inputPath: string, outputPath: string, crf = DEFAULT_CRF): string[] {
  return [
    "-hide_banner",
    "-y",
    "-i",
    inputPath,
    "-c:v",
    "libx264",
    "-preset",
    "fast",
    "-crf",
    String(crf),
    // Pixel format for compatibility
    "-pix_fmt",
    "yuv420p",
    // Faststart for streaming (moov atom at beginning)
    "-movflags",
    "+faststart",
    "-c:a",
    "aac",
    "-b:a",
    "96k",
    outputPath,
  ];
}

function toTranscodeFailure(err: unknown): TranscodeFailure {
  if (!(err instanceof Error)) {
    return new TranscodeFailure(String(err), null, "");
  }
  const exitCode = "code" in err && typeof err.code === "number" ? err.code : null;
  const stderr =
    "stderr" in err && typeof err.stderr === "string"
      ? err.stderr.slice(-TRANSCODE_STDERR_TAIL_BYTES)
      : "";
  return new TranscodeFailure(err.message, exitCode, stderr);
}

export async function compressVideo(
  inputPath: string,
  outputPath: string,
  options: CompressOptions = {}
): Promise<void> {
  const ffmpegPath = options.ffmpegPath ?? "ffmpeg";
  const args = buildCompressArgs(inputPath, outputPath, options.crf);

  try {
    await execFileAsync(ffmpegPath, args, {
      timeout: options.timeoutMs ?? 0,
      maxBuffer: MAX_BUFFER_BYTES,
    });
  } catch (err) {
    const failure = toTranscodeFailure(err);
    logger.error("[Compression] ffmpeg failed", {
      inputPath,
      exitCode: failure.exitCode,
      error: failure.message,
    });
    throw failure;
  }
}

/** Transcoder bound to the configured ffmpeg binary and quality. */
export function createFfmpegTranscoder(options: CompressOptions = {}) {
  return (inputPath: string, outputPath: string): Promise<void> =>
    compressVideo(inputPath, outputPath, options);
}
