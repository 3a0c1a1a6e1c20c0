/**
 * Video Pipeline — Type Definitions
 *
 * Shared interfaces and type aliases for ingestion and compression.
 */

import type { Readable } from "node:stream";

/** One unit of background work handed from ingestion to the worker */
export interface CompressionTask {
  rawPath: string;
  outputPath: string;
  videoId: number;
}

export type CompressionOutcome = "completed" | "failed";

/** Re-encode `inputPath` into `outputPath`; rejects with a TranscodeFailure */
export type Transcoder = (inputPath: string, outputPath: string) => Promise<void>;

export interface CompressOptions {
  ffmpegPath?: string;
  crf?: number;
  /** 0 or undefined waits for ffmpeg indefinitely */
  timeoutMs?: number;
}

export interface IngestInput {
  userId: number;
  routeId: number | null;
  body: Buffer | Readable;
  suggestedName?: string | null;
}

export interface IngestResult {
  videoId: number;
  path: string;
}
