/**
 * Video Pipeline
 *
 * Ingestion of raw uploads and their out-of-band compression with ffmpeg.
 *
 * Prerequisites: ffmpeg must be installed on the host.
 *
 * Architecture:
 *   1. ingestVideo()            — write upload, insert record, register job, schedule
 *   2. CompressionWorker        — run ffmpeg in the background, settle the record
 *   3. compressVideo()          — the ffmpeg invocation itself
 *
 * @module services/video
 */

export type {
  CompressionTask,
  CompressionOutcome,
  CompressOptions,
  Transcoder,
  IngestInput,
  IngestResult,
} from "./types";

export { IngestError, TranscodeFailure } from "./errors";
export type { IngestStage } from "./errors";
export { sanitizeFilename, generateFilePath, generateOutputPath } from "./paths";
export { compressVideo, buildCompressArgs, createFfmpegTranscoder } from "./ffmpeg";
export { CompressionWorker } from "./compressionWorker";
export type { CompressionWorkerDeps } from "./compressionWorker";
export { ingestVideo } from "./ingest";
export type { IngestDeps } from "./ingest";
export { checkFfmpegAvailable } from "./utils";
