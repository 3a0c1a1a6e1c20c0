/**
 * Video Ingestion
 *
 * Stores an uploaded clip and hands it to the compression worker:
 *
 *   1. ensure the videos directory exists
 *   2. pick unique raw and output paths
 *   3. write the raw bytes in full
 *   4. insert the video record (path = future compressed file)
 *   5. register a pending job
 *   6. schedule compression and return without waiting for it
 *
 * A failure in steps 1–4 surfaces as a single IngestError with nothing left
 * behind: no record, no job, and no raw file.
 */

import { createWriteStream } from "node:fs";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import logger from "../../logger";
import type { VideoStore } from "../../storage/types";
import type { JobRegistry } from "../jobRegistry";
import type { CompressionWorker } from "./compressionWorker";
import { IngestError } from "./errors";
import { generateFilePath, generateOutputPath } from "./paths";
import type { IngestInput, IngestResult } from "./types";

export interface IngestDeps {
  videos: VideoStore;
  registry: JobRegistry;
  worker: Pick<CompressionWorker, "schedule">;
  videosDir: string;
}

async function removeQuietly(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (error) {
    logger.warn("[Ingest] Could not remove partial upload", {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

async function writeRawUpload(path: string, body: IngestInput["body"]): Promise<void> {
  // "wx" refuses to overwrite, so a path collision fails instead of clobbering
  if (Buffer.isBuffer(body)) {
    await writeFile(path, body, { flag: "wx" });
  } else {
    await pipeline(body, createWriteStream(path, { flags: "wx" }));
  }
}

export async function ingestVideo(input: IngestInput, deps: IngestDeps): Promise<IngestResult> {
  const { userId, routeId, body, suggestedName } = input;

  try {
    await mkdir(deps.videosDir, { recursive: true });
  } catch (error) {
    throw new IngestError("directory", "Could not prepare video storage", { cause: error });
  }

  const rawPath = generateFilePath(deps.videosDir, suggestedName);
  const outputPath = generateOutputPath(deps.videosDir, suggestedName);

  try {
    await writeRawUpload(rawPath, body);
  } catch (error) {
    // EEXIST means the file belongs to another upload
    if (!isAlreadyExists(error)) {
      await removeQuietly(rawPath);
    }
    logger.error("[Ingest] Failed to write upload", {
      userId,
      rawPath,
      error: error instanceof Error ? error.message : String(error),
    });
    throw new IngestError("write", "Could not store the uploaded video", { cause: error });
  }

  let videoId: number;
  try {
    const video = await deps.videos.createVideo({ path: outputPath, routeId, userId });
    videoId = video.id;
  } catch (error) {
    await removeQuietly(rawPath);
    logger.error("[Ingest] Failed to create video record", {
      userId,
      routeId,
      error: error instanceof Error ? error.message : String(error),
    });
    throw new IngestError("record", "Could not record the uploaded video", { cause: error });
  }

  deps.registry.add({ userId, videoId, routeId });
  deps.worker.schedule({ rawPath, outputPath, videoId });

  logger.info("[Ingest] Video accepted for compression", { userId, routeId, videoId });

  return { videoId, path: outputPath };
}
