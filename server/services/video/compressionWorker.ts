/**
 * Video Compression — Worker
 *
 * Runs one compression per scheduled task, off the request path. The
 * persisted video record is the source of truth: on success the record is
 * marked completed and then the raw upload deleted, on failure the record is
 * marked failed and the raw upload is left on disk for an operator. There
 * is a single attempt per upload and no push notification for failures.
 */

import { rm } from "node:fs/promises";
import defaultLogger, { type Logger } from "../../logger";
import type { VideoStore } from "../../storage/types";
import type { JobRegistry } from "../jobRegistry";
import { TranscodeFailure } from "./errors";
import type { CompressionOutcome, CompressionTask, Transcoder } from "./types";

export interface CompressionWorkerDeps {
  videos: VideoStore;
  registry: JobRegistry;
  transcode: Transcoder;
  logger?: Logger;
}

export class CompressionWorker {
  private readonly inFlight = new Set<Promise<unknown>>();
  private readonly logger: Logger;

  constructor(private readonly deps: CompressionWorkerDeps) {
    this.logger = deps.logger ?? defaultLogger.child({ component: "compression" });
  }

  /** Start a task in the background and return immediately. */
  schedule(task: CompressionTask): void {
    const pending = this.run(task).finally(() => {
      this.inFlight.delete(pending);
    });
    this.inFlight.add(pending);
    this.logger.debug("[Compression] Task scheduled", {
      videoId: task.videoId,
      inFlight: this.inFlight.size,
    });
  }

  get activeCount(): number {
    return this.inFlight.size;
  }

  /** Resolves once every scheduled task has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }
  }

  /** Never rejects: every failure ends up as `failed` on the record. */
  async run(task: CompressionTask): Promise<CompressionOutcome> {
    const { rawPath, outputPath, videoId } = task;
    const startTime = Date.now();

    try {
      await this.deps.transcode(rawPath, outputPath);

      const video = await this.deps.videos.findVideoByPath(outputPath);
      if (!video) {
        throw new Error(`No video record for ${outputPath}`);
      }
      const updated = await this.deps.videos.markVideoCompleted(video.id);
      if (!updated) {
        throw new Error(`Video ${video.id} was already settled`);
      }

      // Only a completed record releases the raw upload
      await this.removeRawUpload(video.id, rawPath);

      this.deps.registry.markCompleted(video.id);
      this.logger.info("[Compression] Video compressed", {
        videoId: video.id,
        durationMs: Date.now() - startTime,
      });
      return "completed";
    } catch (error) {
      await this.recordFailure(task, error);
      return "failed";
    }
  }

  private async removeRawUpload(videoId: number, rawPath: string): Promise<void> {
    try {
      await rm(rawPath, { force: true });
    } catch (error) {
      this.logger.warn("[Compression] Could not remove raw upload", {
        videoId,
        rawPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async recordFailure(task: CompressionTask, error: unknown): Promise<void> {
    this.logger.error("[Compression] Compression failed, raw upload kept", {
      videoId: task.videoId,
      rawPath: task.rawPath,
      exitCode: error instanceof TranscodeFailure ? error.exitCode : undefined,
      error: error instanceof Error ? error.message : String(error),
    });

    try {
      const video =
        (await this.deps.videos.findVideoByPath(task.outputPath)) ??
        (await this.deps.videos.getVideo(task.videoId));
      if (video) {
        await this.deps.videos.markVideoFailed(video.id);
      } else {
        this.logger.warn("[Compression] No video record to mark failed", {
          videoId: task.videoId,
        });
      }
    } catch (persistError) {
      this.logger.error("[Compression] Could not mark video failed", {
        videoId: task.videoId,
        error: persistError instanceof Error ? persistError.message : String(persistError),
      });
    }

    // Failures are never notified, so the pending job has no consumer left
    this.deps.registry.discard(task.videoId);
  }
}
