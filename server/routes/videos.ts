/**
 * Video Routes
 *
 * Raw-body upload of route attempt clips, status polling and the caller's
 * delivered-notification history. Compression happens in the background;
 * completion is pushed over the socket as `job:completed`.
 */

import { Router, raw, type Request, type Response } from "express";
import { z } from "zod";
import type { Video } from "@shared/schema";
import { authenticateUser } from "../auth/middleware";
import {
  JOB_HISTORY_DEFAULT_LIMIT,
  JOB_HISTORY_MAX_LIMIT,
  UPLOAD_CONTENT_TYPES,
} from "../config/constants";
import { DatabaseUnavailableError } from "../db";
import logger from "../logger";
import { uploadLimiter } from "../middleware/security";
import type { JobRegistry } from "../services/jobRegistry";
import { IngestError, ingestVideo, type CompressionWorker } from "../services/video";
import type { Storage } from "../storage";
import { Errors } from "../utils/apiError";

export interface VideoRouteDeps {
  storage: Storage;
  registry: JobRegistry;
  worker: Pick<CompressionWorker, "schedule">;
  videosDir: string;
  maxUploadBytes: number;
}

// ============================================================================
// Validation Schemas
// ============================================================================

const idParamSchema = z.coerce.number().int().positive();

const jobsQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(JOB_HISTORY_MAX_LIMIT)
    .default(JOB_HISTORY_DEFAULT_LIMIT),
});

// ============================================================================
// Helpers
// ============================================================================

export type VideoStatus = "processing" | "completed" | "failed";

export function videoStatus(video: Pick<Video, "completed" | "failed">): VideoStatus {
  if (video.completed) return "completed";
  if (video.failed) return "failed";
  return "processing";
}

function uploadName(req: Request): string | null {
  const header = req.get("x-filename");
  if (header) return header;
  return typeof req.query.filename === "string" ? req.query.filename : null;
}

function requireUserId(req: Request, res: Response): number | null {
  const userId = req.currentUser?.id;
  if (userId === undefined) {
    Errors.unauthorized(res);
    return null;
  }
  return userId;
}

export function createVideosRouter(deps: VideoRouteDeps): Router {
  const router = Router();

  async function handleUpload(req: Request, res: Response, routeId: number | null) {
    const userId = requireUserId(req, res);
    if (userId === null) return;

    if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
      return Errors.badRequest(
        res,
        "EMPTY_UPLOAD",
        "Send the video as the raw request body with a video/* or application/octet-stream content type."
      );
    }

    try {
      const result = await ingestVideo(
        { userId, routeId, body: req.body, suggestedName: uploadName(req) },
        {
          videos: deps.storage,
          registry: deps.registry,
          worker: deps.worker,
          videosDir: deps.videosDir,
        }
      );
      return res.status(201).json({ videoId: result.videoId, routeId, status: "processing" });
    } catch (error) {
      if (error instanceof IngestError && error.cause instanceof DatabaseUnavailableError) {
        return Errors.dbUnavailable(res);
      }
      if (error instanceof IngestError) {
        return Errors.internal(res, "INGEST_FAILED", "The upload could not be stored.");
      }
      logger.error("[Videos] Unexpected upload error", {
        userId,
        routeId,
        error: error instanceof Error ? error.message : String(error),
      });
      return Errors.internal(res);
    }
  }

  const rawBody = raw({ type: [...UPLOAD_CONTENT_TYPES], limit: deps.maxUploadBytes });

  // ==========================================================================
  // POST /api/routes/:routeId/video — upload a clip for a logged route
  // ==========================================================================

  router.post("/routes/:routeId/video", authenticateUser, uploadLimiter, rawBody, async (req, res) => {
    const routeId = idParamSchema.safeParse(req.params.routeId);
    if (!routeId.success) {
      return Errors.validation(res, routeId.error.flatten(), "INVALID_ROUTE_ID", "Route id must be a positive integer.");
    }
    return handleUpload(req, res, routeId.data);
  });

  // ==========================================================================
  // POST /api/videos — upload a clip not yet attached to a route
  // ==========================================================================

  router.post("/videos", authenticateUser, uploadLimiter, rawBody, async (req, res) => {
    return handleUpload(req, res, null);
  });

  // ==========================================================================
  // GET /api/videos/:id — compression status (owner only)
  // ==========================================================================

  router.get("/videos/:id", authenticateUser, async (req, res) => {
    const userId = requireUserId(req, res);
    if (userId === null) return;

    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) {
      return Errors.validation(res, id.error.flatten(), "INVALID_VIDEO_ID", "Video id must be a positive integer.");
    }

    try {
      const video = await deps.storage.getVideo(id.data);
      // Someone else's video is reported as missing
      if (!video || video.userId !== userId) {
        return Errors.notFound(res, "VIDEO_NOT_FOUND", "Video not found.");
      }
      return res.json({
        id: video.id,
        routeId: video.routeId,
        status: videoStatus(video),
        completed: video.completed,
        failed: video.failed,
        createdAt: video.createdAt,
        updatedAt: video.updatedAt,
      });
    } catch (error) {
      if (error instanceof DatabaseUnavailableError) return Errors.dbUnavailable(res);
      logger.error("[Videos] Failed to load video", {
        userId,
        videoId: id.data,
        error: error instanceof Error ? error.message : String(error),
      });
      return Errors.internal(res);
    }
  });

  // ==========================================================================
  // GET /api/jobs — delivered completion notifications, newest first
  // ==========================================================================

  router.get("/jobs", authenticateUser, async (req, res) => {
    const userId = requireUserId(req, res);
    if (userId === null) return;

    const query = jobsQuerySchema.safeParse(req.query);
    if (!query.success) {
      return Errors.validation(res, query.error.flatten());
    }

    try {
      const jobs = await deps.storage.listJobsForUser(userId, query.data.limit);
      return res.json({ jobs });
    } catch (error) {
      if (error instanceof DatabaseUnavailableError) return Errors.dbUnavailable(res);
      logger.error("[Videos] Failed to list job history", {
        userId,
        error: error instanceof Error ? error.message : String(error),
      });
      return Errors.internal(res);
    }
  });

  return router;
}
