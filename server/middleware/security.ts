import type { Request } from "express";
import rateLimit from "express-rate-limit";
import { UPLOAD_RATE_MAX, UPLOAD_RATE_WINDOW_MS } from "../config/constants";
import { Errors } from "../utils/apiError";

/**
 * Per-user key once the request is authenticated, the client IP before that.
 */
export function uploadRateKey(req: Request): string {
  if (req.currentUser) return `user:${req.currentUser.id}`;
  return `ip:${req.ip ?? "unknown"}`;
}

/**
 * Rate limiter for video uploads.
 * Each upload spawns an ffmpeg process, so uploads are capped per user.
 */
export const uploadLimiter = rateLimit({
  windowMs: UPLOAD_RATE_WINDOW_MS,
  max: UPLOAD_RATE_MAX,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: uploadRateKey,
  handler: (_req, res) => {
    Errors.rateLimited(res, "Too many uploads. Please try again later.");
  },
});
