import type { Request, Response, NextFunction } from "express";
import logger from "../logger";
import { Errors } from "../utils/apiError";
import { extractBearerToken, InvalidTokenError, verifyAccessToken } from "./tokens";

/**
 * Require a valid bearer token and attach `req.currentUser`.
 */
export function authenticateUser(req: Request, res: Response, next: NextFunction) {
  const token = extractBearerToken(req.headers.authorization);
  if (!token) {
    return Errors.unauthorized(res);
  }

  try {
    req.currentUser = { id: verifyAccessToken(token) };
    next();
  } catch (error) {
    if (error instanceof InvalidTokenError) {
      logger.warn("[Auth] Rejected access token", { reason: error.message, path: req.path });
      return Errors.unauthorized(res, "INVALID_TOKEN", "Access token is invalid or expired.");
    }
    next(error);
  }
}
