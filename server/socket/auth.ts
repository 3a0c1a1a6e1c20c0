/**
 * Socket.io Authentication Middleware
 *
 * Verifies the access token on WebSocket connections and attaches the
 * numeric user id to `socket.data`.
 */

import { InvalidTokenError, verifyAccessToken } from "../auth/tokens";
import logger from "../logger";
import type { TypedSocket } from "./types";

// ExtendedError type for socket.io middleware
type ExtendedError = Error & { data?: unknown };

/**
 * @example Client usage:
 * ```ts
 * const socket = io({ auth: { token: accessToken } });
 * ```
 */
export function socketAuthMiddleware(socket: TypedSocket, next: (err?: ExtendedError) => void): void {
  const ip = socket.handshake.address;
  const token: unknown = socket.handshake.auth?.token;

  if (!token || typeof token !== "string") {
    logger.warn("[Socket] Missing auth token", { ip });
    return next(new Error("authentication_required"));
  }

  try {
    const userId = verifyAccessToken(token);
    socket.data = { userId, connectedAt: new Date() };
    logger.info("[Socket] Authenticated connection", { userId, ip });
    next();
  } catch (error) {
    if (error instanceof InvalidTokenError) {
      logger.warn("[Socket] Invalid token", { ip, reason: error.message });
      return next(new Error("invalid_token"));
    }
    logger.error("[Socket] Auth middleware error", {
      ip,
      error: error instanceof Error ? error.message : "Unknown error",
    });
    next(new Error("authentication_failed"));
  }
}
