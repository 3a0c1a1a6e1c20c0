/**
 * Access token verification.
 *
 * Tokens are issued by the auth service (HS256, `sub` = numeric user id).
 * This service only verifies them.
 */

import jwt from "jsonwebtoken";
import { env } from "../config/env";

export class InvalidTokenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidTokenError";
  }
}

export function verifyAccessToken(token: string, secret: string = env.JWT_SECRET): number {
  let payload: string | jwt.JwtPayload;
  try {
    payload = jwt.verify(token, secret, { algorithms: ["HS256"] });
  } catch (error) {
    throw new InvalidTokenError(error instanceof Error ? error.message : "Token verification failed");
  }

  if (typeof payload === "string" || payload.sub === undefined) {
    throw new InvalidTokenError("Token has no subject");
  }

  const userId = Number(payload.sub);
  if (!Number.isSafeInteger(userId) || userId <= 0) {
    throw new InvalidTokenError("Token subject is not a user id");
  }
  return userId;
}

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const [scheme, token] = header.split(" ");
  if (scheme?.toLowerCase() !== "bearer" || !token) return null;
  return token;
}
