/**
 * Server Configuration
 *
 * Ports, CORS origins and body parsing limits.
 */

import { env } from "./env";

/** Port for the HTTP + Socket.io server */
export const SERVER_PORT = parseInt(env.PORT, 10);

/** Origins always allowed outside production */
export const DEV_ORIGINS = [
  `http://localhost:${process.env.DEV_CLIENT_PORT || "3000"}`,
  "http://localhost:5173",
] as const;

/**
 * Returns the list of allowed origins for the current environment.
 * Shared by the Express CORS middleware and the Socket.io server.
 */
export function getAllowedOrigins(): string[] {
  const envOrigins =
    env.ALLOWED_ORIGINS?.split(",")
      .map((o) => o.trim())
      .filter(Boolean) || [];
  if (env.NODE_ENV === "production") {
    return envOrigins;
  }
  return [...envOrigins, ...DEV_ORIGINS];
}

/** Express JSON body parser size limit (uploads use their own raw limit) */
export const BODY_PARSE_LIMIT = "1mb";
