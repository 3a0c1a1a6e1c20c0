import type { Logger } from "../logger";

/**
 * Identity attached by the auth middleware. Only the numeric id is known
 * here; profiles live in the auth service.
 */
export type AuthenticatedUser = {
  id: number;
};

declare global {
  namespace Express {
    interface Request {
      currentUser?: AuthenticatedUser;
      /** Unique request trace ID (from X-Request-ID header or generated) */
      requestId: string;
      /** Child logger with requestId pre-bound */
      log: Logger;
    }
  }
}

export {};
