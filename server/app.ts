/**
 * Express Application Factory
 *
 * Creates and configures the Express app with all middleware and API routes.
 * Used by server/index.ts; the Socket.io server attaches to the same HTTP
 * server there.
 */
import express, { type NextFunction, type Request, type Response } from "express";
import compression from "compression";
import helmet from "helmet";
import cors from "cors";
import logger from "./logger";
import { requestTracing } from "./middleware/requestTracing";
import { BODY_PARSE_LIMIT, getAllowedOrigins } from "./config/server";
import { registerRoutes, type RouteDeps } from "./routes";
import { Errors } from "./utils/apiError";

function isPayloadTooLarge(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.too.large";
}

export function createApp(deps: RouteDeps): express.Express {
  const app = express();

  // Trust the first proxy hop so req.ip reflects the real client address.
  app.set("trust proxy", 1);

  // Request tracing — generate/propagate request ID before anything else
  app.use(requestTracing);

  // API only: no pages, scripts or frames to allow
  app.use(helmet());

  const allowedOrigins = getAllowedOrigins();
  app.use(
    cors({
      origin(origin, callback) {
        // Allow requests with no origin (mobile apps, server-to-server) or matching allowed domains
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error("Not allowed by CORS"));
        }
      },
      credentials: true,
    })
  );

  app.use(compression());

  // Uploads parse their own raw body; everything else is JSON
  app.use(express.json({ limit: BODY_PARSE_LIMIT }));

  registerRoutes(app, deps);

  app.use("/api", (_req, res) => {
    Errors.notFound(res, "ROUTE_NOT_FOUND", "No such endpoint.");
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (isPayloadTooLarge(err)) {
      Errors.tooLarge(res, "UPLOAD_TOO_LARGE", "The video exceeds the maximum upload size.");
      return;
    }
    logger.error("[App] Unhandled request error", {
      requestId: req.requestId,
      path: req.path,
      error: err instanceof Error ? err.message : String(err),
    });
    Errors.internal(res);
  });

  return app;
}
