import type { Express } from "express";
import { createHealthRouter, type HealthRouteDeps } from "./routes/health";
import { createVideosRouter, type VideoRouteDeps } from "./routes/videos";

export type RouteDeps = VideoRouteDeps & HealthRouteDeps;

export function registerRoutes(app: Express, deps: RouteDeps): void {
  // 1. Health (public)
  app.use("/api", createHealthRouter(deps));

  // 2. Video upload, status and job history (bearer token)
  app.use("/api", createVideosRouter(deps));
}
