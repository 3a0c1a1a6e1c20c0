/**
 * Health Routes
 *
 *   - /api/health       deep check (database, ffmpeg) plus pipeline counters
 *   - /api/health/live  liveness probe
 */

import { Router } from "express";
import { isDatabaseAvailable, pingDatabase } from "../db";
import type { JobRegistry } from "../services/jobRegistry";
import { checkFfmpegAvailable } from "../services/video";
import type { ConnectionManager } from "../socket/connectionManager";

export interface ComponentHealth {
  status: "up" | "down" | "unconfigured";
  latencyMs?: number;
}

export interface HealthCheckResult {
  status: "healthy" | "degraded" | "unhealthy";
  uptime: number;
  timestamp: string;
  checks: {
    database: ComponentHealth;
    ffmpeg: ComponentHealth;
  };
  pipeline: {
    pendingJobs: number;
    connections: number;
  };
}

export interface HealthRouteDeps {
  registry: JobRegistry;
  connections: ConnectionManager;
  ffmpegPath: string;
}

const startedAt = Date.now();

async function checkDatabase(): Promise<ComponentHealth> {
  // Without DATABASE_URL the server runs on in-memory storage
  if (!isDatabaseAvailable()) return { status: "unconfigured" };
  const start = Date.now();
  const ok = await pingDatabase();
  return { status: ok ? "up" : "down", latencyMs: Date.now() - start };
}

async function checkFfmpeg(ffmpegPath: string): Promise<ComponentHealth> {
  const start = Date.now();
  const ok = await checkFfmpegAvailable(ffmpegPath);
  return { status: ok ? "up" : "down", latencyMs: Date.now() - start };
}

export async function runHealthCheck(deps: HealthRouteDeps): Promise<HealthCheckResult> {
  const [database, ffmpeg] = await Promise.all([checkDatabase(), checkFfmpeg(deps.ffmpegPath)]);

  // Uploads still work without ffmpeg; they just all end up failed
  let status: HealthCheckResult["status"] = "healthy";
  if (database.status === "down") status = "unhealthy";
  else if (ffmpeg.status === "down") status = "degraded";

  return {
    status,
    uptime: Math.round((Date.now() - startedAt) / 1000),
    timestamp: new Date().toISOString(),
    checks: { database, ffmpeg },
    pipeline: {
      pendingJobs: deps.registry.size,
      connections: deps.connections.size,
    },
  };
}

export function createHealthRouter(deps: HealthRouteDeps): Router {
  const router = Router();

  router.get("/health/live", (_req, res) => {
    res.json({ status: "ok" });
  });

  router.get("/health", async (_req, res) => {
    const health = await runHealthCheck(deps);
    res.status(health.status === "healthy" ? 200 : 503).json(health);
  });

  return router;
}
