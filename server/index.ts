import http from "node:http";
import { createApp } from "./app";
import { env } from "./config/env";
import { SERVER_PORT } from "./config/server";
import { closeDatabase } from "./db";
import logger from "./logger";
import { jobRegistry } from "./services/jobRegistry";
import { CompressionWorker, checkFfmpegAvailable, createFfmpegTranscoder } from "./services/video";
import { initializeSocketServer, shutdownSocketServer } from "./socket";
import { connectionManager } from "./socket/connectionManager";
import { createStorage } from "./storage";

const storage = createStorage();

const worker = new CompressionWorker({
  videos: storage,
  registry: jobRegistry,
  transcode: createFfmpegTranscoder({
    ffmpegPath: env.FFMPEG_PATH,
    crf: env.FFMPEG_CRF,
    timeoutMs: env.TRANSCODE_TIMEOUT_MS,
  }),
});

const app = createApp({
  storage,
  registry: jobRegistry,
  worker,
  connections: connectionManager,
  videosDir: env.VIDEOS_DIR,
  maxUploadBytes: env.MAX_UPLOAD_BYTES,
  ffmpegPath: env.FFMPEG_PATH,
});
const server = http.createServer(app);

// Initialize WebSocket server
const io = initializeSocketServer(server, {
  registry: jobRegistry,
  history: storage,
  connections: connectionManager,
  intervalMs: env.NOTIFICATION_TICK_MS,
});

if (!(await checkFfmpegAvailable(env.FFMPEG_PATH))) {
  logger.warn("[Server] ffmpeg not found, every upload will be marked failed", {
    ffmpegPath: env.FFMPEG_PATH,
  });
}

server.listen(SERVER_PORT, "0.0.0.0", () => {
  logger.info(`Video server running on port ${SERVER_PORT}`, {
    videosDir: env.VIDEOS_DIR,
    notificationIntervalMs: env.NOTIFICATION_TICK_MS,
  });
});

// Graceful shutdown
let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`[Server] ${signal} received, shutting down gracefully...`);

  await shutdownSocketServer(io, connectionManager);

  if (worker.activeCount > 0) {
    logger.info("[Server] Waiting for in-flight compressions", { count: worker.activeCount });
  }
  await worker.drain();

  await new Promise<void>((resolve) => {
    server.close(() => {
      logger.info("[Server] HTTP server closed");
      resolve();
    });
  });
  await closeDatabase();
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.fatal("[Server] Shutdown failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      }
    );
  });
}
