/**
 * Socket.io Server Setup
 *
 * Authenticated, push-only channel for job completion notifications.
 * Each authenticated socket becomes the user's single notification
 * connection and gets its own notification loop.
 */

import type { Server as HttpServer } from "node:http";
import { Server } from "socket.io";
import logger from "../logger";
import { getAllowedOrigins } from "../config/server";
import {
  SOCKET_MAX_HTTP_BUFFER_SIZE,
  SOCKET_PING_INTERVAL_MS,
  SOCKET_PING_TIMEOUT_MS,
  SOCKET_UPGRADE_TIMEOUT_MS,
} from "../config/constants";
import type { JobHistoryStore } from "../storage/types";
import type { JobRegistry } from "../services/jobRegistry";
import { socketAuthMiddleware } from "./auth";
import { createSocketChannel } from "./channel";
import type { ConnectionManager } from "./connectionManager";
import { openNotificationChannel } from "./handlers/notifications";
import type {
  ClientToServerEvents,
  InterServerEvents,
  ServerToClientEvents,
  SocketData,
  TypedServer,
  TypedSocket,
} from "./types";

export interface SocketServerDeps {
  registry: JobRegistry;
  history: JobHistoryStore;
  connections: ConnectionManager;
  intervalMs: number;
}

const TRANSPORTS: ("websocket" | "polling")[] = ["websocket", "polling"];

/**
 * Initialize Socket.io server
 */
export function initializeSocketServer(httpServer: HttpServer, deps: SocketServerDeps): TypedServer {
  const io: TypedServer = new Server<
    ClientToServerEvents,
    ServerToClientEvents,
    InterServerEvents,
    SocketData
  >(httpServer, {
    cors: {
      origin: getAllowedOrigins(),
      credentials: true,
    },
    transports: TRANSPORTS,
    pingTimeout: SOCKET_PING_TIMEOUT_MS,
    pingInterval: SOCKET_PING_INTERVAL_MS,
    upgradeTimeout: SOCKET_UPGRADE_TIMEOUT_MS,
    maxHttpBufferSize: SOCKET_MAX_HTTP_BUFFER_SIZE,
  });

  io.use(socketAuthMiddleware);

  io.on("connection", (socket: TypedSocket) => {
    handleConnection(socket, deps);
  });

  logger.info("[Socket] Server initialized", {
    transports: TRANSPORTS,
    pingInterval: SOCKET_PING_INTERVAL_MS,
    notificationIntervalMs: deps.intervalMs,
  });

  return io;
}

export function handleConnection(socket: TypedSocket, deps: SocketServerDeps): void {
  const { userId } = socket.data;

  logger.info("[Socket] Client connected", { socketId: socket.id, userId });

  socket.emit("connected", {
    userId,
    serverTime: new Date().toISOString(),
  });

  openNotificationChannel(userId, createSocketChannel(socket), deps);

  socket.on("disconnect", (reason) => {
    logger.info("[Socket] Client disconnected", { socketId: socket.id, userId, reason });
  });
}

/**
 * Graceful shutdown. Pending jobs are not delivered; they are lost with the
 * process like everything else in the registry.
 */
export async function shutdownSocketServer(
  io: TypedServer,
  connections: ConnectionManager
): Promise<void> {
  logger.info("[Socket] Shutting down...");

  connections.closeAll("server_shutdown");

  const sockets = await io.fetchSockets();
  for (const socket of sockets) {
    socket.disconnect(true);
  }

  await new Promise<void>((resolve) => {
    io.close(() => {
      logger.info("[Socket] Server closed");
      resolve();
    });
  });
}
