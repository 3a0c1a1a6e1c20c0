/**
 * WebSocket Types
 *
 * Type definitions for Socket.io events and the transport-neutral
 * notification channel the notification loop talks to.
 */

import type { Server, Socket } from "socket.io";

// ============================================================================
// Notification Events
// ============================================================================

export interface JobCompletedPayload {
  videoId: number;
  routeId: number | null;
  completedAt: string;
}

// ============================================================================
// Client → Server Events
// ============================================================================

// Clients only listen on this channel
export type ClientToServerEvents = Record<string, never>;

// ============================================================================
// Server → Client Events
// ============================================================================

export interface ServerToClientEvents {
  connected: (data: { userId: number; serverTime: string }) => void;
  error: (data: { code: string; message: string }) => void;
  "job:completed": (data: JobCompletedPayload) => void;
}

export interface InterServerEvents {
  ping: () => void;
}

// ============================================================================
// Socket Data (attached to each socket by the auth middleware)
// ============================================================================

export interface SocketData {
  userId: number;
  connectedAt: Date;
}

export type TypedServer = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
export type TypedSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

// ============================================================================
// Notification channel
// ============================================================================

/**
 * One user's live, duplex connection as seen by the notification loop.
 * `close` must eventually fire the `onDisconnect` listeners.
 */
export interface NotificationChannel {
  readonly id: string;
  readonly connected: boolean;
  send(payload: JobCompletedPayload): void;
  close(reason: string): void;
  onDisconnect(listener: (reason: string) => void): void;
}

/** The channel could not carry a message, or was torn down. */
export class ChannelError extends Error {
  constructor(
    public readonly channelId: string,
    message: string
  ) {
    super(message);
    this.name = "ChannelError";
  }
}
