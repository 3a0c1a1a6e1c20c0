/**
 * Connection Manager
 *
 * Tracks the single live notification channel per user. Registering a new
 * channel for a user closes the one it replaces, so a user never has two
 * loops delivering the same completions.
 *
 * All methods are synchronous and run to completion on the event loop.
 */

import logger from "../logger";
import { CONNECTION_REPLACED_REASON } from "../config/constants";
import type { NotificationChannel } from "./types";

export interface ActiveConnection {
  userId: number;
  channel: NotificationChannel;
  connectedAt: Date;
}

export class ConnectionManager {
  private readonly connections = new Map<number, ActiveConnection>();

  /**
   * Install `channel` as the user's connection. Any previous connection is
   * removed from the table first and then closed.
   */
  register(userId: number, channel: NotificationChannel): ActiveConnection {
    const previous = this.connections.get(userId);
    const connection: ActiveConnection = { userId, channel, connectedAt: new Date() };
    this.connections.set(userId, connection);

    if (previous && previous.channel !== channel) {
      logger.info("[Connections] Replacing existing connection", {
        userId,
        previousChannel: previous.channel.id,
        channel: channel.id,
      });
      previous.channel.close(CONNECTION_REPLACED_REASON);
    }

    return connection;
  }

  /**
   * Remove the user's entry, but only while `channel` is still the current
   * one. A late disconnect from a replaced channel leaves its successor alone.
   */
  unregister(userId: number, channel: NotificationChannel): boolean {
    const current = this.connections.get(userId);
    if (!current || current.channel !== channel) return false;
    this.connections.delete(userId);
    return true;
  }

  get(userId: number): ActiveConnection | undefined {
    return this.connections.get(userId);
  }

  has(userId: number): boolean {
    return this.connections.has(userId);
  }

  list(): ActiveConnection[] {
    return Array.from(this.connections.values());
  }

  get size(): number {
    return this.connections.size;
  }

  closeAll(reason: string): void {
    const all = this.list();
    this.connections.clear();
    for (const { channel } of all) {
      channel.close(reason);
    }
  }
}

export const connectionManager = new ConnectionManager();
