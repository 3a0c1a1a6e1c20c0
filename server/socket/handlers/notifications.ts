/**
 * Notification Handler
 *
 * One loop per live connection. Every tick atomically takes the user's
 * completed jobs from the registry, pushes one `job:completed` message per
 * job and writes one history row per delivered message. Ticks run on a
 * fixed interval, once right away on connect (so completions that landed
 * while the user was offline go out immediately) and whenever the registry
 * reports a completion for this user.
 *
 * A job that could not be sent goes back into the registry and the loop
 * stops; the next connection for the same user picks it up.
 */

import defaultLogger, { type Logger } from "../../logger";
import type { JobHistoryStore } from "../../storage/types";
import type { Job, JobRegistry } from "../../services/jobRegistry";
import type { ConnectionManager } from "../connectionManager";
import { ChannelError, type JobCompletedPayload, type NotificationChannel } from "../types";

export type LoopState = "idle" | "connected" | "disconnected";

export interface NotificationLoopDeps {
  registry: JobRegistry;
  history: JobHistoryStore;
  intervalMs: number;
  logger?: Logger;
}

export function toCompletedPayload(job: Job, completedAt: Date = new Date()): JobCompletedPayload {
  return {
    videoId: job.videoId,
    routeId: job.routeId,
    completedAt: completedAt.toISOString(),
  };
}

export class NotificationLoop {
  private state: LoopState = "idle";
  private timer: ReturnType<typeof setInterval> | null = null;
  private unsubscribe: (() => void) | null = null;
  private ticking = false;
  private rerun = false;
  private readonly logger: Logger;

  constructor(
    readonly userId: number,
    private readonly channel: NotificationChannel,
    private readonly deps: NotificationLoopDeps
  ) {
    this.logger = (deps.logger ?? defaultLogger).child({
      component: "notifications",
      userId,
      channel: channel.id,
    });
  }

  get currentState(): LoopState {
    return this.state;
  }

  start(): void {
    if (this.state !== "idle") return;
    this.state = "connected";

    this.timer = setInterval(() => {
      this.runTick();
    }, this.deps.intervalMs);

    this.unsubscribe = this.deps.registry.onCompleted((job) => {
      if (job.userId === this.userId) this.runTick();
    });

    this.logger.debug("[Notifications] Loop started", { intervalMs: this.deps.intervalMs });
    this.runTick();
  }

  /** Idempotent. Jobs not yet taken stay in the registry. */
  stop(reason: string): void {
    if (this.state === "disconnected") return;
    this.state = "disconnected";

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.unsubscribe?.();
    this.unsubscribe = null;

    this.logger.debug("[Notifications] Loop stopped", { reason });
  }

  /**
   * Deliver every completed job the user has right now. Returns the number
   * of messages sent. A tick requested while one is running is folded into
   * a second pass of the running tick.
   */
  async tick(): Promise<number> {
    if (this.state !== "connected") return 0;
    if (this.ticking) {
      this.rerun = true;
      return 0;
    }

    this.ticking = true;
    let delivered = 0;
    try {
      do {
        this.rerun = false;
        delivered += await this.deliverCompleted();
      } while (this.rerun && this.state === "connected");
    } finally {
      this.ticking = false;
    }
    return delivered;
  }

  private runTick(): void {
    this.tick().catch((error: unknown) => {
      this.logger.error("[Notifications] Tick failed", {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  private async deliverCompleted(): Promise<number> {
    const jobs = this.deps.registry.takeCompleted(this.userId);
    if (jobs.length === 0) return 0;

    const sent: Job[] = [];
    for (const [index, job] of jobs.entries()) {
      if (this.state !== "connected" || !this.channel.connected) {
        this.giveBack(jobs.slice(index));
        this.stop("channel_disconnected");
        break;
      }

      try {
        this.channel.send(toCompletedPayload(job));
        sent.push(job);
      } catch (error) {
        this.giveBack(jobs.slice(index));
        this.logger.warn("[Notifications] Send failed, jobs returned to registry", {
          videoId: job.videoId,
          remaining: jobs.length - index,
          error: error instanceof Error ? error.message : String(error),
        });
        this.stop(error instanceof ChannelError ? "channel_error" : "send_failed");
        break;
      }
    }

    for (const job of sent) {
      try {
        await this.deps.history.recordJob({
          userId: job.userId,
          videoId: job.videoId,
          routeId: job.routeId,
        });
      } catch (error) {
        // The message is already out; re-sending it would duplicate it
        this.logger.error("[Notifications] Could not record job history", {
          videoId: job.videoId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (sent.length > 0) {
      this.logger.info("[Notifications] Delivered completions", {
        count: sent.length,
        videoIds: sent.map((job) => job.videoId),
      });
    }
    return sent.length;
  }

  private giveBack(jobs: Job[]): void {
    for (const job of jobs) {
      this.deps.registry.restore(job);
    }
  }
}

export interface OpenChannelDeps extends NotificationLoopDeps {
  connections: ConnectionManager;
}

/**
 * Register `channel` as the user's connection and start its loop. The loop
 * stops and the registration is dropped when the channel disconnects.
 */
export function openNotificationChannel(
  userId: number,
  channel: NotificationChannel,
  deps: OpenChannelDeps
): NotificationLoop {
  const { connections, ...loopDeps } = deps;
  const loop = new NotificationLoop(userId, channel, loopDeps);

  channel.onDisconnect((reason) => {
    loop.stop(reason);
    connections.unregister(userId, channel);
  });

  connections.register(userId, channel);
  loop.start();
  return loop;
}
