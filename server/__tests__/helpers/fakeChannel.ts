import { ChannelError, type JobCompletedPayload, type NotificationChannel } from "../../socket/types";

/**
 * In-process notification channel. `disconnect` simulates the client going
 * away; `failNextSend` makes the next `send` throw.
 */
export class FakeChannel implements NotificationChannel {
  connected = true;
  readonly sent: JobCompletedPayload[] = [];
  readonly closeReasons: string[] = [];
  failNextSend: Error | null = null;
  private readonly listeners: ((reason: string) => void)[] = [];

  constructor(readonly id: string) {}

  send(payload: JobCompletedPayload): void {
    if (!this.connected) {
      throw new ChannelError(this.id, "Socket is no longer connected");
    }
    if (this.failNextSend) {
      const error = this.failNextSend;
      this.failNextSend = null;
      throw error;
    }
    this.sent.push(payload);
  }

  close(reason: string): void {
    if (!this.connected) return;
    this.closeReasons.push(reason);
    this.disconnect(reason);
  }

  onDisconnect(listener: (reason: string) => void): void {
    this.listeners.push(listener);
  }

  disconnect(reason = "transport close"): void {
    this.connected = false;
    for (const listener of this.listeners) {
      listener(reason);
    }
  }
}
