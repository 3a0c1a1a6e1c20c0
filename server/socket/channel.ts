import logger from "../logger";
import { ChannelError, type NotificationChannel, type TypedSocket } from "./types";

/**
 * Adapt a Socket.io socket to the notification channel the loop uses.
 */
export function createSocketChannel(socket: TypedSocket): NotificationChannel {
  return {
    id: socket.id,

    get connected() {
      return socket.connected;
    },

    send(payload) {
      if (!socket.connected) {
        throw new ChannelError(socket.id, "Socket is no longer connected");
      }
      socket.emit("job:completed", payload);
    },

    close(reason) {
      if (!socket.connected) return;
      logger.debug("[Socket] Closing channel", { socketId: socket.id, reason });
      socket.emit("error", { code: reason, message: "Connection closed by server" });
      socket.disconnect(true);
    },

    onDisconnect(listener) {
      socket.on("disconnect", (reason) => listener(reason));
    },
  };
}
