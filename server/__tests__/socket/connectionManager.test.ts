/**
 * @fileoverview Unit tests for the per-user connection table
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { FakeChannel } from "../helpers/fakeChannel";

vi.mock("../../logger", () => ({
  default: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const { ConnectionManager } = await import("../../socket/connectionManager");

describe("ConnectionManager", () => {
  let connections: InstanceType<typeof ConnectionManager>;

  beforeEach(() => {
    connections = new ConnectionManager();
  });

  it("registers a connection per user", () => {
    const channel = new FakeChannel("socket-a");

    const connection = connections.register(1, channel);

    expect(connection).toEqual({ userId: 1, channel, connectedAt: expect.any(Date) });
    expect(connections.get(1)).toBe(connection);
    expect(connections.has(1)).toBe(true);
    expect(connections.size).toBe(1);
  });

  it("closes the previous connection when the same user connects again", () => {
    const first = new FakeChannel("socket-a");
    const second = new FakeChannel("socket-b");
    connections.register(1, first);

    connections.register(1, second);

    expect(first.closeReasons).toEqual(["connection_replaced"]);
    expect(first.connected).toBe(false);
    expect(second.connected).toBe(true);
    expect(connections.get(1)?.channel).toBe(second);
    expect(connections.size).toBe(1);
  });

  it("leaves other users' connections alone", () => {
    const alice = new FakeChannel("socket-a");
    const bob = new FakeChannel("socket-b");

    connections.register(1, alice);
    connections.register(2, bob);

    expect(alice.closeReasons).toEqual([]);
    expect(connections.list().map((c) => c.userId)).toEqual([1, 2]);
  });

  it("ignores a late unregister from a replaced channel", () => {
    const first = new FakeChannel("socket-a");
    const second = new FakeChannel("socket-b");
    connections.register(1, first);
    connections.register(1, second);

    expect(connections.unregister(1, first)).toBe(false);
    expect(connections.get(1)?.channel).toBe(second);
  });

  it("unregisters the current channel once", () => {
    const channel = new FakeChannel("socket-a");
    connections.register(1, channel);

    expect(connections.unregister(1, channel)).toBe(true);
    expect(connections.unregister(1, channel)).toBe(false);
    expect(connections.has(1)).toBe(false);
  });

  it("closeAll closes every channel and empties the table", () => {
    const alice = new FakeChannel("socket-a");
    const bob = new FakeChannel("socket-b");
    connections.register(1, alice);
    connections.register(2, bob);

    connections.closeAll("server_shutdown");

    expect(alice.closeReasons).toEqual(["server_shutdown"]);
    expect(bob.closeReasons).toEqual(["server_shutdown"]);
    expect(connections.size).toBe(0);
  });
});
