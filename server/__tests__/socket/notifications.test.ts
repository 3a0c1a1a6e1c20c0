/**
 * @fileoverview Unit tests for the per-connection notification loop
 *
 * Interval timers and Date are faked; setImmediate stays real so pending
 * history writes can be flushed.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createTestLogger } from "../helpers/testLogger";
import { FakeChannel } from "../helpers/fakeChannel";

vi.mock("../../logger", () => ({
  default: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const { NotificationLoop, openNotificationChannel, toCompletedPayload } = await import(
  "../../socket/handlers/notifications"
);
const { ConnectionManager } = await import("../../socket/connectionManager");
const { JobRegistry } = await import("../../services/jobRegistry");
const { MemStorage } = await import("../../storage/memory");
const { ChannelError } = await import("../../socket/types");

const TICK_MS = 5000;
const NOW = new Date("2026-03-01T12:00:00.000Z");

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("NotificationLoop", () => {
  let registry: InstanceType<typeof JobRegistry>;
  let storage: InstanceType<typeof MemStorage>;
  let logger: ReturnType<typeof createTestLogger>;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval", "Date"] });
    vi.setSystemTime(NOW);
    registry = new JobRegistry();
    storage = new MemStorage();
    logger = createTestLogger();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function startLoop(channel: FakeChannel, userId = 1) {
    const loop = new NotificationLoop(userId, channel, {
      registry,
      history: storage,
      intervalMs: TICK_MS,
      logger,
    });
    loop.start();
    return loop;
  }

  it("delivers completions that landed before the connection opened", async () => {
    registry.add({ userId: 1, videoId: 10, routeId: 3 });
    registry.markCompleted(10);
    const channel = new FakeChannel("socket-a");

    startLoop(channel);
    await flush();

    expect(channel.sent).toEqual([
      { videoId: 10, routeId: 3, completedAt: "2026-03-01T12:00:00.000Z" },
    ]);
    expect(registry.size).toBe(0);
    expect(await storage.listJobsForUser(1, 10)).toEqual([
      expect.objectContaining({ userId: 1, videoId: 10, routeId: 3, completed: true }),
    ]);
  });

  it("picks up completed jobs on the interval", async () => {
    const channel = new FakeChannel("socket-a");
    startLoop(channel);
    const job = registry.add({ userId: 1, videoId: 10, routeId: 3 });
    // Flip the flag without the completion event so only the interval sees it
    job.completed = true;

    await vi.advanceTimersByTimeAsync(TICK_MS - 1);
    expect(channel.sent).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    expect(channel.sent).toHaveLength(1);
  });

  it("delivers right away when the registry reports a completion", async () => {
    const channel = new FakeChannel("socket-a");
    startLoop(channel);
    registry.add({ userId: 1, videoId: 10, routeId: 3 });

    registry.markCompleted(10);

    expect(channel.sent.map((p) => p.videoId)).toEqual([10]);
  });

  it("ignores other users' jobs", async () => {
    const channel = new FakeChannel("socket-a");
    startLoop(channel, 1);
    registry.add({ userId: 2, videoId: 11, routeId: null });

    registry.markCompleted(11);
    await vi.advanceTimersByTimeAsync(TICK_MS * 2);

    expect(channel.sent).toEqual([]);
    expect(registry.get(11)?.completed).toBe(true);
  });

  it("sends each completion once and records history once", async () => {
    const channel = new FakeChannel("socket-a");
    startLoop(channel);
    registry.add({ userId: 1, videoId: 10, routeId: 3 });
    registry.add({ userId: 1, videoId: 11, routeId: null });

    registry.markCompleted(10);
    registry.markCompleted(11);
    await vi.advanceTimersByTimeAsync(TICK_MS * 3);
    await flush();

    expect(channel.sent.map((p) => p.videoId)).toEqual([10, 11]);
    const history = await storage.listJobsForUser(1, 10);
    expect(history.map((h) => h.videoId)).toEqual([11, 10]);
  });

  it("does not send anything for a pending job", async () => {
    const channel = new FakeChannel("socket-a");
    startLoop(channel);
    registry.add({ userId: 1, videoId: 10, routeId: 3 });

    await vi.advanceTimersByTimeAsync(TICK_MS * 3);

    expect(channel.sent).toEqual([]);
    expect(registry.get(10)?.completed).toBe(false);
  });

  it("returns the job to the registry and stops when a send fails", async () => {
    const channel = new FakeChannel("socket-a");
    const loop = startLoop(channel);
    const first = registry.add({ userId: 1, videoId: 10, routeId: 3 });
    const second = registry.add({ userId: 1, videoId: 11, routeId: 3 });
    first.completed = true;
    second.completed = true;
    channel.failNextSend = new ChannelError("socket-a", "write after end");

    await vi.advanceTimersByTimeAsync(TICK_MS);
    await flush();

    expect(channel.sent).toEqual([]);
    expect(loop.currentState).toBe("disconnected");
    expect(registry.list().map((j) => j.videoId)).toEqual([10, 11]);
    expect(await storage.listJobsForUser(1, 10)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      "[Notifications] Send failed, jobs returned to registry",
      expect.objectContaining({ videoId: 10, remaining: 2 })
    );
  });

  it("keeps what was already delivered when a later send fails", async () => {
    const channel = new FakeChannel("socket-a");
    startLoop(channel);
    const first = registry.add({ userId: 1, videoId: 10, routeId: 3 });
    const second = registry.add({ userId: 1, videoId: 11, routeId: 3 });
    first.completed = true;
    second.completed = true;
    const send = channel.send.bind(channel);
    vi.spyOn(channel, "send").mockImplementation((payload) => {
      if (payload.videoId === 11) throw new Error("socket buffer full");
      send(payload);
    });

    await vi.advanceTimersByTimeAsync(TICK_MS);
    await flush();

    expect(channel.sent.map((p) => p.videoId)).toEqual([10]);
    expect(registry.list().map((j) => j.videoId)).toEqual([11]);
    expect((await storage.listJobsForUser(1, 10)).map((h) => h.videoId)).toEqual([10]);
  });

  it("stops ticking once stopped", async () => {
    const channel = new FakeChannel("socket-a");
    const loop = startLoop(channel);

    loop.stop("transport close");
    loop.stop("transport close");
    registry.add({ userId: 1, videoId: 10, routeId: 3 });
    registry.markCompleted(10);
    await vi.advanceTimersByTimeAsync(TICK_MS * 2);

    expect(channel.sent).toEqual([]);
    expect(registry.get(10)?.completed).toBe(true);
    expect(await loop.tick()).toBe(0);
  });

  it("does not resend when the history write fails", async () => {
    const channel = new FakeChannel("socket-a");
    vi.spyOn(storage, "recordJob").mockRejectedValue(new Error("insert failed"));
    startLoop(channel);
    registry.add({ userId: 1, videoId: 10, routeId: 3 });

    registry.markCompleted(10);
    await flush();
    await vi.advanceTimersByTimeAsync(TICK_MS * 2);

    expect(channel.sent).toHaveLength(1);
    expect(registry.size).toBe(0);
    expect(logger.error).toHaveBeenCalledWith(
      "[Notifications] Could not record job history",
      expect.objectContaining({ videoId: 10, error: "insert failed" })
    );
  });

  it("folds a completion that arrives mid-tick into the running tick", async () => {
    const channel = new FakeChannel("socket-a");
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const record = storage.recordJob.bind(storage);
    const recordJob = vi
      .spyOn(storage, "recordJob")
      .mockImplementationOnce(async (data) => {
        await gate;
        return record(data);
      });
    startLoop(channel);
    registry.add({ userId: 1, videoId: 10, routeId: 3 });
    registry.add({ userId: 1, videoId: 11, routeId: 3 });

    registry.markCompleted(10);
    registry.markCompleted(11);

    expect(channel.sent.map((p) => p.videoId)).toEqual([10]);

    release();
    await flush();

    expect(channel.sent.map((p) => p.videoId)).toEqual([10, 11]);
    expect(recordJob).toHaveBeenCalledTimes(2);
  });

  it("builds the completion payload from the job", () => {
    const job = registry.add({ userId: 1, videoId: 42, routeId: 7 });

    expect(toCompletedPayload(job, new Date("2026-01-02T03:04:05.000Z"))).toEqual({
      videoId: 42,
      routeId: 7,
      completedAt: "2026-01-02T03:04:05.000Z",
    });
  });
});

describe("openNotificationChannel", () => {
  let registry: InstanceType<typeof JobRegistry>;
  let storage: InstanceType<typeof MemStorage>;
  let connections: InstanceType<typeof ConnectionManager>;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval", "Date"] });
    vi.setSystemTime(NOW);
    registry = new JobRegistry();
    storage = new MemStorage();
    connections = new ConnectionManager();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function open(userId: number, channel: FakeChannel) {
    return openNotificationChannel(userId, channel, {
      registry,
      history: storage,
      connections,
      intervalMs: TICK_MS,
      logger: createTestLogger(),
    });
  }

  it("registers the channel and unregisters it on disconnect", () => {
    const channel = new FakeChannel("socket-a");
    const loop = open(1, channel);

    expect(connections.get(1)?.channel).toBe(channel);
    expect(loop.currentState).toBe("connected");

    channel.disconnect();

    expect(connections.has(1)).toBe(false);
    expect(loop.currentState).toBe("disconnected");
  });

  it("evicts the first connection so only the second receives completions", async () => {
    const first = new FakeChannel("socket-a");
    const second = new FakeChannel("socket-b");
    const firstLoop = open(1, first);
    const secondLoop = open(1, second);
    registry.add({ userId: 1, videoId: 10, routeId: 3 });

    registry.markCompleted(10);
    await vi.advanceTimersByTimeAsync(TICK_MS);
    await flush();

    expect(first.closeReasons).toEqual(["connection_replaced"]);
    expect(firstLoop.currentState).toBe("disconnected");
    expect(secondLoop.currentState).toBe("connected");
    expect(first.sent).toEqual([]);
    expect(second.sent.map((p) => p.videoId)).toEqual([10]);
    expect(connections.get(1)?.channel).toBe(second);
    expect(await storage.listJobsForUser(1, 10)).toHaveLength(1);
  });

  it("hands a job that could not be sent to the next connection", async () => {
    const first = new FakeChannel("socket-a");
    open(1, first);
    registry.add({ userId: 1, videoId: 10, routeId: 3 });
    first.failNextSend = new ChannelError("socket-a", "write after end");

    registry.markCompleted(10);
    first.disconnect();
    const second = new FakeChannel("socket-b");
    open(1, second);
    await flush();

    expect(first.sent).toEqual([]);
    expect(second.sent.map((p) => p.videoId)).toEqual([10]);
  });

  it("notifies video 42 on route 7 once compression finishes", async () => {
    const channel = new FakeChannel("socket-a");
    open(1, channel);
    registry.add({ userId: 1, videoId: 42, routeId: 7 });

    await vi.advanceTimersByTimeAsync(TICK_MS);
    expect(channel.sent).toEqual([]);

    registry.markCompleted(42);
    await flush();

    expect(channel.sent).toEqual([
      { videoId: 42, routeId: 7, completedAt: new Date(NOW.getTime() + TICK_MS).toISOString() },
    ]);
    expect(registry.size).toBe(0);
    expect(await storage.listJobsForUser(1, 10)).toEqual([
      expect.objectContaining({ userId: 1, videoId: 42, routeId: 7, completed: true }),
    ]);

    await vi.advanceTimersByTimeAsync(TICK_MS * 2);
    expect(channel.sent).toHaveLength(1);
  });
});
