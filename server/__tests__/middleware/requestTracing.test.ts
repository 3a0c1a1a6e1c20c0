/**
 * @fileoverview Unit tests for request ID propagation
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const childLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
const mockCreateChildLogger = vi.fn(() => childLogger);

vi.mock("../../logger", () => ({
  createChildLogger: mockCreateChildLogger,
}));

const { requestTracing } = await import("../../middleware/requestTracing");

function createRes() {
  const listeners: Record<string, () => void> = {};
  return {
    statusCode: 201,
    setHeader: vi.fn(),
    on: vi.fn((event: string, listener: () => void) => {
      listeners[event] = listener;
    }),
    listeners,
  };
}

describe("requestTracing", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("keeps an incoming X-Request-ID", () => {
    const req: any = { headers: { "x-request-id": " upstream-1 " }, method: "POST", originalUrl: "/api/videos" };
    const res = createRes();
    const next = vi.fn();

    requestTracing(req, res as any, next);

    expect(req.requestId).toBe("upstream-1");
    expect(res.setHeader).toHaveBeenCalledWith("X-Request-ID", "upstream-1");
    expect(mockCreateChildLogger).toHaveBeenCalledWith({ requestId: "upstream-1" });
    expect(req.log).toBe(childLogger);
    expect(next).toHaveBeenCalled();
  });

  it("generates an id when none is sent", () => {
    const req: any = { headers: {} };
    const res = createRes();

    requestTracing(req, res as any, vi.fn());

    expect(req.requestId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("logs the finished request with the user id", () => {
    const req: any = {
      headers: {},
      method: "POST",
      originalUrl: "/api/routes/7/video",
      currentUser: { id: 3 },
    };
    const res = createRes();
    requestTracing(req, res as any, vi.fn());

    res.listeners.finish();

    expect(childLogger.info).toHaveBeenCalledWith("request completed", {
      method: "POST",
      url: "/api/routes/7/video",
      status: 201,
      userId: 3,
      durationMs: expect.any(Number),
    });
  });
});
