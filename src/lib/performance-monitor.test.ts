import { afterEach, describe, expect, it, vi } from "vitest";

import { PerformanceMonitor } from "./performance-monitor";

describe("PerformanceMonitor", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should track progress of an active session", () => {
    const monitor = new PerformanceMonitor();
    const sessionId = monitor.startRender(4, 400);

    expect(monitor.getProgress(sessionId)).toBe(0);
    monitor.recordChunk(sessionId, 0, 5);
    expect(monitor.getProgress(sessionId)).toBe(25);
    monitor.recordChunk(sessionId, 1, 15);
    expect(monitor.getProgress(sessionId)).toBe(50);
  });

  it("should summarize a finished session", () => {
    const monitor = new PerformanceMonitor();
    const sessionId = monitor.startRender(2, 100);
    monitor.recordChunk(sessionId, 0, 4);
    monitor.recordChunk(sessionId, 1, 8);

    const metrics = monitor.endRender(sessionId);

    expect(metrics).toMatchObject({ sessionId, totalChunks: 2, completedChunks: 2, totalPixels: 100 });
    expect(metrics.averageChunkTime).toBe(6);
    expect(monitor.getProgress(sessionId)).toBeNull();
    expect(monitor.getLastRenderMetrics()).toBe(metrics);
  });

  it("should give every session its own id", () => {
    const monitor = new PerformanceMonitor();
    expect(monitor.startRender(1, 1)).not.toBe(monitor.startRender(1, 1));
  });

  it("should warn about chunks of unknown sessions", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const monitor = new PerformanceMonitor();

    monitor.recordChunk("render-missing", 0, 1);

    expect(warn).toHaveBeenCalledWith("PerformanceMonitor: Unknown session render-missing");
    expect(() => monitor.endRender("render-missing")).toThrow("PerformanceMonitor: Unknown session render-missing");
  });

  it("should keep a bounded history while counting every render", () => {
    const monitor = new PerformanceMonitor(2);
    for (let i = 0; i < 3; i++) {
      monitor.endRender(monitor.startRender(1, 10));
    }

    expect(monitor.getHistory()).toHaveLength(2);
    expect(monitor.getHistory()[0].sessionId).toBe("render-2");
    expect(monitor.getStats().totalRenders).toBe(3);
  });

  it("should report zeroed stats before any render", () => {
    expect(new PerformanceMonitor().getStats()).toEqual({
      totalRenders: 0,
      averageDuration: 0,
      averagePixelsPerSecond: 0,
    });
  });
});
