import { FailureWindow } from "../../src/core/run/FailureWindow";
import { formatFailure, RunMetrics } from "../../src/core/run/RunMetrics";
import { makeResult } from "../helpers/fixtures";

describe("FailureWindow", () => {
  it("prunes entries older than the horizon from the front", () => {
    const window = new FailureWindow(60_000);
    window.record(1_000);
    window.record(30_000);
    window.record(70_000);

    expect(window.prune(61_000)).toBe(3);
    expect(window.prune(61_001)).toBe(2);
    expect(window.entries()).toEqual([30_000, 70_000]);
    expect(window.prune(200_000)).toBe(0);
  });

  it("keeps entries ascending when handed a stale timestamp", () => {
    const window = new FailureWindow();
    window.record(5_000);
    window.record(4_000);
    expect(window.entries()).toEqual([5_000, 5_000]);
  });
});

describe("RunMetrics", () => {
  it("tracks progress, totals and retried stores", () => {
    const metrics = new RunMetrics();
    metrics.startRun(3);
    metrics.recordRetry("A");
    metrics.recordRetry("A");
    metrics.recordCollection(makeResult("A", { orders: 12, units: 120 }), 800);
    metrics.recordCollection(makeResult("B", { orders: 3, units: 30 }), 400);
    metrics.recordSubmission(makeResult("A"), 150, new Date("2026-03-01T10:00:00.000Z"));

    const snapshot = metrics.snapshot();
    expect(snapshot.retries).toBe(2);
    expect(snapshot.retriedStores).toEqual(["A"]);
    expect(snapshot.totalOrders).toBe(15);
    expect(snapshot.totalUnits).toBe(150);
    expect(snapshot.collectionTimes).toEqual([
      { store: "A", durationMs: 800 },
      { store: "B", durationMs: 400 }
    ]);
    expect(snapshot.progress).toEqual({ current: 1, total: 3, lastUpdate: "2026-03-01T10:00:00.000Z" });
    expect(snapshot.submitted.map((r) => r.storeName)).toEqual(["A"]);
  });

  it("reports N/A as the last update before any submission", () => {
    const metrics = new RunMetrics();
    metrics.startRun(5);
    expect(metrics.currentProgress()).toEqual({ current: 0, total: 5, lastUpdate: "N/A" });
  });

  it("feeds only exhausted collections into the failure-rate window", () => {
    const metrics = new RunMetrics({ failureHorizonMs: 10_000 });
    metrics.recordFailure({ store: "S1", category: "HTTP Submit Fail", status: 500 });
    metrics.recordExhausted({ store: "S2", category: "Fail" }, 1_000);

    expect(metrics.failureWindowSize).toBe(1);
    expect(metrics.recentFailureCount(11_000)).toBe(1);
    expect(metrics.recentFailureCount(11_001)).toBe(0);
    expect(metrics.snapshot().failures.map(formatFailure)).toEqual(["S1 (HTTP Submit Fail 500)", "S2 (Fail)"]);
  });

  it("returns snapshots detached from later updates", () => {
    const metrics = new RunMetrics();
    metrics.startRun(1);
    const before = metrics.snapshot();
    metrics.recordFailure({ store: "S", category: "Worker Crash" });

    expect(before.failures).toEqual([]);
    expect(metrics.snapshot().failures).toHaveLength(1);
  });
});
