import type { CollectionResult } from "../stores/store.types";
import { DEFAULT_FAILURE_HORIZON_MS, FailureWindow } from "./FailureWindow";

export type FailureCategory =
  | "Fail"
  | "Missing MKID"
  | "HTTP Submit Fail"
  | "Submit Exception"
  | "Worker Crash"
  | "Not Processed";

export type FailureDescriptor = {
  store: string;
  category: FailureCategory;
  status?: number;
  reason?: string;
};

export type TimedStore = {
  store: string;
  durationMs: number;
};

export type RunProgress = {
  current: number;
  total: number;
  lastUpdate: string;
};

export type RunMetricsSnapshot = {
  collectionTimes: TimedStore[];
  submissionTimes: TimedStore[];
  retries: number;
  retriedStores: string[];
  totalOrders: number;
  totalUnits: number;
  failures: FailureDescriptor[];
  submitted: CollectionResult[];
  progress: RunProgress;
};

export const formatFailure = (failure: FailureDescriptor): string =>
  failure.status != null
    ? `${failure.store} (${failure.category} ${failure.status})`
    : `${failure.store} (${failure.category})`;

/**
 * Run-scoped counters shared by every worker and read by the controller.
 * Each method completes without awaiting, so updates never interleave.
 */
export class RunMetrics {
  private readonly collectionTimes: TimedStore[] = [];
  private readonly submissionTimes: TimedStore[] = [];
  private readonly retriedStores = new Set<string>();
  private readonly failures: FailureDescriptor[] = [];
  private readonly submitted: CollectionResult[] = [];
  private readonly failureWindow: FailureWindow;
  private retries = 0;
  private totalOrders = 0;
  private totalUnits = 0;
  private progress: RunProgress = { current: 0, total: 0, lastUpdate: "N/A" };

  constructor(opts: { failureHorizonMs?: number } = {}) {
    this.failureWindow = new FailureWindow(opts.failureHorizonMs ?? DEFAULT_FAILURE_HORIZON_MS);
  }

  startRun(total: number): void {
    this.progress = { current: 0, total, lastUpdate: "N/A" };
  }

  recordRetry(store: string): void {
    this.retries += 1;
    this.retriedStores.add(store);
  }

  recordCollection(result: CollectionResult, durationMs: number): void {
    this.collectionTimes.push({ store: result.storeName, durationMs });
    this.totalOrders += result.orders;
    this.totalUnits += result.units;
  }

  recordSubmission(result: CollectionResult, durationMs: number, at: Date): void {
    this.submissionTimes.push({ store: result.storeName, durationMs });
    this.submitted.push({ ...result, raw: result.raw ? { ...result.raw } : undefined });
    this.progress = {
      ...this.progress,
      current: this.progress.current + 1,
      lastUpdate: at.toISOString()
    };
  }

  recordFailure(failure: FailureDescriptor): void {
    this.failures.push({ ...failure });
  }

  /** Terminal collection failure: recorded and fed to the failure-rate window. */
  recordExhausted(failure: FailureDescriptor, at: number): void {
    this.recordFailure(failure);
    this.failureWindow.record(at);
  }

  recentFailureCount(now: number): number {
    return this.failureWindow.prune(now);
  }

  get failureWindowSize(): number {
    return this.failureWindow.size;
  }

  get retryCount(): number {
    return this.retries;
  }

  currentProgress(): RunProgress {
    return { ...this.progress };
  }

  snapshot(): RunMetricsSnapshot {
    return {
      collectionTimes: this.collectionTimes.map((t) => ({ ...t })),
      submissionTimes: this.submissionTimes.map((t) => ({ ...t })),
      retries: this.retries,
      retriedStores: [...this.retriedStores],
      totalOrders: this.totalOrders,
      totalUnits: this.totalUnits,
      failures: this.failures.map((f) => ({ ...f })),
      submitted: this.submitted.map((r) => ({ ...r })),
      progress: { ...this.progress }
    };
  }
}
