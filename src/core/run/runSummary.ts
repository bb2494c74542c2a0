import type { RunMetricsSnapshot, TimedStore } from "./RunMetrics";
import { formatFailure } from "./RunMetrics";

export type Bottleneck = "slow_collection" | "slow_submission" | "balanced";

export type RunSummary = {
  total: number;
  succeeded: number;
  failed: number;
  successRate: number;
  elapsedMs: number;
  storesPerMinute: number;
  averageCollectionMs: number;
  p95CollectionMs: number;
  averageSubmissionMs: number;
  fastest?: TimedStore;
  slowest?: TimedStore;
  bottleneck: Bottleneck;
  retries: number;
  retriedStores: number;
  totalOrders: number;
  totalUnits: number;
  failures: string[];
};

const SLOW_COLLECTION_MS = 2000;
const SLOW_SUBMISSION_MS = 1000;

const average = (times: TimedStore[]): number =>
  times.length === 0 ? 0 : times.reduce((sum, t) => sum + t.durationMs, 0) / times.length;

const percentile95 = (times: TimedStore[]): number => {
  if (times.length === 0) return 0;
  const sorted = times.map((t) => t.durationMs).sort((a, b) => a - b);
  return sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * 0.95))];
};

const pickExtreme = (times: TimedStore[], better: (a: number, b: number) => boolean): TimedStore | undefined =>
  times.reduce<TimedStore | undefined>(
    (best, t) => (best === undefined || better(t.durationMs, best.durationMs) ? { ...t } : best),
    undefined
  );

export const buildRunSummary = (args: {
  total: number;
  metrics: RunMetricsSnapshot;
  elapsedMs: number;
}): RunSummary => {
  const { total, metrics, elapsedMs } = args;
  const succeeded = metrics.progress.current;
  const averageCollectionMs = average(metrics.collectionTimes);
  const averageSubmissionMs = average(metrics.submissionTimes);

  let bottleneck: Bottleneck = "balanced";
  if (averageCollectionMs > SLOW_COLLECTION_MS) bottleneck = "slow_collection";
  else if (averageSubmissionMs > SLOW_SUBMISSION_MS) bottleneck = "slow_submission";

  return {
    total,
    succeeded,
    failed: metrics.failures.length,
    successRate: total > 0 ? (succeeded / total) * 100 : 0,
    elapsedMs,
    storesPerMinute: elapsedMs > 0 ? succeeded / (elapsedMs / 60_000) : 0,
    averageCollectionMs,
    p95CollectionMs: percentile95(metrics.collectionTimes),
    averageSubmissionMs,
    fastest: pickExtreme(metrics.collectionTimes, (a, b) => a < b),
    slowest: pickExtreme(metrics.collectionTimes, (a, b) => a > b),
    bottleneck,
    retries: metrics.retries,
    retriedStores: metrics.retriedStores.length,
    totalOrders: metrics.totalOrders,
    totalUnits: metrics.totalUnits,
    failures: metrics.failures.map(formatFailure)
  };
};
