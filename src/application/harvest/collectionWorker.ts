import type { RunMetrics } from "../../core/run/RunMetrics";
import type { CollectionResult, WorkItem } from "../../core/stores/store.types";
import type { PortalSession } from "../../ports/SessionProvider";
import type { FetchContext, StoreMetricsFetcher } from "../../ports/StoreMetricsFetcher";
import type { AsyncQueue } from "../../shared/concurrency/asyncQueue";
import type { ConcurrencyGovernor } from "../../shared/concurrency/governor";
import { logEvent, toErrorMessage } from "../../shared/logging/logEvent";
import type { Clock } from "../../shared/time/clock";
import { describeCollectionFailure, validateWorkItem } from "./harvest.error-handler";

/**
 * Per-item retry as a bounded state machine:
 * attempting -> succeeded | retrying -> attempting | exhausted.
 * `attempt` is zero-based; at most `retryCount` fetches are made.
 */
export type CollectionState =
  | { kind: "attempting"; attempt: number }
  | { kind: "retrying"; attempt: number; error: unknown }
  | { kind: "succeeded"; attempt: number; result: CollectionResult }
  | { kind: "exhausted"; attempt: number; error: unknown };

export type CollectionOutcome =
  | { status: "succeeded"; result: CollectionResult; attempts: number; durationMs: number }
  | { status: "failed"; attempts: number };

export const backoffDelayMs = (attempt: number, baseDelayMs: number): number => baseDelayMs * 2 ** attempt;

export const afterFailedAttempt = (attempt: number, retryCount: number, error: unknown): CollectionState =>
  attempt < retryCount - 1
    ? { kind: "retrying", attempt, error }
    : { kind: "exhausted", attempt, error };

export type CollectStoreDeps = {
  context: FetchContext;
  metrics: RunMetrics;
  submissions: AsyncQueue<CollectionResult>;
  clock: Clock;
  retryCount: number;
  retryBaseDelayMs: number;
};

/**
 * Fetches one store under the retry policy. Exhaustion is recorded and never
 * thrown; only the caller's own bugs escape.
 */
export const collectStore = async (item: WorkItem, deps: CollectStoreDeps): Promise<CollectionOutcome> => {
  const { context, metrics, submissions, clock, retryCount, retryBaseDelayMs } = deps;
  const startedAt = clock.now();

  const invalid = validateWorkItem(item);
  if (invalid) {
    logEvent("error", "collection.skipped", { store: item.storeName, reason: invalid.message });
    metrics.recordFailure(describeCollectionFailure(item, invalid));
    return { status: "failed", attempts: 0 };
  }

  let state: CollectionState = { kind: "attempting", attempt: 0 };
  for (;;) {
    switch (state.kind) {
      case "attempting": {
        try {
          const result = await context.fetchStoreMetrics(item);
          state = { kind: "succeeded", attempt: state.attempt, result };
        } catch (error) {
          logEvent("warn", "collection.attempt_failed", {
            store: item.storeName,
            attempt: state.attempt + 1,
            maxAttempts: retryCount,
            message: toErrorMessage(error)
          });
          state = afterFailedAttempt(state.attempt, retryCount, error);
        }
        break;
      }
      case "retrying": {
        metrics.recordRetry(item.storeName);
        const delayMs = backoffDelayMs(state.attempt, retryBaseDelayMs);
        logEvent("info", "collection.retry", { store: item.storeName, attempt: state.attempt + 1, delayMs });
        await clock.sleep(delayMs);
        state = { kind: "attempting", attempt: state.attempt + 1 };
        break;
      }
      case "succeeded": {
        const durationMs = clock.now() - startedAt;
        metrics.recordCollection(state.result, durationMs);
        submissions.enqueue(state.result);
        logEvent("info", "collection.completed", {
          store: item.storeName,
          attempts: state.attempt + 1,
          durationMs: Math.round(durationMs)
        });
        return { status: "succeeded", result: state.result, attempts: state.attempt + 1, durationMs };
      }
      case "exhausted": {
        metrics.recordExhausted(describeCollectionFailure(item, state.error), clock.now());
        logEvent("error", "collection.exhausted", {
          store: item.storeName,
          attempts: state.attempt + 1,
          message: toErrorMessage(state.error)
        });
        return { status: "failed", attempts: state.attempt + 1 };
      }
    }
  }
};

export type CollectionWorkerDeps = Omit<CollectStoreDeps, "context"> & {
  workerId: number;
  jobs: AsyncQueue<WorkItem>;
  governor: ConcurrencyGovernor;
  fetcher: StoreMetricsFetcher;
  session: PortalSession;
};

/**
 * Drains the job queue until it is empty. The worker's fetch context is
 * closed on every exit path; a crash ends this worker only.
 */
export const runCollectionWorker = async (deps: CollectionWorkerDeps): Promise<void> => {
  const { workerId, jobs, governor, fetcher, session, metrics } = deps;
  let context: FetchContext | undefined;
  let processed = 0;

  logEvent("info", "worker.started", { workerId });
  try {
    context = await fetcher.openContext(session, workerId);

    for (let item = jobs.tryDequeue(); item !== undefined; item = jobs.tryDequeue()) {
      const current = item;
      await governor.acquire();
      try {
        await collectStore(current, { ...deps, context });
        processed += 1;
      } catch (error) {
        metrics.recordFailure({ store: current.storeName, category: "Worker Crash", reason: toErrorMessage(error) });
        throw error;
      } finally {
        governor.release();
        jobs.taskDone();
      }
    }
  } catch (error) {
    logEvent("error", "worker.crashed", { workerId, processed, message: toErrorMessage(error) });
  } finally {
    if (context) {
      await context.close().catch((error: unknown) => {
        logEvent("warn", "worker.context_close_failed", { workerId, message: toErrorMessage(error) });
      });
    }
    logEvent("info", "worker.stopped", { workerId, processed });
  }
};
