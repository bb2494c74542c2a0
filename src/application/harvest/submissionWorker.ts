import type { RunMetrics } from "../../core/run/RunMetrics";
import type { CollectionResult } from "../../core/stores/store.types";
import type { SubmissionListener, SubmissionSink } from "../../ports/SubmissionSink";
import type { AsyncQueue } from "../../shared/concurrency/asyncQueue";
import { logEvent, toErrorMessage } from "../../shared/logging/logEvent";
import type { Clock } from "../../shared/time/clock";

export type SubmissionWorkerDeps = {
  workerId: number;
  queue: AsyncQueue<CollectionResult>;
  sink: SubmissionSink;
  listeners: SubmissionListener[];
  metrics: RunMetrics;
  clock: Clock;
  now?: () => Date;
};

const notifyListeners = async (listeners: SubmissionListener[], result: CollectionResult): Promise<void> => {
  for (const listener of listeners) {
    try {
      await listener.onSubmitted(result);
    } catch (error) {
      logEvent("error", "submission.listener_failed", { store: result.storeName, message: toErrorMessage(error) });
    }
  }
};

export const submitOne = async (result: CollectionResult, deps: SubmissionWorkerDeps): Promise<boolean> => {
  const { workerId, sink, listeners, metrics, clock, now = () => new Date() } = deps;
  const startedAt = clock.now();
  try {
    const outcome = await sink.submit(result);
    if (!outcome.ok) {
      logEvent("error", "submission.failed", {
        workerId,
        store: result.storeName,
        status: outcome.status,
        detail: outcome.detail?.slice(0, 200)
      });
      metrics.recordFailure({ store: result.storeName, category: "HTTP Submit Fail", status: outcome.status });
      return false;
    }

    await notifyListeners(listeners, result);
    const durationMs = clock.now() - startedAt;
    metrics.recordSubmission(result, durationMs, now());
    logEvent("info", "submission.completed", { workerId, store: result.storeName, durationMs: Math.round(durationMs) });
    return true;
  } catch (error) {
    logEvent("error", "submission.exception", { workerId, store: result.storeName, message: toErrorMessage(error) });
    metrics.recordFailure({ store: result.storeName, category: "Submit Exception", reason: toErrorMessage(error) });
    return false;
  }
};

/**
 * Drains the submission queue until `signal` aborts. Callers join the queue
 * before aborting, so cancellation only interrupts an idle wait.
 */
export const runSubmissionWorker = async (deps: SubmissionWorkerDeps, signal: AbortSignal): Promise<void> => {
  const { workerId, queue } = deps;
  logEvent("info", "submitter.started", { workerId });

  for (let result = await queue.dequeue(signal); result !== undefined; result = await queue.dequeue(signal)) {
    try {
      await submitOne(result, deps);
    } finally {
      queue.taskDone();
    }
  }

  logEvent("info", "submitter.stopped", { workerId });
};
