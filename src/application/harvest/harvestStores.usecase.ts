import { RunMetrics } from "../../core/run/RunMetrics";
import { buildRunSummary, type RunSummary } from "../../core/run/runSummary";
import type { CollectionResult, WorkItem } from "../../core/stores/store.types";
import type { JobSource } from "../../ports/JobSource";
import type { ResourceMonitor } from "../../ports/ResourceMonitor";
import type { RunReporter } from "../../ports/RunReporter";
import type { PortalSession, SessionProvider } from "../../ports/SessionProvider";
import type { StoreMetricsFetcher } from "../../ports/StoreMetricsFetcher";
import type { SubmissionListener, SubmissionSink } from "../../ports/SubmissionSink";
import { AsyncQueue } from "../../shared/concurrency/asyncQueue";
import { ConcurrencyGovernor } from "../../shared/concurrency/governor";
import { logEvent, toErrorMessage } from "../../shared/logging/logEvent";
import { systemClock, type Clock } from "../../shared/time/clock";
import { AutoConcurrencyController } from "./autoConcurrency.controller";
import { runCollectionWorker } from "./collectionWorker";
import type { HarvestConfigInput } from "./harvest.config";
import { resolveHarvestConfig } from "./harvest.config";
import { wrapJobSourceFailure, wrapSessionFailure } from "./harvest.error-handler";
import { runSubmissionWorker } from "./submissionWorker";

export type HarvestDeps = {
  jobSource: JobSource;
  sessions: SessionProvider;
  fetcher: StoreMetricsFetcher;
  sink: SubmissionSink;
  listeners?: SubmissionListener[];
  reporter: RunReporter;
  resources: ResourceMonitor;
  config: HarvestConfigInput;
  clock?: Clock;
  /** Shared with a status endpoint; a fresh instance is created when omitted. */
  metrics?: RunMetrics;
  /** Receives the submitted results before the summary is reported. */
  archive?: (results: CollectionResult[]) => Promise<void>;
};

export type HarvestOutcome = {
  summary: RunSummary;
  results: CollectionResult[];
  /** Final concurrency limit; differs from the initial one when auto-tuning moved it. */
  finalLimit: number;
};

const emptyOutcome = (): HarvestOutcome => ({
  summary: buildRunSummary({ total: 0, metrics: new RunMetrics().snapshot(), elapsedMs: 0 }),
  results: [],
  finalLimit: 0
});

export const orderJobs = (items: WorkItem[], prioritizeByPriorInf: boolean): WorkItem[] => {
  if (!prioritizeByPriorInf) return [...items];
  // stable: equal or missing rates keep source order
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => (b.item.priorInfRate ?? -1) - (a.item.priorInfRate ?? -1) || a.index - b.index)
    .map(({ item }) => item);
};

/**
 * Runs one harvest: load jobs, establish the session, drive the collection
 * pool under the governor, drain submissions, then report once.
 */
export const harvestStores = async (deps: HarvestDeps): Promise<HarvestOutcome> => {
  const { jobSource, sessions, fetcher, sink, reporter, resources } = deps;
  const listeners = deps.listeners ?? [];
  const clock = deps.clock ?? systemClock;
  const config = resolveHarvestConfig(deps.config);
  const metrics = deps.metrics ?? new RunMetrics({ failureHorizonMs: config.failureWindowSeconds * 1000 });

  let items: WorkItem[];
  try {
    items = orderJobs(await jobSource.loadJobs(), config.prioritizeByPriorInf);
  } catch (error) {
    const fatal = wrapJobSourceFailure(error);
    logEvent("error", "harvest.fatal", { code: fatal.code, message: fatal.message });
    throw fatal;
  }

  if (items.length === 0) {
    logEvent("warn", "harvest.no_jobs", {});
    return emptyOutcome();
  }

  let session: PortalSession;
  try {
    session = await sessions.ensureSession();
  } catch (error) {
    const fatal = wrapSessionFailure(error, items.length);
    logEvent("error", "harvest.fatal", { code: fatal.code, message: fatal.message, jobs: items.length });
    throw fatal;
  }

  const jobs = new AsyncQueue<WorkItem>();
  const submissions = new AsyncQueue<CollectionResult>();
  for (const item of items) jobs.enqueue(item);
  metrics.startRun(items.length);

  const governor = new ConcurrencyGovernor(config.initialConcurrency, {
    min: config.minConcurrency,
    max: config.maxConcurrency
  });
  const startedAt = clock.now();
  const poolSize = Math.min(config.workerPoolSize, items.length);
  logEvent("info", "harvest.started", {
    jobs: items.length,
    poolSize,
    initialConcurrency: config.initialConcurrency,
    submissionWorkers: config.numSubmissionWorkers,
    autoConcurrency: config.autoConcurrencyEnabled
  });

  const controllerAbort = new AbortController();
  const submitterAbort = new AbortController();
  const controllerTask = config.autoConcurrencyEnabled
    ? new AutoConcurrencyController({ governor, metrics, resources, clock, settings: config }).run(
        controllerAbort.signal
      )
    : Promise.resolve();

  const submitterTasks = Array.from({ length: config.numSubmissionWorkers }, (_, index) =>
    runSubmissionWorker(
      { workerId: index + 1, queue: submissions, sink, listeners, metrics, clock },
      submitterAbort.signal
    )
  );

  try {
    await Promise.all(
      Array.from({ length: poolSize }, (_, index) =>
        runCollectionWorker({
          workerId: index + 1,
          jobs,
          submissions,
          governor,
          fetcher,
          session,
          metrics,
          clock,
          retryCount: config.workerRetryCount,
          retryBaseDelayMs: config.retryBaseDelayMs
        })
      )
    );

    for (let left = jobs.tryDequeue(); left !== undefined; left = jobs.tryDequeue()) {
      metrics.recordFailure({ store: left.storeName, category: "Not Processed" });
      jobs.taskDone();
    }

    logEvent("info", "harvest.collection_finished", { pendingSubmissions: submissions.pending });
    await submissions.join();

    for (const listener of listeners) {
      try {
        await listener.flush();
      } catch (error) {
        logEvent("error", "harvest.flush_failed", { message: toErrorMessage(error) });
      }
    }
  } finally {
    controllerAbort.abort();
    submitterAbort.abort();
    submissions.close();
    await Promise.all([controllerTask, ...submitterTasks]);
  }

  const snapshot = metrics.snapshot();
  if (deps.archive) {
    try {
      await deps.archive(snapshot.submitted);
    } catch (error) {
      logEvent("error", "harvest.archive_failed", { message: toErrorMessage(error) });
    }
  }

  const summary = buildRunSummary({ total: items.length, metrics: snapshot, elapsedMs: clock.now() - startedAt });
  logEvent(summary.failures.length > 0 ? "warn" : "info", "harvest.completed", {
    succeeded: summary.succeeded,
    total: summary.total,
    failed: summary.failed,
    retries: summary.retries,
    elapsedMs: Math.round(summary.elapsedMs),
    finalLimit: governor.limit,
    failures: summary.failures
  });

  await reporter.summarize({ summary, results: snapshot.submitted });
  return { summary, results: snapshot.submitted, finalLimit: governor.limit };
};
