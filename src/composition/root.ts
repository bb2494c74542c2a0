import type { Server } from "http";
import { createArchiveStep } from "../application/harvest/archiveResults";
import { wrapConfigurationFailure } from "../application/harvest/harvest.error-handler";
import { harvestStores, type HarvestOutcome } from "../application/harvest/harvestStores.usecase";
import { rangeEndDay, resolveDateRange } from "../core/date/dateRange";
import { RunMetrics, type RunProgress } from "../core/run/RunMetrics";
import { ChatWebhookReporter } from "../infrastructure/chat/ChatWebhookReporter";
import { loadFormFieldMap } from "../infrastructure/forms/formFieldMap";
import { HttpFormSink } from "../infrastructure/forms/HttpFormSink";
import { MongoMetricsArchive } from "../infrastructure/mongo/MongoMetricsArchive";
import { chainSinks } from "../infrastructure/output/chainSinks";
import { CompositeRunReporter } from "../infrastructure/output/CompositeRunReporter";
import { JsonSummaryWriter } from "../infrastructure/output/JsonSummaryWriter";
import { SubmissionLogWriter } from "../infrastructure/output/SubmissionLogWriter";
import { SellerPortalHttpClient } from "../infrastructure/portal/SellerPortalHttpClient";
import { StorageStateSessionProvider } from "../infrastructure/portal/StorageStateSessionProvider";
import { CsvStoreListSource } from "../infrastructure/stores/CsvStoreListSource";
import { OsResourceMonitor } from "../infrastructure/system/OsResourceMonitor";
import type { RunReporter } from "../ports/RunReporter";
import type { SubmissionListener, SubmissionSink } from "../ports/SubmissionSink";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { logEvent, toErrorMessage } from "../shared/logging/logEvent";
import { createStatusServer } from "../server";

const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));

const listen = (server: Server, port: number): Promise<void> =>
  new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });

const startStatusServer = async (port: number, getProgress: () => RunProgress): Promise<Server> => {
  const server = createStatusServer(getProgress);
  try {
    await listen(server, port);
  } catch (error) {
    const fatal = wrapConfigurationFailure(new Error(`STATUS_PORT=${port} is unavailable: ${toErrorMessage(error)}`));
    logEvent("error", "harvest.fatal", { code: fatal.code, message: fatal.message });
    throw fatal;
  }
  const address = server.address();
  logEvent("info", "status.listening", {
    port: address !== null && typeof address === "object" ? address.port : port
  });
  return server;
};

const loadConfiguration = (envSource: NodeJS.ProcessEnv) => {
  try {
    const env = loadEnv(envSource);
    const runtime = loadRuntimeConfigFromEnv(envSource);
    const dateRange = resolveDateRange({
      mode: runtime.dateMode,
      timeZone: env.HARVEST_TIMEZONE,
      customStart: runtime.customStart,
      customEnd: runtime.customEnd
    });
    return { env, runtime, dateRange };
  } catch (error) {
    const fatal = wrapConfigurationFailure(error);
    logEvent("error", "harvest.fatal", { code: fatal.code, message: fatal.message });
    throw fatal;
  }
};

export const runHarvest = async (envSource: NodeJS.ProcessEnv = process.env): Promise<HarvestOutcome> => {
  const { env, runtime, dateRange } = loadConfiguration(envSource);

  const logWriter = new SubmissionLogWriter(env.OUTPUT_DIR, env.HARVEST_TIMEZONE);
  let sink: SubmissionSink = logWriter;
  if (env.FORM_POST_URL) {
    const fieldMap = await loadFormFieldMap(env.FORM_FIELD_MAP_FILE);
    sink = chainSinks(new HttpFormSink(env.FORM_POST_URL, fieldMap), logWriter);
  } else {
    logEvent("warn", "harvest.form_disabled", { reason: "FORM_POST_URL is not set" });
  }

  const listeners: SubmissionListener[] = [];
  const reporters: RunReporter[] = [new JsonSummaryWriter(env.OUTPUT_DIR)];
  if (env.CHAT_WEBHOOK_URL) {
    const chat = new ChatWebhookReporter({
      webhookUrl: env.CHAT_WEBHOOK_URL,
      performanceWebhookUrl: env.PERFORMANCE_WEBHOOK_URL,
      batchSize: runtime.chatBatchSize,
      timeZone: env.HARVEST_TIMEZONE,
      dateRange,
      storePrefix: env.CHAT_STORE_PREFIX
    });
    listeners.push(chat);
    reporters.push(chat);
  }

  const metrics = new RunMetrics({ failureHorizonMs: runtime.harvestConfig.failureWindowSeconds * 1000 });
  const archive = env.MONGO_URI ? new MongoMetricsArchive(env.MONGO_URI) : undefined;

  let statusServer: Server | undefined;
  try {
    if (env.STATUS_PORT !== undefined) {
      statusServer = await startStatusServer(env.STATUS_PORT, () => metrics.currentProgress());
    }

    return await harvestStores({
      jobSource: new CsvStoreListSource(env.STORES_FILE),
      sessions: new StorageStateSessionProvider(env.SESSION_STATE_FILE, env.PORTAL_BASE_URL),
      fetcher: new SellerPortalHttpClient({
        baseUrl: env.PORTAL_BASE_URL,
        dateRange,
        timeoutMs: runtime.timeoutMs,
        includeLates: runtime.includeLates
      }),
      sink,
      listeners,
      reporter: new CompositeRunReporter(reporters),
      resources: new OsResourceMonitor(),
      config: runtime.harvestConfig,
      metrics,
      archive: archive ? createArchiveStep(archive, rangeEndDay(dateRange)) : undefined
    });
  } finally {
    await archive?.close();
    if (statusServer) await closeServer(statusServer);
  }
};
