import http from "http";
import type { AddressInfo } from "net";

describe("composition root", () => {
  const baseEnv = {
    PORTAL_BASE_URL: "http://127.0.0.1:3999",
    HARVEST_TIMEZONE: "UTC"
  };

  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.resetModules();
    jest.restoreAllMocks();
  });

  const outcome = { summary: {}, results: [], finalLimit: 4 };

  it("wires the form, log, chat and archive adapters from env", async () => {
    const harvestStores = jest.fn().mockResolvedValue(outcome);
    jest.doMock("../../src/application/harvest/harvestStores.usecase", () => ({ harvestStores }));

    const { runHarvest } = await import("../../src/composition/root");
    await expect(
      runHarvest({
        ...baseEnv,
        FORM_POST_URL: "http://127.0.0.1:3999/form",
        CHAT_WEBHOOK_URL: "http://127.0.0.1:3999/chat",
        MONGO_URI: "mongodb://localhost:27017/store_metrics",
        HARVEST_INITIAL_CONCURRENCY: "4",
        HARVEST_SUBMISSION_WORKERS: "3"
      })
    ).resolves.toBe(outcome);

    const { SubmissionLogWriter } = await import("../../src/infrastructure/output/SubmissionLogWriter");
    const { ChatWebhookReporter } = await import("../../src/infrastructure/chat/ChatWebhookReporter");
    const { SellerPortalHttpClient } = await import("../../src/infrastructure/portal/SellerPortalHttpClient");

    expect(harvestStores).toHaveBeenCalledTimes(1);
    const deps = harvestStores.mock.calls[0][0];
    expect(deps.config).toMatchObject({ initialConcurrency: 4, maxConcurrency: 4, numSubmissionWorkers: 3 });
    expect(deps.fetcher).toBeInstanceOf(SellerPortalHttpClient);
    expect(deps.sink).not.toBeInstanceOf(SubmissionLogWriter);
    expect(deps.listeners).toHaveLength(1);
    expect(deps.listeners[0]).toBeInstanceOf(ChatWebhookReporter);
    expect(typeof deps.archive).toBe("function");
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("falls back to the submission log when no form URL is set", async () => {
    const harvestStores = jest.fn().mockResolvedValue(outcome);
    jest.doMock("../../src/application/harvest/harvestStores.usecase", () => ({ harvestStores }));

    const { runHarvest } = await import("../../src/composition/root");
    await runHarvest(baseEnv);

    const { SubmissionLogWriter } = await import("../../src/infrastructure/output/SubmissionLogWriter");
    const deps = harvestStores.mock.calls[0][0];
    expect(deps.sink).toBeInstanceOf(SubmissionLogWriter);
    expect(deps.listeners).toEqual([]);
    expect(deps.archive).toBeUndefined();
    expect(JSON.parse(String(warnSpy.mock.calls[0][0]))).toEqual({
      event: "harvest.form_disabled",
      reason: "FORM_POST_URL is not set"
    });
  });

  it("closes the archive when the harvest fails", async () => {
    const close = jest.fn().mockResolvedValue(undefined);
    const archiveCtor = jest.fn().mockImplementation(() => ({ close, upsertMany: jest.fn() }));
    const harvestStores = jest.fn().mockRejectedValue(new Error("harvest failed"));
    jest.doMock("../../src/application/harvest/harvestStores.usecase", () => ({ harvestStores }));
    jest.doMock("../../src/infrastructure/mongo/MongoMetricsArchive", () => ({ MongoMetricsArchive: archiveCtor }));

    const { runHarvest } = await import("../../src/composition/root");
    await expect(runHarvest({ ...baseEnv, MONGO_URI: "mongodb://localhost:27017/store_metrics" })).rejects.toThrow(
      "harvest failed"
    );

    expect(archiveCtor).toHaveBeenCalledWith("mongodb://localhost:27017/store_metrics");
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("serves run progress while the harvest runs and stops afterwards", async () => {
    let progress: unknown;
    let port = 0;
    const harvestStores = jest.fn().mockImplementation(async (deps: { metrics: { startRun: (n: number) => void } }) => {
      deps.metrics.startRun(7);
      const listening = logSpy.mock.calls
        .map((call) => JSON.parse(String(call[0])))
        .find((entry) => entry.event === "status.listening");
      port = listening.port;
      const res = await fetch(`http://127.0.0.1:${port}/`);
      progress = await res.json();
      return outcome;
    });
    jest.doMock("../../src/application/harvest/harvestStores.usecase", () => ({ harvestStores }));

    const { runHarvest } = await import("../../src/composition/root");
    await runHarvest({ ...baseEnv, STATUS_PORT: "0" });

    expect(port).toBeGreaterThan(0);
    expect(progress).toEqual({ ok: true, progress: { current: 0, total: 7, lastUpdate: "N/A" } });
    await expect(fetch(`http://127.0.0.1:${port}/`)).rejects.toThrow();
  });

  it("fails with a configuration error when the status port is taken", async () => {
    const blocker = http.createServer();
    await new Promise<void>((resolve) => blocker.listen(0, resolve));
    const { port } = blocker.address() as AddressInfo;

    const close = jest.fn().mockResolvedValue(undefined);
    const harvestStores = jest.fn();
    jest.doMock("../../src/application/harvest/harvestStores.usecase", () => ({ harvestStores }));
    jest.doMock("../../src/infrastructure/mongo/MongoMetricsArchive", () => ({
      MongoMetricsArchive: jest.fn().mockImplementation(() => ({ close, upsertMany: jest.fn() }))
    }));

    try {
      const { runHarvest } = await import("../../src/composition/root");
      await expect(
        runHarvest({ ...baseEnv, STATUS_PORT: String(port), MONGO_URI: "mongodb://localhost:27017/store_metrics" })
      ).rejects.toMatchObject({
        name: "HarvestFatalError",
        code: "invalid_configuration",
        message: expect.stringMatching(new RegExp(`^STATUS_PORT=${port} is unavailable: listen EADDRINUSE`))
      });
    } finally {
      await new Promise<void>((resolve) => blocker.close(() => resolve()));
    }

    expect(harvestStores).not.toHaveBeenCalled();
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("fails fast when runtime caps are violated", async () => {
    const harvestStores = jest.fn();
    jest.doMock("../../src/application/harvest/harvestStores.usecase", () => ({ harvestStores }));

    const { runHarvest } = await import("../../src/composition/root");
    await expect(runHarvest({ ...baseEnv, HARVEST_INITIAL_CONCURRENCY: "999" })).rejects.toMatchObject({
      name: "HarvestFatalError",
      code: "invalid_configuration",
      message: "HARVEST_INITIAL_CONCURRENCY=999 is out of allowed range [1..200]"
    });
    expect(harvestStores).not.toHaveBeenCalled();
  });

  it("requires both dates in custom mode", async () => {
    jest.doMock("../../src/application/harvest/harvestStores.usecase", () => ({ harvestStores: jest.fn() }));

    const { runHarvest } = await import("../../src/composition/root");
    await expect(runHarvest({ ...baseEnv, HARVEST_DATE_MODE: "custom", HARVEST_START_DATE: "2026-02-01" })).rejects.toThrow(
      "HARVEST_START_DATE and HARVEST_END_DATE are required when HARVEST_DATE_MODE=custom"
    );
  });
});
