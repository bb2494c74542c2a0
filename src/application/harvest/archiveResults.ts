import { randomUUID } from "crypto";
import type { CollectionResult } from "../../core/stores/store.types";
import type { ArchivedStoreMetrics, MetricsArchive } from "../../ports/MetricsArchive";
import { logEvent } from "../../shared/logging/logEvent";

export const toArchivedMetrics = (
  result: CollectionResult,
  runDate: string,
  collectedAt: Date
): ArchivedStoreMetrics => {
  const { storeId, storeName, ...metrics } = result;
  return {
    _id: randomUUID(),
    storeId,
    storeName,
    runDate,
    collectedAt,
    metrics: { ...metrics }
  };
};

/** Archive step for a harvest: upserts every submitted result under the range's end day. */
export const createArchiveStep =
  (archive: MetricsArchive, runDate: string, now: () => Date = () => new Date()) =>
  async (results: CollectionResult[]): Promise<void> => {
    const collectedAt = now();
    const docs = results.map((result) => toArchivedMetrics(result, runDate, collectedAt));
    const { upserted, modified } = await archive.upsertMany(docs);
    logEvent("info", "archive.upserted", { runDate, documents: docs.length, upserted, modified });
  };
