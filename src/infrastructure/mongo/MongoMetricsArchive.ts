import { MongoClient, type Collection } from "mongodb";
import type { ArchivedStoreMetrics, MetricsArchive } from "../../ports/MetricsArchive";
import { mongoIndexes } from "./mongo.indexes";

const archiveKey = (doc: Pick<ArchivedStoreMetrics, "storeId" | "runDate">): string => `${doc.storeId}|${doc.runDate}`;

/** Keeps the last document seen for each (storeId, runDate) inside one batch. */
export const dedupeByStoreAndDay = (docs: ArchivedStoreMetrics[]): ArchivedStoreMetrics[] => {
  const byKey = new Map<string, ArchivedStoreMetrics>();
  for (const doc of docs) {
    byKey.set(archiveKey(doc), doc);
  }
  return Array.from(byKey.values());
};

/**
 * Mongo archive of harvested metrics using bulk upsert by (storeId, runDate).
 */
export class MongoMetricsArchive implements MetricsArchive {
  private client?: MongoClient;
  private collection?: Collection<ArchivedStoreMetrics>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "store_metrics",
    private readonly collectionName = "daily_store_metrics"
  ) {}

  private async getCollection(): Promise<Collection<ArchivedStoreMetrics>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const db = this.client.db(this.dbName);
    const col = db.collection<ArchivedStoreMetrics>(this.collectionName);

    for (const idx of mongoIndexes.storeMetricsCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async upsertMany(docs: ArchivedStoreMetrics[]): Promise<{ upserted: number; modified: number }> {
    if (docs.length === 0) {
      return { upserted: 0, modified: 0 };
    }

    const col = await this.getCollection();
    const ops = dedupeByStoreAndDay(docs).map((doc) => ({
      updateOne: {
        filter: { storeId: doc.storeId, runDate: doc.runDate },
        update: {
          $setOnInsert: {
            _id: doc._id,
            storeId: doc.storeId,
            runDate: doc.runDate
          },
          $set: {
            storeName: doc.storeName,
            collectedAt: doc.collectedAt,
            metrics: doc.metrics
          }
        },
        upsert: true
      }
    }));

    const res = await col.bulkWrite(ops, { ordered: false });
    return {
      upserted: res.upsertedCount ?? 0,
      modified: res.modifiedCount ?? 0
    };
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
