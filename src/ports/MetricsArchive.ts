export type ArchivedStoreMetrics = {
  _id: string;
  storeId: string;
  storeName: string;
  runDate: string;
  collectedAt: Date;
  metrics: Record<string, unknown>;
};

export interface MetricsArchive {
  upsertMany(docs: ArchivedStoreMetrics[]): Promise<{ upserted: number; modified: number }>;
  close(): Promise<void>;
}
