import type { CollectionResult, WorkItem } from "../core/stores/store.types";
import type { PortalSession } from "./SessionProvider";

/**
 * A session context owned by exactly one collection worker.
 */
export interface FetchContext {
  fetchStoreMetrics(item: WorkItem): Promise<CollectionResult>;
  close(): Promise<void>;
}

export interface StoreMetricsFetcher {
  openContext(session: PortalSession, workerId: number): Promise<FetchContext>;
}
