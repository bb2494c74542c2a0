import type { WorkItem } from "../core/stores/store.types";

export interface JobSource {
  /** Throws when the source is missing or malformed; an empty list means nothing to do. */
  loadJobs(): Promise<WorkItem[]>;
}
