import type { RunSummary } from "../core/run/runSummary";
import type { CollectionResult } from "../core/stores/store.types";

export type RunReport = {
  summary: RunSummary;
  results: CollectionResult[];
};

export interface RunReporter {
  summarize(report: RunReport): Promise<void>;
}
