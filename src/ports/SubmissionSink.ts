import type { CollectionResult } from "../core/stores/store.types";

export type SubmitOutcome =
  | { ok: true }
  | { ok: false; status: number; detail?: string };

export interface SubmissionSink {
  submit(result: CollectionResult): Promise<SubmitOutcome>;
}

/**
 * Receives every successfully submitted result. `flush` is called once after
 * the submission queue drained, before the run summary.
 */
export interface SubmissionListener {
  onSubmitted(result: CollectionResult): Promise<void>;
  flush(): Promise<void>;
}
