import type { CollectionResult } from "../../core/stores/store.types";
import type { SubmissionSink, SubmitOutcome } from "../../ports/SubmissionSink";

/** Runs sinks in order; the first rejection stops the chain and is returned. */
export const chainSinks = (...sinks: SubmissionSink[]): SubmissionSink => ({
  async submit(result: CollectionResult): Promise<SubmitOutcome> {
    for (const sink of sinks) {
      const outcome = await sink.submit(result);
      if (!outcome.ok) return outcome;
    }
    return { ok: true };
  }
});
