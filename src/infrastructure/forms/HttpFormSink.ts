import type { CollectionResult } from "../../core/stores/store.types";
import { submissionFields } from "../../core/stores/store.types";
import { toSubmissionRecord } from "../../core/stores/transformStoreMetrics";
import type { SubmissionSink, SubmitOutcome } from "../../ports/SubmissionSink";
import type { FormFieldMap } from "./formFieldMap";

export const buildFormBody = (result: CollectionResult, fieldMap: FormFieldMap): URLSearchParams => {
  const record = toSubmissionRecord(result);
  const body = new URLSearchParams();
  for (const field of submissionFields) {
    body.set(fieldMap[field], record[field]);
  }
  return body;
};

/**
 * Posts each record as an urlencoded form. Only a 200 counts as accepted;
 * timeouts and network errors propagate to the submission worker.
 */
export class HttpFormSink implements SubmissionSink {
  constructor(
    private readonly postUrl: string,
    private readonly fieldMap: FormFieldMap,
    private readonly timeoutMs = 10000
  ) {}

  async submit(result: CollectionResult): Promise<SubmitOutcome> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await fetch(this.postUrl, {
        method: "POST",
        headers: { "content-type": "application/x-www-form-urlencoded" },
        body: buildFormBody(result, this.fieldMap).toString(),
        signal: controller.signal
      });
      const text = await res.text().catch(() => "");
      if (res.status === 200) return { ok: true };
      return { ok: false, status: res.status, detail: text.slice(0, 200) };
    } finally {
      clearTimeout(timeout);
    }
  }
}
