import { appendFile, mkdir, stat } from "node:fs/promises";
import path from "node:path";
import Papa from "papaparse";
import type { CollectionResult } from "../../core/stores/store.types";
import { submissionFields } from "../../core/stores/store.types";
import { toSubmissionRecord } from "../../core/stores/transformStoreMetrics";
import type { SubmissionSink, SubmitOutcome } from "../../ports/SubmissionSink";
import { logEvent, toErrorMessage } from "../../shared/logging/logEvent";

export const SUBMISSION_LOG_FILE = "submissions.log";
export const SUBMISSION_JSON_LOG_FILE = "submissions.jsonl";

const logColumns = ["timestamp", ...submissionFields];

/** `YYYY-MM-DD HH:mm:ss` in the given time zone. */
export const formatLocalTimestamp = (at: Date, timeZone: string): string => {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23"
  }).formatToParts(at);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "00";
  return `${get("year")}-${get("month")}-${get("day")} ${get("hour")}:${get("minute")}:${get("second")}`;
};

const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
};

/**
 * Append-only record of every accepted submission, as CSV and as JSON lines.
 * Appends are serialized so rows never interleave. A failed write is logged
 * and does not reject the submission, which the form already accepted.
 */
export class SubmissionLogWriter implements SubmissionSink {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly outputDir: string,
    private readonly timeZone: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  get csvPath(): string {
    return path.join(this.outputDir, SUBMISSION_LOG_FILE);
  }

  get jsonPath(): string {
    return path.join(this.outputDir, SUBMISSION_JSON_LOG_FILE);
  }

  submit(result: CollectionResult): Promise<SubmitOutcome> {
    const write = this.tail.then(() => this.append(result));
    this.tail = write;
    return write.then(() => ({ ok: true }));
  }

  private async append(result: CollectionResult): Promise<void> {
    const entry = { timestamp: formatLocalTimestamp(this.now(), this.timeZone), ...toSubmissionRecord(result) };
    try {
      await mkdir(this.outputDir, { recursive: true });
    } catch (error) {
      logEvent("error", "submission_log.write_failed", { file: this.outputDir, message: toErrorMessage(error) });
      return;
    }

    try {
      const isNew = !(await fileExists(this.csvPath));
      const csv = Papa.unparse([entry], { columns: logColumns, header: isNew, newline: "\n" });
      await appendFile(this.csvPath, `${csv}\n`, "utf8");
    } catch (error) {
      logEvent("error", "submission_log.write_failed", { file: this.csvPath, message: toErrorMessage(error) });
    }

    try {
      await appendFile(this.jsonPath, `${JSON.stringify(entry)}\n`, "utf8");
    } catch (error) {
      logEvent("error", "submission_log.write_failed", { file: this.jsonPath, message: toErrorMessage(error) });
    }
  }
}
