import type { DateRange } from "../../core/date/dateRange";
import type { CollectionResult } from "../../core/stores/store.types";
import type { RunReport, RunReporter } from "../../ports/RunReporter";
import type { SubmissionListener } from "../../ports/SubmissionSink";
import { logEvent, toErrorMessage } from "../../shared/logging/logEvent";
import { retry } from "../../shared/retry/retry";
import {
  buildBatchCard,
  buildHighlightsCard,
  buildJobSummaryCard,
  type ChatMessage,
  defaultThresholds,
  formatCardTimestamp,
  type MetricThresholds
} from "./chatCards";

type ChatPostError = Error & { status?: number };

export type ChatWebhookOptions = {
  webhookUrl: string;
  /** Highlights go here; defaults to `webhookUrl`. */
  performanceWebhookUrl?: string;
  batchSize: number;
  timeZone: string;
  dateRange?: DateRange;
  thresholds?: MetricThresholds;
  storePrefix?: string;
  timeoutMs?: number;
  retries?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Chat reporting for a run: submitted results are posted in fixed-size
 * batches as they arrive, the remainder on `flush()`, and the run summary
 * plus highlights at the end. Delivery failures are logged, never raised.
 */
export class ChatWebhookReporter implements SubmissionListener, RunReporter {
  private readonly pending: CollectionResult[] = [];
  private batchCount = 0;
  private readonly now: () => Date;

  constructor(private readonly options: ChatWebhookOptions) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new Error(`batchSize=${options.batchSize} is out of allowed range [1..${Number.MAX_SAFE_INTEGER}]`);
    }
    this.now = options.now ?? (() => new Date());
  }

  get bufferedCount(): number {
    return this.pending.length;
  }

  async onSubmitted(result: CollectionResult): Promise<void> {
    this.pending.push(result);
    if (this.pending.length < this.options.batchSize) return;
    const batch = this.pending.splice(0, this.options.batchSize);
    await this.postBatch(batch);
  }

  async flush(): Promise<void> {
    if (this.pending.length === 0) return;
    const batch = this.pending.splice(0, this.pending.length);
    await this.postBatch(batch);
  }

  async summarize(report: RunReport): Promise<void> {
    const stamp = this.now();
    const subtitle = formatCardTimestamp(stamp, this.options.timeZone);
    await this.post(
      "summary",
      this.options.webhookUrl,
      buildJobSummaryCard(report.summary, subtitle, `job-summary-${stamp.getTime()}`)
    );

    const highlights = buildHighlightsCard(
      report.results,
      "Stores requiring attention",
      `perf-high-${stamp.getTime()}`,
      this.options.storePrefix
    );
    if (highlights) {
      await this.post("highlights", this.options.performanceWebhookUrl ?? this.options.webhookUrl, highlights);
    }
  }

  private async postBatch(batch: CollectionResult[]): Promise<void> {
    this.batchCount += 1;
    let subtitle = formatCardTimestamp(this.now(), this.options.timeZone);
    if (this.options.dateRange) {
      subtitle += ` • ${this.options.dateRange.label.start} - ${this.options.dateRange.label.end}`;
    }

    const card = buildBatchCard({
      results: batch,
      batchNumber: this.batchCount,
      subtitle,
      thresholds: this.options.thresholds ?? defaultThresholds,
      storePrefix: this.options.storePrefix
    });
    if (!card) {
      logEvent("info", "chat.batch_skipped", { batch: this.batchCount, stores: batch.length });
      return;
    }
    await this.post("batch", this.options.webhookUrl, card);
  }

  private async post(kind: string, url: string, message: ChatMessage): Promise<void> {
    try {
      await retry(() => this.send(url, message), {
        retries: this.options.retries ?? 2,
        minDelayMs: 500,
        maxDelayMs: 5000,
        sleep: this.options.sleep,
        shouldRetry: (err) => {
          if (err instanceof Error && "status" in err && typeof err.status === "number") {
            return err.status === 429 || err.status >= 500;
          }
          return true;
        }
      });
      logEvent("info", "chat.posted", { kind });
    } catch (error) {
      logEvent("error", "chat.post_failed", { kind, message: toErrorMessage(error) });
    }
  }

  private async send(url: string, message: ChatMessage): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs ?? 30000);
    try {
      const res = await fetch(url, {
        method: "POST",
        headers: { "content-type": "application/json; charset=UTF-8" },
        body: JSON.stringify(message),
        signal: controller.signal
      });
      const text = await res.text().catch(() => "");
      if (res.status !== 200) {
        const err: ChatPostError = new Error(`Chat webhook responded ${res.status}: ${text.slice(0, 200)}`);
        err.status = res.status;
        throw err;
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}
