import type { RunReport, RunReporter } from "../../ports/RunReporter";
import { logEvent, toErrorMessage } from "../../shared/logging/logEvent";

/** Fans a report out to every reporter; one failing reporter does not stop the rest. */
export class CompositeRunReporter implements RunReporter {
  private readonly reporters: RunReporter[];

  constructor(reporters: RunReporter[]) {
    this.reporters = reporters;
  }

  async summarize(report: RunReport): Promise<void> {
    const results = await Promise.allSettled(this.reporters.map((r) => r.summarize(report)));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        logEvent("error", "report.failed", { reporter: index, message: toErrorMessage(result.reason) });
      }
    });
  }
}
