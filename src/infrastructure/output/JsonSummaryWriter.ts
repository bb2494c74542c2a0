import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { RunReport, RunReporter } from "../../ports/RunReporter";

export const RUN_SUMMARY_FILE = "run-summary.json";

/** Overwrites `run-summary.json` with the latest run's summary. */
export class JsonSummaryWriter implements RunReporter {
  constructor(private readonly outputDir: string) {}

  get filePath(): string {
    return path.join(this.outputDir, RUN_SUMMARY_FILE);
  }

  async summarize(report: RunReport): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
    const body = { summary: report.summary, stores: report.results.length };
    await writeFile(this.filePath, `${JSON.stringify(body, null, 2)}\n`, "utf8");
  }
}
