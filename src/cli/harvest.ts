#!/usr/bin/env node
import { HarvestFatalError, type HarvestFatalCode } from "../application/harvest/harvest.error-handler";
import { runHarvest } from "../composition/root";
import { toErrorMessage } from "../shared/logging/logEvent";

export type HarvestFailureCode = HarvestFatalCode | "unexpected";

/** What the operator sees on stderr; causes never leave the process. */
export type HarvestFailureReport = {
  event: "harvest.failed";
  code: HarvestFailureCode;
  message: string;
  hint?: string;
  jobs?: number;
  stack?: string;
};

const hints: Record<HarvestFatalCode, string> = {
  invalid_configuration: "check the HARVEST_*, PORTAL_* and STATUS_PORT settings",
  job_source_failed: "check that STORES_FILE points at a readable store list",
  session_unavailable: "refresh the saved portal session in SESSION_STATE_FILE"
};

// Configuration mistakes are usage errors; everything else is a failed run.
export const exitCodeFor = (code: HarvestFailureCode): number => (code === "invalid_configuration" ? 2 : 1);

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const describeHarvestFailure = (err: unknown, includeStack: boolean): HarvestFailureReport => {
  const report: HarvestFailureReport =
    err instanceof HarvestFatalError
      ? { event: "harvest.failed", code: err.code, message: err.message, hint: hints[err.code] }
      : { event: "harvest.failed", code: "unexpected", message: toErrorMessage(err) };

  if (err instanceof HarvestFatalError && err.context.jobs !== undefined) {
    report.jobs = err.context.jobs;
  }
  if (includeStack && err instanceof Error && err.stack) {
    report.stack = err.stack;
  }
  return report;
};

export const executeHarvestCli = async (): Promise<void> => {
  try {
    await runHarvest();
  } catch (err) {
    const report = describeHarvestFailure(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(report));
    process.exit(exitCodeFor(report.code));
  }
};

if (require.main === module) {
  void executeHarvestCli();
}
