import type { FailureDescriptor } from "../../core/run/RunMetrics";
import type { WorkItem } from "../../core/stores/store.types";
import { toErrorMessage } from "../../shared/logging/logEvent";

export type HarvestFatalCode = "job_source_failed" | "session_unavailable" | "invalid_configuration";

/** Jobs loaded before the run was aborted, when any were. */
export type HarvestErrorContext = {
  jobs?: number;
};

export class HarvestFatalError extends Error {
  readonly code: HarvestFatalCode;
  readonly context: HarvestErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: HarvestFatalCode; message: string; context?: HarvestErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "HarvestFatalError";
    this.code = args.code;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The item can never be fetched as given; retrying would not help. */
export class InvalidWorkItemError extends Error {
  constructor(readonly item: WorkItem, message: string) {
    super(message);
    this.name = "InvalidWorkItemError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const unwrapCause = (reason: unknown): unknown =>
  reason instanceof Error ? reason.cause ?? reason : reason;

export const wrapJobSourceFailure = (reason: unknown): HarvestFatalError =>
  new HarvestFatalError({
    code: "job_source_failed",
    message: `Job source could not be loaded: ${toErrorMessage(reason)}`,
    cause: unwrapCause(reason)
  });

export const wrapSessionFailure = (reason: unknown, jobs: number): HarvestFatalError =>
  new HarvestFatalError({
    code: "session_unavailable",
    message: `No authenticated portal session: ${toErrorMessage(reason)}`,
    context: { jobs },
    cause: unwrapCause(reason)
  });

export const wrapConfigurationFailure = (reason: unknown): HarvestFatalError =>
  new HarvestFatalError({
    code: "invalid_configuration",
    message: toErrorMessage(reason),
    cause: reason
  });

/** Returns a failure for items that must not be attempted, or undefined. */
export const validateWorkItem = (item: WorkItem): InvalidWorkItemError | undefined => {
  if (item.marketplaceId.trim() === "") {
    return new InvalidWorkItemError(item, `marketplace id is missing for ${item.storeName}`);
  }
  return undefined;
};

export const describeCollectionFailure = (item: WorkItem, reason: unknown): FailureDescriptor => {
  if (reason instanceof InvalidWorkItemError) {
    return { store: item.storeName, category: "Missing MKID", reason: reason.message };
  }
  const status =
    typeof reason === "object" && reason !== null && "status" in reason && typeof reason.status === "number"
      ? reason.status
      : undefined;
  const message = toErrorMessage(reason);
  return {
    store: item.storeName,
    category: "Fail",
    reason: status !== undefined ? `HTTP ${status}: ${message}` : message
  };
};
