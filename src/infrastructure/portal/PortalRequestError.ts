export class PortalRequestError extends Error {
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly sessionExpired: boolean;
  readonly aborted: boolean;
  readonly retryDelayMs?: number;
  readonly requestUrl: string;

  constructor(args: {
    message: string;
    requestUrl: string;
    status?: number;
    isTimeout?: boolean;
    sessionExpired?: boolean;
    aborted?: boolean;
    retryDelayMs?: number;
  }) {
    super(args.message);
    this.name = "PortalRequestError";
    this.status = args.status;
    this.isTimeout = args.isTimeout ?? false;
    this.sessionExpired = args.sessionExpired ?? false;
    this.aborted = args.aborted ?? false;
    this.retryDelayMs = args.retryDelayMs;
    this.requestUrl = args.requestUrl;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Retry decision for the client's own short retries; the worker retries independently. */
export const isTransientPortalError = (err: unknown): boolean | { retry: boolean; delayMs?: number } => {
  if (!(err instanceof PortalRequestError)) return true;
  if (err.aborted || err.sessionExpired) return false;
  if (err.isTimeout) return true;

  const status = err.status;
  if (status === 429) return { retry: true, delayMs: err.retryDelayMs };
  if (typeof status === "number" && status >= 500) return true;
  if (typeof status === "number") return false;
  return true;
};
