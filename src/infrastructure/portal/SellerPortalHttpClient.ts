import type { DateRange } from "../../core/date/dateRange";
import type { CollectionResult, WorkItem } from "../../core/stores/store.types";
import { transformStoreMetrics } from "../../core/stores/transformStoreMetrics";
import type { PortalSession } from "../../ports/SessionProvider";
import type { FetchContext, StoreMetricsFetcher } from "../../ports/StoreMetricsFetcher";
import { logEvent, toErrorMessage } from "../../shared/logging/logEvent";
import { retry } from "../../shared/retry/retry";
import { extractLatePickRate } from "./lateRate";
import { isTransientPortalError, PortalRequestError } from "./PortalRequestError";

export const SUMMATION_METRICS_PATH = "/snowdash/api/summationMetrics";
export const DETAILED_METRICS_PATH = "/snowdash/api/metrics";

export type SellerPortalOptions = {
  baseUrl: string;
  dateRange: DateRange;
  timeoutMs?: number;
  includeLates?: boolean;
  /** Extra attempts per request for 429, 5xx, timeouts and network errors. */
  requestRetries?: number;
  retryMinDelayMs?: number;
  retryMaxDelayMs?: number;
};

export const buildMetricsUrl = (baseUrl: string, path: string, item: WorkItem, range: DateRange): URL => {
  const url = new URL(baseUrl);
  const prefix = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
  url.pathname = `${prefix}${path}`;

  url.searchParams.set("merchantIds[]", item.accountId);
  url.searchParams.set("mons_sel_mkid", item.marketplaceId);
  url.searchParams.set("startRange[year]", String(range.start.year));
  url.searchParams.set("startRange[month]", String(range.start.month));
  url.searchParams.set("startRange[day]", String(range.start.day));
  url.searchParams.set("startRange[hour]", String(range.start.hour));
  url.searchParams.set("endRange[year]", String(range.end.year));
  url.searchParams.set("endRange[month]", String(range.end.month));
  url.searchParams.set("endRange[day]", String(range.end.day));
  url.searchParams.set("endRange[hour]", String(range.end.hour));
  return url;
};

export const toCookieHeader = (session: PortalSession): string =>
  session.cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join("; ");

class SellerPortalContext implements FetchContext {
  private readonly lifetime = new AbortController();

  constructor(
    private readonly options: Required<SellerPortalOptions>,
    private readonly cookieHeader: string,
    private readonly workerId: number
  ) {}

  async fetchStoreMetrics(item: WorkItem): Promise<CollectionResult> {
    const url = buildMetricsUrl(this.options.baseUrl, SUMMATION_METRICS_PATH, item, this.options.dateRange);
    const payload = await this.getJsonWithRetry(url, item.storeName);
    const latePickRate = this.options.includeLates ? await this.fetchLatePickRate(item) : 0;
    return transformStoreMetrics(payload, item, latePickRate);
  }

  async close(): Promise<void> {
    this.lifetime.abort();
  }

  private async fetchLatePickRate(item: WorkItem): Promise<number> {
    const url = buildMetricsUrl(this.options.baseUrl, DETAILED_METRICS_PATH, item, this.options.dateRange);
    try {
      return extractLatePickRate(await this.getJson(url), item.storeName);
    } catch (error) {
      logEvent("warn", "portal.lates_unavailable", { store: item.storeName, message: toErrorMessage(error) });
      return 0;
    }
  }

  private getJsonWithRetry(url: URL, storeName: string): Promise<unknown> {
    const safeRequestUrl = `${url.origin}${url.pathname}`;
    return retry(() => this.getJson(url), {
      retries: this.options.requestRetries,
      minDelayMs: this.options.retryMinDelayMs,
      maxDelayMs: this.options.retryMaxDelayMs,
      shouldRetry: isTransientPortalError,
      onRetry: ({ attempt, maxAttempts, error }) => {
        logEvent("warn", "http.retry", {
          workerId: this.workerId,
          store: storeName,
          status: error instanceof PortalRequestError ? error.status ?? null : null,
          url: safeRequestUrl,
          attempt,
          maxAttempts
        });
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        logEvent("warn", "http.give_up", {
          workerId: this.workerId,
          store: storeName,
          status: error instanceof PortalRequestError ? error.status ?? null : null,
          url: safeRequestUrl,
          attempt,
          maxAttempts
        });
      }
    });
  }

  private async getJson(url: URL): Promise<unknown> {
    const safeRequestUrl = `${url.origin}${url.pathname}`;
    if (this.lifetime.signal.aborted) {
      throw new PortalRequestError({ message: "Portal context is closed", requestUrl: safeRequestUrl, aborted: true });
    }

    const controller = new AbortController();
    const onClose = () => controller.abort();
    this.lifetime.signal.addEventListener("abort", onClose, { once: true });
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let res: Response;
    try {
      res = await fetch(url.toString(), {
        headers: {
          accept: "application/json, text/javascript, */*; q=0.01",
          "x-requested-with": "XMLHttpRequest",
          cookie: this.cookieHeader
        },
        signal: controller.signal
      });
    } catch (err) {
      if (this.lifetime.signal.aborted) {
        throw new PortalRequestError({ message: "Portal context is closed", requestUrl: safeRequestUrl, aborted: true });
      }
      if (controller.signal.aborted) {
        throw new PortalRequestError({
          message: `Portal request timeout after ${this.options.timeoutMs}ms`,
          requestUrl: safeRequestUrl,
          isTimeout: true
        });
      }
      throw err;
    } finally {
      clearTimeout(timeout);
      this.lifetime.signal.removeEventListener("abort", onClose);
    }

    if (!res.ok) {
      await res.text().catch(() => "");
      const retryAfter = res.headers.get("retry-after");
      throw new PortalRequestError({
        message: `Portal request failed: ${res.status}`,
        requestUrl: safeRequestUrl,
        status: res.status,
        sessionExpired: res.status === 401 || res.status === 403,
        retryDelayMs: res.status === 429 && retryAfter && /^\d+$/.test(retryAfter) ? Number(retryAfter) * 1000 : undefined
      });
    }

    return res.json();
  }
}

/**
 * Portal metrics client over the JSON endpoints the dashboard itself calls.
 * Each worker gets its own context; closing it aborts that worker's requests.
 */
export class SellerPortalHttpClient implements StoreMetricsFetcher {
  private readonly options: Required<SellerPortalOptions>;

  constructor(options: SellerPortalOptions) {
    this.options = {
      timeoutMs: 15000,
      includeLates: false,
      requestRetries: 1,
      retryMinDelayMs: 250,
      retryMaxDelayMs: 5000,
      ...options
    };
  }

  async openContext(session: PortalSession, workerId: number): Promise<FetchContext> {
    return new SellerPortalContext(this.options, toCookieHeader(session), workerId);
  }
}
