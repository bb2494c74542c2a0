import http from "http";
import { URL } from "url";

/**
 * Local stand-in for the seller portal and the submission form.
 * - GET  /snowdash/api/summationMetrics?merchantIds[]=...  store totals
 * - GET  /snowdash/api/metrics?merchantIds[]=...           per-shopper rows with late-pick rates
 * - POST /form                                             accepts any urlencoded body
 *
 * Requests without the session cookie get 401. Accounts listed in
 * `failingAccounts` answer 500 for their first N requests.
 */
export type FakePortalOptions = {
  sessionCookie?: string;
  failingAccounts?: Record<string, number>;
  rejectForm?: boolean;
  /** Merchant names reported by the per-shopper listing, by account id. */
  storeNames?: Record<string, string>;
};

export type FakePortalState = {
  metricsRequests: number;
  formSubmissions: URLSearchParams[];
};

const hashAccount = (accountId: string): number =>
  Array.from(accountId).reduce((acc, ch) => (acc * 31 + ch.charCodeAt(0)) % 1000, 7);

export const makeSummationMetrics = (accountId: string) => {
  const seed = hashAccount(accountId);
  return {
    OrdersShopped_V2: 20 + (seed % 80),
    RequestedQuantity_V2: 400 + seed,
    PickedUnits_V2: 380 + seed,
    AverageUPH_V2: 60 + (seed % 50),
    ItemNotFoundRate_V2: (seed % 40) / 10,
    ItemFoundRate_V2: 100 - (seed % 40) / 10,
    ShortedUnits_V2: seed % 15,
    TimeAvailable_V2: (3 + (seed % 6)) * 3_600_000 + (seed % 60) * 60_000
  };
};

const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });

export const createFakePortalServer = (options: FakePortalOptions = {}) => {
  const sessionCookie = options.sessionCookie ?? "session-id=fake-session";
  const remainingFailures = new Map(Object.entries(options.failingAccounts ?? {}));
  const state: FakePortalState = { metricsRequests: 0, formSubmissions: [] };

  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (req.method === "POST" && url.pathname === "/form") {
      readBody(req)
        .then((body) => {
          state.formSubmissions.push(new URLSearchParams(body));
          res.writeHead(options.rejectForm ? 400 : 200, { "content-type": "text/html" });
          res.end(options.rejectForm ? "rejected" : "ok");
        })
        .catch(() => {
          res.writeHead(400);
          res.end();
        });
      return;
    }

    if (url.pathname !== "/snowdash/api/summationMetrics" && url.pathname !== "/snowdash/api/metrics") {
      res.writeHead(404);
      return res.end();
    }

    state.metricsRequests += 1;
    if (!(req.headers.cookie ?? "").includes(sessionCookie)) {
      res.writeHead(401, { "content-type": "application/json" });
      return res.end(JSON.stringify({ error: "unauthenticated" }));
    }

    const accountId = url.searchParams.get("merchantIds[]") ?? "";
    const failures = remainingFailures.get(accountId) ?? 0;
    if (failures > 0) {
      remainingFailures.set(accountId, failures - 1);
      res.writeHead(500, { "content-type": "application/json" });
      return res.end(JSON.stringify({ error: "unavailable" }));
    }

    res.writeHead(200, { "content-type": "application/json" });
    if (url.pathname === "/snowdash/api/metrics") {
      const storeName = options.storeNames?.[accountId] ?? accountId;
      return res.end(
        JSON.stringify([
          { type: "MASTER", merchantName: storeName, metrics: { LatePicksRate: (hashAccount(accountId) % 50) / 10 } }
        ])
      );
    }
    return res.end(JSON.stringify(makeSummationMetrics(accountId)));
  });

  return { server, state };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_PORTAL_PORT ?? 3999);
  const { server } = createFakePortalServer();
  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake portal server on http://localhost:${port}`);
  });
}
