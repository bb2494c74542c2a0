import http from "http";
import type { RunProgress } from "./core/run/RunMetrics";

/**
 * Read-only run status: `GET /` answers with the current progress.
 */
export const createStatusServer = (getProgress: () => RunProgress) => {
  return http.createServer((req, res) => {
    if (req.method !== "GET" || (req.url ?? "/").split("?")[0] !== "/") {
      res.writeHead(404, { "content-type": "application/json" });
      res.end(JSON.stringify({ ok: false, error: "not_found" }));
      return;
    }
    res.writeHead(200, { "content-type": "application/json" });
    res.end(JSON.stringify({ ok: true, progress: getProgress() }));
  });
};
