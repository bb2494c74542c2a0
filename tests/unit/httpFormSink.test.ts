import path from "node:path";
import { chainSinks } from "../../src/infrastructure/output/chainSinks";
import { loadFormFieldMap, parseFormFieldMap } from "../../src/infrastructure/forms/formFieldMap";
import { buildFormBody, HttpFormSink } from "../../src/infrastructure/forms/HttpFormSink";
import type { SubmissionSink } from "../../src/ports/SubmissionSink";
import { makeResult } from "../helpers/fixtures";
import { startServer } from "../helpers/testServer";

const fieldMap = parseFormFieldMap({
  store: "f.store",
  orders: "f.orders",
  units: "f.units",
  fulfilled: "f.fulfilled",
  uph: "f.uph",
  inf: "f.inf",
  found: "f.found",
  cancelled: "f.cancelled",
  lates: "f.lates",
  time_available: "f.time"
});

describe("form field map", () => {
  it("loads the bundled map", async () => {
    const map = await loadFormFieldMap(path.join(__dirname, "../../config/form-fields.json"));
    expect(map.store).toBe("entry.1000001");
    expect(map.time_available).toBe("entry.1000010");
  });

  it("rejects non-objects and names missing keys", () => {
    expect(() => parseFormFieldMap(["entry.1"], "fields.json")).toThrow("fields.json must be a JSON object");
    expect(() => parseFormFieldMap({ store: "entry.1", orders: " ", units: 3 })).toThrow(
      "form field map is missing form keys for: orders, units, fulfilled, uph, inf, found, cancelled, lates, time_available"
    );
  });
});

describe("buildFormBody", () => {
  it("encodes the record in field order", () => {
    const body = buildFormBody(makeResult("Leeds"), fieldMap);
    expect(body.toString()).toBe(
      "f.store=Leeds&f.orders=10&f.units=100&f.fulfilled=95&f.uph=90&f.inf=1.5+%25&f.found=98.5+%25&f.cancelled=2&f.lates=0.5+%25&f.time=6%3A30"
    );
  });
});

describe("HttpFormSink", () => {
  it("accepts a 200 and posts urlencoded fields", async () => {
    let body = "";
    let contentType = "";
    const server = await startServer((req, res) => {
      contentType = req.headers["content-type"] ?? "";
      req.on("data", (chunk: Buffer) => {
        body += chunk.toString("utf8");
      });
      req.on("end", () => {
        res.writeHead(200, { "content-type": "text/html" });
        res.end("thanks");
      });
    });

    const sink = new HttpFormSink(`${server.baseUrl}/form`, fieldMap);
    await expect(sink.submit(makeResult("Leeds"))).resolves.toEqual({ ok: true });

    expect(contentType).toBe("application/x-www-form-urlencoded");
    expect(new URLSearchParams(body).get("f.inf")).toBe("1.5 %");

    await server.close();
  });

  it("reports any other status with a trimmed body", async () => {
    const server = await startServer((_req, res) => {
      res.writeHead(400, { "content-type": "text/html" });
      res.end("x".repeat(250));
    });

    const sink = new HttpFormSink(server.baseUrl, fieldMap);
    await expect(sink.submit(makeResult("Leeds"))).resolves.toEqual({ ok: false, status: 400, detail: "x".repeat(200) });

    await server.close();
  });

  it("propagates network errors", async () => {
    const server = await startServer((_req, res) => res.end());
    const url = server.baseUrl;
    await server.close();

    await expect(new HttpFormSink(url, fieldMap).submit(makeResult("Leeds"))).rejects.toThrow();
  });
});

describe("chainSinks", () => {
  const sinkReturning = (outcome: Awaited<ReturnType<SubmissionSink["submit"]>>) => ({
    submit: jest.fn(async () => outcome)
  });

  it("runs every sink when all accept", async () => {
    const first = sinkReturning({ ok: true });
    const second = sinkReturning({ ok: true });

    await expect(chainSinks(first, second).submit(makeResult("Leeds"))).resolves.toEqual({ ok: true });
    expect(first.submit).toHaveBeenCalledTimes(1);
    expect(second.submit).toHaveBeenCalledTimes(1);
  });

  it("stops at the first rejection", async () => {
    const first = sinkReturning({ ok: false, status: 500, detail: "down" });
    const second = sinkReturning({ ok: true });

    await expect(chainSinks(first, second).submit(makeResult("Leeds"))).resolves.toEqual({
      ok: false,
      status: 500,
      detail: "down"
    });
    expect(second.submit).not.toHaveBeenCalled();
  });
});
