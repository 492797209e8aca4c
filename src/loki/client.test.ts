import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LogQueryError } from "../errors";
import { LokiClient } from "./client";
import { SampleLogData } from "./sample-data";

interface RecordedCall {
  url: URL;
  headers: Headers;
}

/** fetch stand-in answering with `responses` in turn (the last one repeats). */
function stubFetch(...responses: (() => Response)[]) {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: new URL(String(input)), headers: new Headers(init?.headers) });
    const next = responses[Math.min(calls.length - 1, responses.length - 1)];
    return next();
  };
  return { fetchImpl, calls };
}

const json = (body: unknown, status = 200) => () =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

const OK_STREAMS = {
  status: "success",
  data: {
    resultType: "streams",
    result: [{ stream: { app: "api" }, values: [["1709294400000000000", "hello"]] }],
  },
};

describe("LokiClient", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("calls query_range with the window and returns validated streams", async () => {
    const { fetchImpl, calls } = stubFetch(json(OK_STREAMS));
    const client = new LokiClient({ endpoint: "http://loki.test:3100/", fetchImpl });

    const res = await client.query('{app="api"}', 100, 200, 50);

    expect(res.data?.result[0].values).toEqual([["1709294400000000000", "hello"]]);
    expect(calls).toHaveLength(1);
    const { url } = calls[0];
    expect(`${url.origin}${url.pathname}`).toBe("http://loki.test:3100/loki/api/v1/query_range");
    expect(Object.fromEntries(url.searchParams)).toEqual({
      query: '{app="api"}',
      start: "100",
      end: "200",
      limit: "50",
      direction: "backward",
    });
    expect(calls[0].headers.get("authorization")).toBeNull();
  });

  it("sends basic auth when credentials are configured", async () => {
    const { fetchImpl, calls } = stubFetch(json({ status: "success", data: ["app"] }));
    const client = new LokiClient({
      endpoint: "http://loki.test:3100",
      username: "reader",
      password: "test-secret",
      fetchImpl,
    });

    expect(await client.labels()).toEqual({ status: "success", data: ["app"] });
    expect(calls[0].headers.get("authorization")).toBe(
      `Basic ${Buffer.from("reader:test-secret").toString("base64")}`,
    );
  });

  it("encodes label names in the values path", async () => {
    const { fetchImpl, calls } = stubFetch(json({ status: "success" }));
    const client = new LokiClient({ endpoint: "http://loki.test:3100", fetchImpl });

    expect(await client.labelValues("service name")).toEqual({ status: "success", data: [] });
    expect(calls[0].url.pathname).toBe("/loki/api/v1/label/service%20name/values");
  });

  it("fails fast on client errors with status and body", async () => {
    const { fetchImpl, calls } = stubFetch(() => new Response("parse error: bad selector", { status: 400 }));
    const client = new LokiClient({ endpoint: "http://loki.test:3100", fetchImpl, retryDelayMs: 1 });

    const err = await client.query("{", 0, 1).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(LogQueryError);
    expect(err).toMatchObject({ statusCode: 400, responseBody: "parse error: bad selector" });
    expect(calls).toHaveLength(1);
  });

  it("retries server errors and rate limits", async () => {
    const { fetchImpl, calls } = stubFetch(
      () => new Response("busy", { status: 503 }),
      () => new Response("slow down", { status: 429 }),
      json(OK_STREAMS),
    );
    const client = new LokiClient({ endpoint: "http://loki.test:3100", fetchImpl, retryDelayMs: 1 });

    const res = await client.query('{app="api"}', 0, 1);

    expect(res.status).toBe("success");
    expect(calls).toHaveLength(3);
  });

  it("gives up after the configured retries", async () => {
    const { fetchImpl, calls } = stubFetch(() => new Response("down", { status: 502 }));
    const client = new LokiClient({
      endpoint: "http://loki.test:3100",
      fetchImpl,
      retryDelayMs: 1,
      maxRetries: 2,
    });

    await expect(client.query('{app="api"}', 0, 1)).rejects.toMatchObject({ statusCode: 502 });
    expect(calls).toHaveLength(3);
  });

  it("retries network failures", async () => {
    let attempts = 0;
    const fetchImpl: typeof fetch = async () => {
      attempts++;
      if (attempts === 1) throw new TypeError("fetch failed");
      return json(OK_STREAMS)();
    };
    const client = new LokiClient({ endpoint: "http://loki.test:3100", fetchImpl, retryDelayMs: 1 });

    expect((await client.query('{app="api"}', 0, 1)).status).toBe("success");
    expect(attempts).toBe(2);
  });

  it("rejects responses of the wrong shape", async () => {
    const { fetchImpl } = stubFetch(
      json({ status: "success", data: { resultType: "matrix", result: [] } }),
      () => new Response("<html>", { status: 200 }),
    );
    const client = new LokiClient({ endpoint: "http://loki.test:3100", fetchImpl });

    await expect(client.query("{}", 0, 1)).rejects.toThrow("Unexpected Loki response shape");
    await expect(client.query("{}", 0, 1)).rejects.toThrow("not JSON");
  });

  it("answers from the sample generator without any request", async () => {
    const { fetchImpl, calls } = stubFetch(json(OK_STREAMS));
    const client = new LokiClient({
      endpoint: "http://loki.test:3100",
      sampleData: new SampleLogData(7),
      fetchImpl,
    });

    const start = 1709290800;
    const normal = await client.query('{app="api"}', start, start + 3599, 1000);
    const anomalies = await client.query('{app="api"} |= "error"', start, start + 3599, 1000);
    const labels = await client.labels();

    expect(client.usesSampleData).toBe(true);
    expect(calls).toHaveLength(0);
    expect(normal.data?.result[0].values.length).toBeGreaterThan(0);
    expect(
      anomalies.data?.result[0].values.some(([, line]) => line.includes("Failed login attempt")),
    ).toBe(true);
    expect(labels.data).toContain("app");
    expect((await client.labelValues("level")).data).toContain("error");
  });
});
