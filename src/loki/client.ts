/**
 * Grafana Loki HTTP client (read-only).
 *
 * Features:
 * - query_range, labels and label values endpoints
 * - optional basic auth
 * - retry with exponential backoff on 429 / 5xx, 10s request timeout
 * - responses validated with zod before they reach ingestion
 * - sample-data mode backed by the seeded {@link SampleLogData} generator
 */
import { z } from "zod";
import { LogQueryError } from "../errors";
import type { SampleLogData } from "./sample-data";
import {
  LokiListResponseSchema,
  LokiQueryResponseSchema,
  type LogQueryBackend,
  type LokiListResponse,
  type LokiQueryResponse,
  type QueryDirection,
} from "./types";

export interface LokiClientOptions {
  endpoint: string;
  username?: string;
  password?: string;
  /** When set, every call is answered by the generator and no request is made. */
  sampleData?: SampleLogData;
  timeoutMs?: number;
  maxRetries?: number;
  /** Base delay for exponential backoff. */
  retryDelayMs?: number;
  fetchImpl?: typeof fetch;
}

export class LokiClient implements LogQueryBackend {
  private readonly baseUrl: string;
  private readonly authHeader?: string;
  private readonly sampleData?: SampleLogData;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: typeof fetch;

  public constructor(opts: LokiClientOptions) {
    this.baseUrl = opts.endpoint.replace(/\/+$/, "");
    if (opts.username && opts.password) {
      const token = Buffer.from(`${opts.username}:${opts.password}`, "utf8").toString("base64");
      this.authHeader = `Basic ${token}`;
    }
    this.sampleData = opts.sampleData;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.maxRetries = opts.maxRetries ?? 3;
    this.retryDelayMs = opts.retryDelayMs ?? 1000;
    this.fetchImpl = opts.fetchImpl ?? globalThis.fetch.bind(globalThis);
  }

  /** Whether calls are answered by the sample generator. */
  public get usesSampleData(): boolean {
    return this.sampleData !== undefined;
  }

  /**
   * Run a LogQL log query over `[start, end]` (Unix seconds).
   *
   * In sample mode, queries mentioning "anomaly" or "error" get the anomalous
   * sample set.
   */
  public async query(
    query: string,
    start: number,
    end: number,
    limit = 100,
    direction: QueryDirection = "backward",
  ): Promise<LokiQueryResponse> {
    if (this.sampleData) {
      return /anomaly|error/i.test(query)
        ? this.sampleData.generateAnomalousLogs(start, end, limit)
        : this.sampleData.generateLogs(start, end, limit);
    }
    const params = new URLSearchParams({
      query,
      start: String(start),
      end: String(end),
      limit: String(limit),
      direction,
    });
    return this.request(`/loki/api/v1/query_range?${params.toString()}`, LokiQueryResponseSchema);
  }

  public async labels(): Promise<LokiListResponse> {
    if (this.sampleData) return this.sampleData.labels();
    return this.request("/loki/api/v1/labels", LokiListResponseSchema);
  }

  public async labelValues(labelName: string): Promise<LokiListResponse> {
    if (this.sampleData) return this.sampleData.labelValues(labelName);
    return this.request(
      `/loki/api/v1/label/${encodeURIComponent(labelName)}/values`,
      LokiListResponseSchema,
    );
  }

  private async request<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.authHeader) headers.Authorization = this.authHeader;

    for (let attempt = 0; ; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
      let response: Response;
      try {
        response = await this.fetchImpl(url, { method: "GET", headers, signal: controller.signal });
      } catch (e) {
        if (attempt < this.maxRetries) {
          await this.backoff(attempt, path, e instanceof Error ? e.message : String(e));
          continue;
        }
        throw new LogQueryError(
          `Loki request failed: ${e instanceof Error ? e.message : String(e)}`,
        );
      } finally {
        clearTimeout(timeoutId);
      }

      const retryable = response.status === 429 || response.status >= 500;
      if (retryable && attempt < this.maxRetries) {
        await this.backoff(attempt, path, `HTTP ${response.status}`);
        continue;
      }

      const body = await response.text();
      if (!response.ok) {
        throw new LogQueryError(
          `Loki API error: ${response.status} ${response.statusText}`,
          response.status,
          body.length > 500 ? `${body.slice(0, 500)}...` : body,
        );
      }

      let json: unknown;
      try {
        json = JSON.parse(body);
      } catch {
        throw new LogQueryError("Loki response is not JSON", response.status);
      }
      const parsed = schema.safeParse(json);
      if (!parsed.success) {
        throw new LogQueryError(
          `Unexpected Loki response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`,
          response.status,
        );
      }
      return parsed.data;
    }
  }

  private async backoff(attempt: number, path: string, reason: string): Promise<void> {
    const waitMs = Math.min(this.retryDelayMs * 2 ** attempt, 10_000);
    console.error(`[Loki] ${reason} on ${path.split("?")[0]}; retry ${attempt + 1} in ${waitMs}ms`);
    await new Promise((resolve) => setTimeout(resolve, waitMs));
  }
}
