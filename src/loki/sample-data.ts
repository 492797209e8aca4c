import { compareNanos } from "./time";
import type { LokiEntry, LokiListResponse, LokiQueryResponse } from "./types";

const ACTIONS = [
  "User login successful",
  "Data processed successfully",
  "API request completed",
  "Database query executed",
  "Cache refreshed",
  "Configuration loaded",
  "File uploaded",
  "Email notification sent",
  "Background task completed",
  "Health check passed",
];
const USERS = ["user123", "admin", "service_account", "guest_user", "jane.roe"];
const COMPONENTS = ["AuthService", "DataProcessor", "ApiController", "DatabaseManager", "CacheService"];
const ERRORS = [
  "Connection timeout",
  "Database query failed",
  "Validation error",
  "Authentication failed",
  "Permission denied",
  "Resource not found",
  "Out of memory",
  "Unexpected exception",
];

const LABEL_VALUES: Record<string, string[]> = {
  app: ["log-rag-demo", "authentication-service", "payment-processor", "api-gateway", "frontend"],
  env: ["production", "staging", "development", "testing", "demo"],
  level: ["debug", "info", "warning", "error", "critical"],
  host: ["server-01", "server-02", "server-03", "worker-01", "worker-02"],
  namespace: ["default", "kube-system", "monitoring", "logging", "application"],
  service: ["api", "auth", "database", "cache", "worker", "scheduler"],
};

/** Labels of the single stream the generator emits. */
export const SAMPLE_STREAM_LABELS: Readonly<Record<string, string>> = {
  app: "log-rag-demo",
  env: "demo",
  level: "info",
};

/** mulberry32: small, fast, seedable 32-bit PRNG. */
function createRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

type Random = () => number;

/** Integer in [min, max). */
function nextInt(rand: Random, min: number, max: number): number {
  return min + Math.floor(rand() * (max - min));
}

function pick<T>(rand: Random, items: readonly T[]): T {
  return items[nextInt(rand, 0, items.length)];
}

function nanos(ms: number): string {
  return (BigInt(Math.floor(ms)) * 1_000_000n).toString();
}

/**
 * Deterministic stand-in for a Loki backend, used in development when no real
 * server is configured. Every UTC hour is generated from its own seed, so a
 * finished hour always yields the same lines no matter which window asks for
 * it; only the current hour grows between calls.
 */
export class SampleLogData {
  public constructor(private readonly seed: number) {}

  /**
   * Normal traffic (and ~20% errors when `includeErrors`) within
   * `[startSec, endSec]`, newest first, at most `limit` lines.
   */
  public generateLogs(
    startSec: number,
    endSec: number,
    limit: number,
    includeErrors = true,
  ): LokiQueryResponse {
    const values: LokiEntry[] = [];
    const firstHour = Math.floor(startSec / 3600);
    const lastHour = Math.floor(endSec / 3600);
    for (let hour = firstHour; hour <= lastHour; hour++) {
      const rand = createRandom(this.hourSeed(hour));
      let t = hour * 3600;
      for (;;) {
        t += nextInt(rand, 20, 91);
        if (t >= (hour + 1) * 3600) break;
        const line =
          includeErrors && rand() < 0.2 ? this.errorLine(rand) : this.normalLine(rand);
        if (t >= startSec && t <= endSec) values.push([nanos(t * 1000), line]);
      }
    }
    return this.toResponse(values, limit);
  }

  /**
   * Normal traffic plus a burst of failed logins, memory spikes and database
   * timeouts. The burst starts at the top of the hour holding `endSec` and is
   * fixed within it, so later calls in the same hour only add lines.
   */
  public generateAnomalousLogs(startSec: number, endSec: number, limit: number): LokiQueryResponse {
    const base = this.generateLogs(startSec, endSec, Number.MAX_SAFE_INTEGER);
    const values: LokiEntry[] = [...(base.data?.result[0]?.values ?? [])];
    const hour = Math.floor(endSec / 3600);
    const rand = createRandom(this.hourSeed(hour) ^ 0x5bd1e995);
    let t = hour * 3600;
    const push = (line: string) => {
      if (t >= startSec && t <= endSec) values.push([nanos(t * 1000), line]);
    };
    for (let i = 0; i < 5; i++) {
      t += nextInt(rand, 60, 400);
      const ip = [0, 0, 0, 0].map(() => nextInt(rand, 1, 255)).join(".");
      push(`WARNING: Failed login attempt from IP ${ip} for user admin`);
    }
    for (let i = 0; i < 3; i++) {
      t += nextInt(rand, 60, 300);
      push(`WARNING: Memory usage spike detected: ${nextInt(rand, 85, 99)}% used`);
    }
    for (let i = 0; i < 4; i++) {
      t += nextInt(rand, 30, 90);
      push(
        `ERROR: Database query timeout after ${nextInt(rand, 28, 35)}s for query 'SELECT * FROM large_table WHERE complex_condition'`,
      );
    }
    return this.toResponse(values, limit);
  }

  public labels(): LokiListResponse {
    return { status: "success", data: Object.keys(LABEL_VALUES) };
  }

  public labelValues(name: string): LokiListResponse {
    return { status: "success", data: LABEL_VALUES[name] ?? ["value1", "value2", "value3"] };
  }

  private hourSeed(hour: number): number {
    return (Math.imul(this.seed ^ 0x9e3779b9, 31) + hour) >>> 0;
  }

  private normalLine(rand: Random): string {
    const component = pick(rand, COMPONENTS);
    const action = pick(rand, ACTIONS);
    const user = pick(rand, USERS);
    return `${component} - ${action} for ${user} in ${nextInt(rand, 5, 1500)}ms`;
  }

  private errorLine(rand: Random): string {
    const component = pick(rand, COMPONENTS);
    let line = `ERROR in ${component}: ${pick(rand, ERRORS)} (Code: ${nextInt(rand, 400, 600)})`;
    if (nextInt(rand, 0, 3) === 0) {
      line +=
        `\nStack trace:\n  at ${component}.ProcessRequest() in ${component}.ts:line ${nextInt(rand, 50, 500)}` +
        `\n  at RequestHandler.execute() in RequestHandler.ts:line ${nextInt(rand, 20, 300)}`;
    }
    return line;
  }

  /** Newest first and truncated to `limit`, like a backward query. */
  private toResponse(values: LokiEntry[], limit: number): LokiQueryResponse {
    const sorted = [...values].sort((a, b) => compareNanos(b[0], a[0]));
    return {
      status: "success",
      data: {
        resultType: "streams",
        result: [
          { stream: { ...SAMPLE_STREAM_LABELS }, values: sorted.slice(0, Math.max(0, limit)) },
        ],
      },
    };
  }
}
