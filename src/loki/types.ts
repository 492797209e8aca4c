import { z } from "zod";

/** `[nanosecond timestamp, line]` as returned by query_range for log streams. */
export const LokiEntrySchema = z.tuple([z.string().regex(/^\d+$/), z.string()]);

export const LokiStreamSchema = z.object({
  stream: z.record(z.string()),
  values: z.array(LokiEntrySchema),
});

/** Response of `/loki/api/v1/query_range` for a log (streams) query. */
export const LokiQueryResponseSchema = z.object({
  status: z.string(),
  data: z
    .object({
      resultType: z.literal("streams"),
      result: z.array(LokiStreamSchema),
    })
    .optional(),
});

/** Response of `/loki/api/v1/labels` and `/loki/api/v1/label/<name>/values`. */
export const LokiListResponseSchema = z.object({
  status: z.string(),
  data: z.array(z.string()).default([]),
});

export type LokiEntry = z.infer<typeof LokiEntrySchema>;
export type LokiStream = z.infer<typeof LokiStreamSchema>;
export type LokiQueryResponse = z.infer<typeof LokiQueryResponseSchema>;
export type LokiListResponse = z.infer<typeof LokiListResponseSchema>;

export type QueryDirection = "forward" | "backward";

/** The read-only query shape ingestion needs from a log backend. */
export interface LogQueryBackend {
  /**
   * @param start Window start, Unix seconds.
   * @param end Window end, Unix seconds.
   */
  query(
    query: string,
    start: number,
    end: number,
    limit?: number,
    direction?: QueryDirection,
  ): Promise<LokiQueryResponse>;
}
