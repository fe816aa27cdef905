import { formatTimestamp } from "@credscope/core";
import type { CallRecord, SubscriptionInfo, TimeWindow } from "@credscope/core";
import type { Breakdown, CallSummary } from "@credscope/usage";
import type { CharacterStats, UsageAnalyticsResult } from "@credscope/provider";

/**
 * The JSON document written to disk. Keys are snake_case; `records` is
 * absent (not empty) in summary-only reports.
 */
export interface ReportDocument {
  query_info: QueryInfoJson;
  subscription_info: Record<string, unknown>;
  summary: SummaryJson;
  usage_analytics: UsageAnalyticsJson;
  records?: Record<string, unknown>[];
}

export interface QueryInfoJson {
  start_timestamp: number;
  end_timestamp: number;
  start_timestamp_ms: number;
  end_timestamp_ms: number;
  start_time_formatted: string;
  end_time_formatted: string;
  generated_at: string;
}

export interface SummaryJson {
  total_api_calls: number;
  total_credits_used: number;
  breakdown_by_type: Breakdown;
  breakdown_by_voice: Breakdown;
  breakdown_by_source: Breakdown;
  breakdown_by_day?: Breakdown;
  time_range: {
    earliest_call: string | null;
    latest_call: string | null;
  };
}

export type UsageAnalyticsJson =
  | { usage_analytics: CharacterStats; fetched_at: string }
  | { error: string };

export interface QueryInfo {
  /** Timestamps exactly as the user passed them (seconds or milliseconds) */
  startInput: number;
  endInput: number;
  window: TimeWindow;
  generatedAtMs: number;
}

export interface ReportInput {
  query: QueryInfo;
  subscription: SubscriptionInfo;
  summary: CallSummary;
  analytics: UsageAnalyticsResult;
  records: readonly CallRecord[];
  summaryOnly?: boolean;
}

export function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

/**
 * Copy an object with snake_case keys. Values under the `nested` keys are
 * converted one level down as well; everything else is kept as-is.
 */
export function snakeCaseKeys(
  obj: object,
  nested: readonly string[] = [],
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const converted =
      nested.includes(key) && value !== null && typeof value === "object"
        ? snakeCaseKeys(value)
        : value;
    out[toSnakeCase(key)] = converted;
  }
  return out;
}

export function queryInfoToJson(query: QueryInfo): QueryInfoJson {
  return {
    start_timestamp: query.startInput,
    end_timestamp: query.endInput,
    start_timestamp_ms: query.window.startMs,
    end_timestamp_ms: query.window.endMs,
    start_time_formatted: formatTimestamp(query.window.startMs),
    end_time_formatted: formatTimestamp(query.window.endMs),
    generated_at: formatTimestamp(query.generatedAtMs),
  };
}

export function summaryToJson(summary: CallSummary): SummaryJson {
  const json: SummaryJson = {
    total_api_calls: summary.totalApiCalls,
    total_credits_used: summary.totalCreditsUsed,
    breakdown_by_type: summary.byType,
    breakdown_by_voice: summary.byVoice,
    breakdown_by_source: summary.bySource,
    time_range: {
      earliest_call: summary.timeRange.earliestCall,
      latest_call: summary.timeRange.latestCall,
    },
  };
  if (summary.byDay) json.breakdown_by_day = summary.byDay;
  return json;
}

export function analyticsToJson(analytics: UsageAnalyticsResult): UsageAnalyticsJson {
  if (!analytics.ok) return { error: analytics.error };
  return { usage_analytics: analytics.stats, fetched_at: analytics.fetchedAt };
}

export function recordToJson(record: CallRecord): Record<string, unknown> {
  return snakeCaseKeys(record, ["transcriptSummary"]);
}

export function buildReport(input: ReportInput): ReportDocument {
  const report: ReportDocument = {
    query_info: queryInfoToJson(input.query),
    subscription_info: snakeCaseKeys(input.subscription, ["detailedUsage"]),
    summary: summaryToJson(input.summary),
    usage_analytics: analyticsToJson(input.analytics),
  };
  if (!input.summaryOnly) {
    report.records = input.records.map(recordToJson);
  }
  return report;
}

/** Serialize a report; `pretty` uses a 2-space indent. Non-ASCII text is kept as-is. */
export function serializeReport(report: ReportDocument, pretty = false): string {
  return pretty ? JSON.stringify(report, null, 2) : JSON.stringify(report);
}
