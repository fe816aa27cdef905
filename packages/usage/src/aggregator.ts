import { createLogger } from "@credscope/logger";
import { CALL_TYPES, dayBucket } from "@credscope/core";
import type { CallRecord, CallType } from "@credscope/core";
import type { Breakdown, BreakdownEntry, CallSummary, SummarizeOptions } from "./types.js";

const log = createLogger("usage:aggregator");

/** Bucket for records without a voice or source label. */
export const UNKNOWN_BUCKET = "unknown";

export function emptySummary(options?: SummarizeOptions): CallSummary {
  const summary: CallSummary = {
    totalApiCalls: 0,
    totalCreditsUsed: 0,
    byType: {},
    byVoice: {},
    bySource: {},
    timeRange: { earliestCall: null, latestCall: null },
  };
  if (options?.byDay) summary.byDay = {};
  return summary;
}

/**
 * Returns why a record cannot be aggregated, or null when it is well formed.
 */
export function validateRecord(record: CallRecord): string | null {
  if (!CALL_TYPES.includes(record.type)) {
    return `unknown call type "${String(record.type)}"`;
  }
  if (!Number.isInteger(record.creditsUsed) || record.creditsUsed < 0) {
    return `invalid credits ${String(record.creditsUsed)}`;
  }
  if (!Number.isFinite(record.timestamp)) {
    return `invalid timestamp ${String(record.timestamp)}`;
  }
  return null;
}

export function voiceKey(record: CallRecord): string {
  if (record.type === "speech_generation") {
    return record.voiceName || record.voiceId || UNKNOWN_BUCKET;
  }
  return UNKNOWN_BUCKET;
}

export function sourceKey(record: CallRecord): string {
  if (record.type === "speech_generation") {
    return record.source || UNKNOWN_BUCKET;
  }
  return UNKNOWN_BUCKET;
}

function addTo(breakdown: Breakdown, key: string, count: number, credits: number): void {
  let entry: BreakdownEntry | undefined = breakdown[key];
  if (!entry) {
    entry = { count: 0, credits: 0 };
    breakdown[key] = entry;
  }
  entry.count += count;
  entry.credits += credits;
}

/**
 * Running totals over a sequence of call records.
 *
 * Malformed records are skipped with a warning; they never abort aggregation.
 */
export class UsageAggregator {
  private readonly summary: CallSummary;
  private earliest = Number.POSITIVE_INFINITY;
  private latest = Number.NEGATIVE_INFINITY;
  private skippedCount = 0;

  constructor(options?: SummarizeOptions) {
    this.summary = emptySummary(options);
  }

  /** Add one record. Returns false when the record was skipped. */
  add(record: CallRecord): boolean {
    const problem = validateRecord(record);
    if (problem) {
      this.skippedCount += 1;
      log.warn(`Skipping malformed record ${String(record.id)}: ${problem}`);
      return false;
    }

    const credits = record.creditsUsed;
    const summary = this.summary;
    summary.totalApiCalls += 1;
    summary.totalCreditsUsed += credits;

    addTo(summary.byType, record.type, 1, credits);
    addTo(summary.byVoice, voiceKey(record), 1, credits);
    addTo(summary.bySource, sourceKey(record), 1, credits);
    if (summary.byDay) {
      addTo(summary.byDay, dayBucket(record.timestamp), 1, credits);
    }

    if (record.timestamp < this.earliest) {
      this.earliest = record.timestamp;
      summary.timeRange.earliestCall = record.formattedTime;
    }
    if (record.timestamp > this.latest) {
      this.latest = record.timestamp;
      summary.timeRange.latestCall = record.formattedTime;
    }
    return true;
  }

  get skipped(): number {
    return this.skippedCount;
  }

  toSummary(): CallSummary {
    return cloneSummary(this.summary);
  }
}

/** Aggregate a record sequence in a single pass. */
export function summarizeCalls(
  records: Iterable<CallRecord>,
  options?: SummarizeOptions,
): CallSummary {
  const aggregator = new UsageAggregator(options);
  for (const record of records) {
    aggregator.add(record);
  }
  if (aggregator.skipped > 0) {
    log.warn(`${aggregator.skipped} malformed record(s) were left out of the summary`);
  }
  return aggregator.toSummary();
}

function mergeBreakdown(target: Breakdown, source: Breakdown): void {
  for (const [key, entry] of Object.entries(source)) {
    addTo(target, key, entry.count, entry.credits);
  }
}

function pickTime(
  a: string | null,
  b: string | null,
  prefer: (x: string, y: string) => boolean,
): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return prefer(a, b) ? a : b;
}

/**
 * Combine the summaries of two disjoint record sets.
 * The result equals summarizing the union of both sets. The day breakdown
 * is kept only when both summaries have one.
 */
export function mergeSummaries(a: CallSummary, b: CallSummary): CallSummary {
  const merged = cloneSummary(a);
  merged.totalApiCalls += b.totalApiCalls;
  merged.totalCreditsUsed += b.totalCreditsUsed;
  mergeBreakdown(merged.byType, b.byType);
  mergeBreakdown(merged.byVoice, b.byVoice);
  mergeBreakdown(merged.bySource, b.bySource);
  // A day breakdown covering only one side would not add up to the totals
  if (merged.byDay && b.byDay) {
    mergeBreakdown(merged.byDay, b.byDay);
  } else {
    delete merged.byDay;
  }
  // Formatted times are "YYYY-MM-DD HH:MM:SS UTC" and sort lexicographically
  merged.timeRange = {
    earliestCall: pickTime(a.timeRange.earliestCall, b.timeRange.earliestCall, (x, y) => x <= y),
    latestCall: pickTime(a.timeRange.latestCall, b.timeRange.latestCall, (x, y) => x >= y),
  };
  return merged;
}

/** Count of records per call type, 0 for types that never occurred. */
export function countByType(summary: CallSummary, type: CallType): number {
  return summary.byType[type]?.count ?? 0;
}

function cloneBreakdown(breakdown: Breakdown): Breakdown {
  const copy: Breakdown = {};
  for (const [key, entry] of Object.entries(breakdown)) {
    copy[key] = { count: entry.count, credits: entry.credits };
  }
  return copy;
}

function cloneSummary(summary: CallSummary): CallSummary {
  const copy: CallSummary = {
    totalApiCalls: summary.totalApiCalls,
    totalCreditsUsed: summary.totalCreditsUsed,
    byType: cloneBreakdown(summary.byType),
    byVoice: cloneBreakdown(summary.byVoice),
    bySource: cloneBreakdown(summary.bySource),
    timeRange: { ...summary.timeRange },
  };
  if (summary.byDay) copy.byDay = cloneBreakdown(summary.byDay);
  return copy;
}
