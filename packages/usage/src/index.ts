/**
 * @credscope/usage
 *
 * Aggregates provider call records into credit totals and breakdowns
 * by call type, voice, source and day.
 *
 * @packageDocumentation
 */

export {
  UsageAggregator,
  summarizeCalls,
  mergeSummaries,
  emptySummary,
  validateRecord,
  countByType,
  voiceKey,
  sourceKey,
  UNKNOWN_BUCKET,
} from "./aggregator.js";
export type { CallSummary, Breakdown, BreakdownEntry, SummarizeOptions } from "./types.js";
