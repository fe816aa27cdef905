export interface BreakdownEntry {
  count: number;
  credits: number;
}

/** Totals keyed by a categorical label (call type, voice, source, day). */
export type Breakdown = Record<string, BreakdownEntry>;

export interface CallSummary {
  totalApiCalls: number;
  totalCreditsUsed: number;
  byType: Breakdown;
  byVoice: Breakdown;
  bySource: Breakdown;
  /** Only present when a day breakdown was requested. Keys are UTC "YYYY-MM-DD". */
  byDay?: Breakdown;
  timeRange: {
    earliestCall: string | null; // formatted time
    latestCall: string | null;
  };
}

export interface SummarizeOptions {
  byDay?: boolean;
}
