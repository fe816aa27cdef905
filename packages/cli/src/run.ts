import { createLogger } from "@credscope/logger";
import { formatTimestamp, loadConfig, maskSecret, normalizeTimestamp } from "@credscope/core";
import type { CallRecord, TimeWindow } from "@credscope/core";
import {
  collectConversations,
  collectSpeechHistory,
  createUsageProvider,
  fetchSubscriptionInfo,
  fetchUsageAnalytics,
} from "@credscope/provider";
import type { UsageProvider } from "@credscope/provider";
import { countByType, summarizeCalls } from "@credscope/usage";
import { buildReport, serializeReport, writeReport } from "@credscope/report";
import type { ReportDocument, WrittenReport } from "@credscope/report";
import type { CliOptions } from "./program.js";

const log = createLogger("cli");

export interface RunDeps {
  env?: Record<string, string | undefined>;
  /** Overrides the provider built from the environment's credentials */
  provider?: UsageProvider;
  now?: () => number;
  stdout?: (text: string) => void;
}

export interface RunResult {
  report: ReportDocument;
  written: WrittenReport;
}

/** Oldest first. Ties keep their collection order. */
export function sortChronologically<T extends CallRecord>(records: readonly T[]): T[] {
  return [...records].sort((a, b) => a.timestampMs - b.timestampMs);
}

/**
 * Fetch, aggregate and write one usage report.
 *
 * @throws ConfigError when no API key is configured.
 * @throws FetchError when the subscription or speech history cannot be fetched.
 * @throws IOError when the report cannot be written.
 */
export async function runUsageReport(options: CliOptions, deps: RunDeps = {}): Promise<RunResult> {
  const now = deps.now ?? Date.now;
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));

  const config = loadConfig(deps.env);
  const window: TimeWindow = {
    startMs: normalizeTimestamp(options.start),
    endMs: normalizeTimestamp(options.end),
  };

  log.info(
    `Analyzing ElevenLabs usage from ${formatTimestamp(window.startMs)} to ${formatTimestamp(window.endMs)}`,
  );
  log.info(`Using API key: ${maskSecret(config.apiKey)}`);

  const provider =
    deps.provider ??
    createUsageProvider({ provider: "elevenlabs", apiKey: config.apiKey, baseUrl: config.baseUrl });

  const subscription = await fetchSubscriptionInfo(provider);
  log.info(`Connected to ${provider.name} (${subscription.tier} plan)`);

  const speech = await collectSpeechHistory(provider, window);
  const conversations = await collectConversations(provider, window);
  const records = sortChronologically<CallRecord>([...speech, ...conversations]);

  const summary = summarizeCalls(records, { byDay: options.byDay });
  const analytics = await fetchUsageAnalytics(provider, window, now);

  log.info(
    `Summary: ${summary.totalApiCalls} API calls, ${summary.totalCreditsUsed} credits ` +
      `(${countByType(summary, "speech_generation")} speech generations, ` +
      `${countByType(summary, "conversational_ai")} conversational AI calls)`,
  );

  const report = buildReport({
    query: { startInput: options.start, endInput: options.end, window, generatedAtMs: now() },
    subscription,
    summary,
    analytics,
    records,
    summaryOnly: options.summaryOnly,
  });
  const json = serializeReport(report, options.pretty);

  const written = writeReport(json, {
    outputDir: options.outputDir,
    outputPath: options.output,
    nowMs: now(),
  });

  if (options.print) stdout(json);
  return { report, written };
}
