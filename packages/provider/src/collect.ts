import { createLogger } from "@credscope/logger";
import { formatError, formatTimestamp, toUnixSeconds } from "@credscope/core";
import type {
  ConversationalAiRecord,
  SpeechGenerationRecord,
  SubscriptionInfo,
  TimeWindow,
  TranscriptSummary,
} from "@credscope/core";
import { ConversationSummarySchema, HistoryItemSchema } from "./schemas.js";
import type {
  ConversationDetail,
  ConversationPage,
  ConversationSummary,
  HistoryItem,
  UserInfo,
} from "./schemas.js";
import type { UsageAnalyticsResult, UsageProvider } from "./types.js";

const log = createLogger("provider:collect");

/** Largest page the history endpoint serves */
export const HISTORY_PAGE_SIZE = 1000;
export const CONVERSATION_PAGE_SIZE = 100;

/**
 * Credits for a speech generation are the drop in the account's character
 * count across the call. 0 when either side is unknown or the counter rose
 * (a quota reset or refund); the raw counts stay on the record.
 */
export function creditsFromCharacterCounts(
  from: number | null | undefined,
  to: number | null | undefined,
): number {
  if (typeof from !== "number" || typeof to !== "number") return 0;
  return Math.max(0, from - to);
}

export function toSpeechRecord(item: HistoryItem): SpeechGenerationRecord {
  const timestampMs = item.date_unix * 1000;
  return {
    type: "speech_generation",
    id: item.history_item_id,
    timestamp: item.date_unix,
    timestampMs,
    formattedTime: formatTimestamp(timestampMs),
    creditsUsed: creditsFromCharacterCounts(
      item.character_count_change_from,
      item.character_count_change_to,
    ),
    requestId: item.request_id ?? null,
    text: item.text ?? null,
    voiceId: item.voice_id ?? null,
    voiceName: item.voice_name ?? null,
    voiceCategory: item.voice_category ?? null,
    modelId: item.model_id ?? null,
    contentType: item.content_type ?? null,
    source: item.source ?? null,
    characterCountFrom: item.character_count_change_from ?? null,
    characterCountTo: item.character_count_change_to ?? null,
    settings: item.settings ?? null,
    feedback: item.feedback ?? null,
  };
}

/**
 * Download speech generations inside the window.
 *
 * History is served newest first, so paging stops at the first item older
 * than the window start. Items that fail validation are skipped.
 */
export async function collectSpeechHistory(
  provider: UsageProvider,
  window: TimeWindow,
  pageSize: number = HISTORY_PAGE_SIZE,
): Promise<SpeechGenerationRecord[]> {
  log.info("Fetching speech generation history...");

  const records: SpeechGenerationRecord[] = [];
  let startAfter: string | undefined;

  for (;;) {
    const page = await provider.listHistory({
      pageSize,
      startAfterHistoryItemId: startAfter,
    });
    if (page.history.length === 0) break;

    for (const raw of page.history) {
      const parsed = HistoryItemSchema.safeParse(raw);
      if (!parsed.success) {
        log.warn(`Skipping malformed history item: ${parsed.error.issues[0]?.message ?? "invalid"}`);
        continue;
      }

      const itemMs = parsed.data.date_unix * 1000;
      if (itemMs >= window.startMs && itemMs <= window.endMs) {
        records.push(toSpeechRecord(parsed.data));
      } else if (itemMs < window.startMs) {
        return records;
      }
    }

    if (!page.has_more || !page.last_history_item_id) break;
    startAfter = page.last_history_item_id;
    log.info(`Fetched ${records.length} speech generations so far...`);
  }

  return records;
}

export function summarizeTranscript(
  transcript: ConversationDetail["transcript"],
): TranscriptSummary {
  let userMessages = 0;
  let assistantMessages = 0;
  for (const item of transcript) {
    if (item.role === "user") userMessages += 1;
    else if (item.role === "agent" || item.role === "assistant") assistantMessages += 1;
  }
  return { totalItems: transcript.length, userMessages, assistantMessages };
}

export function toConversationRecord(
  summary: ConversationSummary,
  detail: ConversationDetail,
): ConversationalAiRecord {
  const meta = detail.metadata;
  const timestampMs = meta.start_time_unix_secs * 1000;

  let totalLlmTokens = 0;
  for (const item of detail.transcript) {
    totalLlmTokens += item.llm_usage?.total_tokens ?? 0;
  }

  return {
    type: "conversational_ai",
    id: summary.conversation_id,
    timestamp: meta.start_time_unix_secs,
    timestampMs,
    formattedTime: formatTimestamp(timestampMs),
    creditsUsed: meta.cost ?? 0,
    agentId: summary.agent_id ?? null,
    durationSecs: meta.call_duration_secs ?? null,
    status: summary.status ?? null,
    totalLlmTokens,
    acceptedTime: meta.accepted_time_unix_secs ?? null,
    terminationReason: meta.termination_reason ?? null,
    mainLanguage: meta.main_language ?? null,
    chargingInfo: meta.charging ?? null,
    phoneCallInfo: meta.phone_call ?? null,
    errorInfo: meta.error ?? null,
    transcriptSummary: summarizeTranscript(detail.transcript),
  };
}

/** Record for a conversation whose details could not be fetched. */
export function toBasicConversationRecord(
  summary: ConversationSummary,
  reason: string,
): ConversationalAiRecord {
  const timestampMs = summary.start_time_unix_secs * 1000;
  return {
    type: "conversational_ai",
    id: summary.conversation_id,
    timestamp: summary.start_time_unix_secs,
    timestampMs,
    formattedTime: formatTimestamp(timestampMs),
    creditsUsed: 0,
    agentId: summary.agent_id ?? null,
    durationSecs: summary.call_duration_secs ?? null,
    status: summary.status ?? null,
    totalLlmTokens: 0,
    acceptedTime: null,
    terminationReason: null,
    mainLanguage: null,
    chargingInfo: null,
    phoneCallInfo: null,
    errorInfo: null,
    transcriptSummary: null,
    error: `Could not fetch detailed data: ${reason}`,
  };
}

/**
 * Download conversational AI calls started inside the window, with details.
 *
 * Conversational AI may not be enabled for the account: a listing failure
 * ends collection with whatever was gathered so far.
 */
export async function collectConversations(
  provider: UsageProvider,
  window: TimeWindow,
  pageSize: number = CONVERSATION_PAGE_SIZE,
): Promise<ConversationalAiRecord[]> {
  log.info("Fetching conversational AI history...");

  const records: ConversationalAiRecord[] = [];
  let cursor: string | undefined;

  for (;;) {
    let page: ConversationPage;
    try {
      page = await provider.listConversations({
        pageSize,
        cursor,
        callStartAfterUnix: toUnixSeconds(window.startMs),
        callStartBeforeUnix: toUnixSeconds(window.endMs),
      });
    } catch (err) {
      log.warn(
        `Could not fetch conversational AI data (might not be available): ${formatError(err)}`,
      );
      return records;
    }
    if (page.conversations.length === 0) break;

    for (const raw of page.conversations) {
      const parsed = ConversationSummarySchema.safeParse(raw);
      if (!parsed.success) {
        log.warn(`Skipping malformed conversation: ${parsed.error.issues[0]?.message ?? "invalid"}`);
        continue;
      }

      const summary = parsed.data;
      try {
        const detail = await provider.getConversation(summary.conversation_id);
        records.push(toConversationRecord(summary, detail));
      } catch (err) {
        const reason = formatError(err);
        log.warn(`Could not get details for conversation ${summary.conversation_id}: ${reason}`);
        records.push(toBasicConversationRecord(summary, reason));
      }
    }

    if (!page.next_cursor || page.has_more === false) break;
    cursor = page.next_cursor;
    log.info(`Fetched ${records.length} conversations so far...`);
  }

  return records;
}

export function toSubscriptionInfo(user: UserInfo): SubscriptionInfo {
  const sub = user.subscription;
  const resetUnix = sub.next_character_count_reset_unix ?? null;

  const info: SubscriptionInfo = {
    tier: sub.tier,
    characterCountUsed: sub.character_count,
    characterLimit: sub.character_limit,
    nextResetUnix: resetUnix,
    nextResetFormatted: resetUnix ? formatTimestamp(resetUnix * 1000) : null,
    voiceSlotsUsed: sub.voice_slots_used ?? null,
    voiceLimit: sub.voice_limit ?? null,
    professionalVoiceSlotsUsed: sub.professional_voice_slots_used ?? null,
    professionalVoiceLimit: sub.professional_voice_limit ?? null,
    status: sub.status ?? null,
    currency: sub.currency ?? null,
  };

  const usage = user.subscription_extras?.usage;
  if (usage) {
    info.detailedUsage = {
      rolloverCreditsUsed: usage.rollover_credits_used ?? null,
      rolloverCreditsQuota: usage.rollover_credits_quota ?? null,
      subscriptionCycleCreditsUsed: usage.subscription_cycle_credits_used ?? null,
      subscriptionCycleCreditsQuota: usage.subscription_cycle_credits_quota ?? null,
      manuallyGiftedCreditsUsed: usage.manually_gifted_credits_used ?? null,
      manuallyGiftedCreditsQuota: usage.manually_gifted_credits_quota ?? null,
      paidUsageBasedCreditsUsed: usage.paid_usage_based_credits_used ?? null,
      actualReportedCredits: usage.actual_reported_credits ?? null,
    };
  }
  return info;
}

/** Fetch the plan snapshot. Failures are fatal, so they propagate. */
export async function fetchSubscriptionInfo(provider: UsageProvider): Promise<SubscriptionInfo> {
  log.info("Fetching subscription information...");
  return toSubscriptionInfo(await provider.getUser());
}

/**
 * Fetch per-voice daily credit stats for the window. Failures are
 * reported in the result instead of thrown.
 */
export async function fetchUsageAnalytics(
  provider: UsageProvider,
  window: TimeWindow,
  now: () => number = Date.now,
): Promise<UsageAnalyticsResult> {
  log.info("Fetching usage analytics...");
  try {
    const stats = await provider.getCharacterStats({
      startUnixMs: window.startMs,
      endUnixMs: window.endMs,
      breakdownType: "voice",
      aggregationInterval: "day",
      metric: "credits",
    });
    return { ok: true, stats, fetchedAt: formatTimestamp(now()) };
  } catch (err) {
    const error = formatError(err);
    log.warn(`Could not fetch usage analytics: ${error}`);
    return { ok: false, error };
  }
}
