import { describe, it, expect, beforeEach } from "vitest";
import { FetchError } from "@credscope/core";
import type { TimeWindow } from "@credscope/core";
import { summarizeCalls } from "@credscope/usage";
import {
  collectSpeechHistory,
  collectConversations,
  creditsFromCharacterCounts,
  fetchSubscriptionInfo,
  fetchUsageAnalytics,
  toSpeechRecord,
} from "./collect.js";
import { FakeUsageProvider } from "./fake-provider.js";
import type { ConversationDetail } from "./schemas.js";

// 2022-01-01T00:00:00Z
const DAY_ONE = 1640995200;
const DAY = 86_400;
const WINDOW: TimeWindow = { startMs: DAY_ONE * 1000, endMs: (DAY_ONE + DAY) * 1000 };

function historyItem(id: string, dateUnix: number, credits = 10) {
  return {
    history_item_id: id,
    request_id: `req-${id}`,
    voice_id: "voice-1",
    voice_name: "Rachel",
    date_unix: dateUnix,
    character_count_change_from: 1000,
    character_count_change_to: 1000 - credits,
    source: "TTS",
  };
}

function conversationDetail(id: string, cost: number | null): ConversationDetail {
  return {
    conversation_id: id,
    metadata: { start_time_unix_secs: DAY_ONE + 600, call_duration_secs: 42, cost },
    transcript: [],
  };
}

// ---------------------------------------------------------------------------
// speech history
// ---------------------------------------------------------------------------
describe("collectSpeechHistory", () => {
  let provider: FakeUsageProvider;

  beforeEach(() => {
    provider = new FakeUsageProvider();
  });

  it("returns nothing for an empty history", async () => {
    expect(await collectSpeechHistory(provider, WINDOW)).toEqual([]);
    expect(provider.historyRequests).toEqual([
      { pageSize: 1000, startAfterHistoryItemId: undefined },
    ]);
  });

  it("pages newest-first and stops at the first item older than the window", async () => {
    provider.historyPages = [
      {
        history: [
          historyItem("h1", DAY_ONE + DAY + 100),
          historyItem("h2", DAY_ONE + 5000, 12),
          { history_item_id: 5, date_unix: "yesterday" },
          historyItem("h4", DAY_ONE + 4000),
        ],
        last_history_item_id: "h4",
        has_more: true,
      },
      {
        history: [
          historyItem("h5", DAY_ONE),
          historyItem("h6", DAY_ONE - 10),
          historyItem("h7", DAY_ONE - 20),
        ],
        last_history_item_id: "h7",
        has_more: true,
      },
    ];

    const records = await collectSpeechHistory(provider, WINDOW);

    expect(records.map((r) => r.id)).toEqual(["h2", "h4", "h5"]);
    expect(records[0].creditsUsed).toBe(12);
    expect(provider.historyRequests).toEqual([
      { pageSize: 1000, startAfterHistoryItemId: undefined },
      { pageSize: 1000, startAfterHistoryItemId: "h4" },
    ]);
  });

  it("stops when the provider reports no more pages", async () => {
    provider.historyPages = [
      { history: [historyItem("h1", DAY_ONE + 10)], last_history_item_id: "h1", has_more: false },
      { history: [historyItem("h2", DAY_ONE + 5)], last_history_item_id: "h2", has_more: false },
    ];

    const records = await collectSpeechHistory(provider, WINDOW);

    expect(records.map((r) => r.id)).toEqual(["h1"]);
    expect(provider.historyRequests).toHaveLength(1);
  });

  it("propagates fetch failures", async () => {
    provider.historyError = new FetchError("/v1/history authentication failed: HTTP 401 — no", 401);

    await expect(collectSpeechHistory(provider, WINDOW)).rejects.toBeInstanceOf(FetchError);
  });
});

describe("toSpeechRecord", () => {
  it("maps every history field", () => {
    const record = toSpeechRecord({
      history_item_id: "h1",
      request_id: "req-1",
      voice_id: "voice-1",
      voice_name: "Rachel",
      voice_category: "premade",
      model_id: "eleven_multilingual_v2",
      text: "Hello there",
      date_unix: DAY_ONE + 3661,
      character_count_change_from: 500,
      character_count_change_to: 489,
      content_type: "audio/mpeg",
      source: "TTS",
      settings: { stability: 0.5 },
      feedback: null,
    });

    expect(record).toEqual({
      type: "speech_generation",
      id: "h1",
      timestamp: DAY_ONE + 3661,
      timestampMs: (DAY_ONE + 3661) * 1000,
      formattedTime: "2022-01-01 01:01:01 UTC",
      creditsUsed: 11,
      requestId: "req-1",
      text: "Hello there",
      voiceId: "voice-1",
      voiceName: "Rachel",
      voiceCategory: "premade",
      modelId: "eleven_multilingual_v2",
      contentType: "audio/mpeg",
      source: "TTS",
      characterCountFrom: 500,
      characterCountTo: 489,
      settings: { stability: 0.5 },
      feedback: null,
    });
  });

  it("counts zero credits when character counts are missing", () => {
    expect(creditsFromCharacterCounts(undefined, 10)).toBe(0);
    expect(creditsFromCharacterCounts(100, null)).toBe(0);
    expect(creditsFromCharacterCounts(100, 75)).toBe(25);
  });

  it("keeps a call whose character counter rose, at zero credits", () => {
    const record = toSpeechRecord({
      history_item_id: "h9",
      date_unix: DAY_ONE + 60,
      character_count_change_from: 17189,
      character_count_change_to: 17231,
    });

    expect(record.creditsUsed).toBe(0);
    expect(record.characterCountFrom).toBe(17189);
    expect(record.characterCountTo).toBe(17231);

    const summary = summarizeCalls([record]);
    expect(summary.totalApiCalls).toBe(1);
    expect(summary.totalCreditsUsed).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// conversations
// ---------------------------------------------------------------------------
describe("collectConversations", () => {
  let provider: FakeUsageProvider;

  beforeEach(() => {
    provider = new FakeUsageProvider();
  });

  it("fetches details for each conversation across pages", async () => {
    provider.conversationPages = [
      {
        conversations: [
          { conversation_id: "c1", agent_id: "agent-1", start_time_unix_secs: DAY_ONE + 600, status: "done" },
          { conversation_id: "c2", agent_id: "agent-1", start_time_unix_secs: DAY_ONE + 700, call_duration_secs: 9, status: "failed" },
          { agent_id: "agent-1" },
        ],
        next_cursor: "cur-2",
        has_more: true,
      },
      {
        conversations: [
          { conversation_id: "c3", start_time_unix_secs: DAY_ONE + 800 },
        ],
        next_cursor: null,
        has_more: false,
      },
    ];
    provider.details.set("c1", {
      conversation_id: "c1",
      metadata: {
        start_time_unix_secs: DAY_ONE + 600,
        call_duration_secs: 95,
        cost: 50,
        termination_reason: "end_call tool",
        main_language: "en",
      },
      transcript: [
        { role: "user" },
        { role: "agent", llm_usage: { total_tokens: 30 } },
        { role: "agent", llm_usage: { total_tokens: 12 } },
      ],
    });
    provider.details.set("c3", conversationDetail("c3", null));

    const records = await collectConversations(provider, WINDOW);

    expect(records.map((r) => r.id)).toEqual(["c1", "c2", "c3"]);
    expect(records[0]).toMatchObject({
      type: "conversational_ai",
      agentId: "agent-1",
      timestamp: DAY_ONE + 600,
      formattedTime: "2022-01-01 00:10:00 UTC",
      creditsUsed: 50,
      durationSecs: 95,
      status: "done",
      totalLlmTokens: 42,
      terminationReason: "end_call tool",
      mainLanguage: "en",
      transcriptSummary: { totalItems: 3, userMessages: 1, assistantMessages: 2 },
    });
    expect(records[1]).toMatchObject({
      creditsUsed: 0,
      durationSecs: 9,
      status: "failed",
      transcriptSummary: null,
      error:
        "Could not fetch detailed data: /v1/convai/conversations/c2 request failed: HTTP 404 — not found",
    });
    expect(records[2].creditsUsed).toBe(0);

    expect(provider.conversationRequests).toEqual([
      { pageSize: 100, cursor: undefined, callStartAfterUnix: DAY_ONE, callStartBeforeUnix: DAY_ONE + DAY },
      { pageSize: 100, cursor: "cur-2", callStartAfterUnix: DAY_ONE, callStartBeforeUnix: DAY_ONE + DAY },
    ]);
    expect(provider.detailRequests).toEqual(["c1", "c2", "c3"]);
  });

  it("returns an empty list when the feature is unavailable", async () => {
    provider.conversationsErrorAt = { page: 0, error: new FetchError("forbidden", 403) };

    expect(await collectConversations(provider, WINDOW)).toEqual([]);
  });

  it("keeps what was gathered when a later page fails", async () => {
    provider.conversationPages = [
      {
        conversations: [{ conversation_id: "c1", start_time_unix_secs: DAY_ONE + 600 }],
        next_cursor: "cur-2",
      },
    ];
    provider.details.set("c1", conversationDetail("c1", 7));
    provider.conversationsErrorAt = { page: 1, error: new Error("socket hang up") };

    const records = await collectConversations(provider, WINDOW);

    expect(records.map((r) => [r.id, r.creditsUsed])).toEqual([["c1", 7]]);
  });
});

// ---------------------------------------------------------------------------
// subscription and analytics
// ---------------------------------------------------------------------------
describe("fetchSubscriptionInfo", () => {
  it("maps the plan snapshot and detailed usage", async () => {
    const provider = new FakeUsageProvider();
    provider.user = {
      subscription: {
        tier: "pro",
        character_count: 1200,
        character_limit: 500000,
        next_character_count_reset_unix: DAY_ONE + DAY,
        voice_slots_used: 3,
        voice_limit: 30,
        status: "active",
        currency: "usd",
      },
      subscription_extras: {
        usage: { subscription_cycle_credits_used: 1200, actual_reported_credits: 1250 },
      },
    };

    expect(await fetchSubscriptionInfo(provider)).toEqual({
      tier: "pro",
      characterCountUsed: 1200,
      characterLimit: 500000,
      nextResetUnix: DAY_ONE + DAY,
      nextResetFormatted: "2022-01-02 00:00:00 UTC",
      voiceSlotsUsed: 3,
      voiceLimit: 30,
      professionalVoiceSlotsUsed: null,
      professionalVoiceLimit: null,
      status: "active",
      currency: "usd",
      detailedUsage: {
        rolloverCreditsUsed: null,
        rolloverCreditsQuota: null,
        subscriptionCycleCreditsUsed: 1200,
        subscriptionCycleCreditsQuota: null,
        manuallyGiftedCreditsUsed: null,
        manuallyGiftedCreditsQuota: null,
        paidUsageBasedCreditsUsed: null,
        actualReportedCredits: 1250,
      },
    });
  });

  it("propagates fetch failures", async () => {
    const provider = new FakeUsageProvider();
    provider.userError = new FetchError("/v1/user authentication failed: HTTP 401 — bad key", 401);

    await expect(fetchSubscriptionInfo(provider)).rejects.toThrow("authentication failed");
  });
});

describe("fetchUsageAnalytics", () => {
  it("requests per-voice daily credits for the window", async () => {
    const provider = new FakeUsageProvider();
    provider.stats = { time: [DAY_ONE * 1000], usage: { Rachel: [25] } };

    const result = await fetchUsageAnalytics(provider, WINDOW, () => DAY_ONE * 1000);

    expect(result).toEqual({
      ok: true,
      stats: { time: [DAY_ONE * 1000], usage: { Rachel: [25] } },
      fetchedAt: "2022-01-01 00:00:00 UTC",
    });
    expect(provider.statsRequests).toEqual([
      {
        startUnixMs: WINDOW.startMs,
        endUnixMs: WINDOW.endMs,
        breakdownType: "voice",
        aggregationInterval: "day",
        metric: "credits",
      },
    ]);
  });

  it("reports failures in the result", async () => {
    const provider = new FakeUsageProvider();
    provider.statsError = new FetchError("/v1/usage/character-stats request failed: HTTP 500 — oops", 500);

    expect(await fetchUsageAnalytics(provider, WINDOW)).toEqual({
      ok: false,
      error: "/v1/usage/character-stats request failed: HTTP 500 — oops",
    });
  });
});
