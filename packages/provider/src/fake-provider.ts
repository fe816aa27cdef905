import { FetchError } from "@credscope/core";
import type {
  CharacterStats,
  ConversationDetail,
  ConversationPage,
  HistoryPage,
  UserInfo,
} from "./schemas.js";
import type {
  CharacterStatsRequest,
  ConversationPageRequest,
  HistoryPageRequest,
  UsageProvider,
} from "./types.js";

/**
 * In-memory UsageProvider for tests. Pages are served in order; an exhausted
 * list returns an empty page. Set an `*Error` field to make that call reject.
 */
export class FakeUsageProvider implements UsageProvider {
  readonly name = "fake";

  historyPages: HistoryPage[] = [];
  conversationPages: ConversationPage[] = [];
  details = new Map<string, ConversationDetail>();
  user: UserInfo = {
    subscription: { tier: "creator", character_count: 0, character_limit: 100_000 },
  };
  stats: CharacterStats = { time: [], usage: {} };

  historyError?: Error;
  /** Rejects listConversations from this page index on */
  conversationsErrorAt?: { page: number; error: Error };
  userError?: Error;
  statsError?: Error;

  readonly historyRequests: HistoryPageRequest[] = [];
  readonly conversationRequests: ConversationPageRequest[] = [];
  readonly detailRequests: string[] = [];
  readonly statsRequests: CharacterStatsRequest[] = [];

  async listHistory(request: HistoryPageRequest): Promise<HistoryPage> {
    this.historyRequests.push(request);
    if (this.historyError) throw this.historyError;
    return this.historyPages[this.historyRequests.length - 1] ?? { history: [], has_more: false };
  }

  async listConversations(request: ConversationPageRequest): Promise<ConversationPage> {
    const index = this.conversationRequests.length;
    this.conversationRequests.push(request);
    if (this.conversationsErrorAt && index >= this.conversationsErrorAt.page) {
      throw this.conversationsErrorAt.error;
    }
    return this.conversationPages[index] ?? { conversations: [] };
  }

  async getConversation(conversationId: string): Promise<ConversationDetail> {
    this.detailRequests.push(conversationId);
    const detail = this.details.get(conversationId);
    if (!detail) {
      throw new FetchError(
        `/v1/convai/conversations/${conversationId} request failed: HTTP 404 — not found`,
        404,
      );
    }
    return detail;
  }

  async getUser(): Promise<UserInfo> {
    if (this.userError) throw this.userError;
    return this.user;
  }

  async getCharacterStats(request: CharacterStatsRequest): Promise<CharacterStats> {
    this.statsRequests.push(request);
    if (this.statsError) throw this.statsError;
    return this.stats;
  }
}
