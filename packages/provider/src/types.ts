import type {
  CharacterStats,
  ConversationDetail,
  ConversationPage,
  HistoryPage,
  UserInfo,
} from "./schemas.js";

export interface ProviderConfig {
  provider: "elevenlabs";
  apiKey: string;
  /** Defaults to the public API host */
  baseUrl?: string;
}

export interface HistoryPageRequest {
  pageSize: number;
  /** Pagination cursor: the last item id of the previous page */
  startAfterHistoryItemId?: string;
}

export interface ConversationPageRequest {
  pageSize: number;
  cursor?: string;
  callStartAfterUnix: number;
  callStartBeforeUnix: number;
}

export interface CharacterStatsRequest {
  startUnixMs: number;
  endUnixMs: number;
  breakdownType: string;
  aggregationInterval: string;
  metric: string;
}

/**
 * The provider's history and account endpoints.
 * Every method rejects with `FetchError` on network, auth or shape failure.
 */
export interface UsageProvider {
  readonly name: string;
  listHistory(request: HistoryPageRequest): Promise<HistoryPage>;
  listConversations(request: ConversationPageRequest): Promise<ConversationPage>;
  getConversation(conversationId: string): Promise<ConversationDetail>;
  getUser(): Promise<UserInfo>;
  getCharacterStats(request: CharacterStatsRequest): Promise<CharacterStats>;
}

export type UsageAnalyticsResult =
  | { ok: true; stats: CharacterStats; fetchedAt: string }
  | { ok: false; error: string };
