export { ElevenLabsClient } from "./elevenlabs.js";
export { createUsageProvider } from "./factory.js";
export {
  collectSpeechHistory,
  collectConversations,
  fetchSubscriptionInfo,
  fetchUsageAnalytics,
  toSpeechRecord,
  toConversationRecord,
  toBasicConversationRecord,
  toSubscriptionInfo,
  summarizeTranscript,
  creditsFromCharacterCounts,
  HISTORY_PAGE_SIZE,
  CONVERSATION_PAGE_SIZE,
} from "./collect.js";
export type {
  UsageProvider,
  ProviderConfig,
  HistoryPageRequest,
  ConversationPageRequest,
  CharacterStatsRequest,
  UsageAnalyticsResult,
} from "./types.js";
export type {
  HistoryItem,
  HistoryPage,
  ConversationSummary,
  ConversationPage,
  ConversationDetail,
  UserInfo,
  CharacterStats,
} from "./schemas.js";
