export type {
  CallType,
  CallRecord,
  SpeechGenerationRecord,
  ConversationalAiRecord,
  TranscriptSummary,
  TimeWindow,
} from "./types/call-record.js";
export { CALL_TYPES } from "./types/call-record.js";
export type { SubscriptionInfo, DetailedCreditUsage } from "./types/subscription.js";

export {
  CredscopeError,
  CredscopeErrorCode,
  ConfigError,
  FetchError,
  IOError,
  isCredscopeError,
} from "./errors.js";
export { formatError, maskSecret } from "./error-utils.js";
export {
  SECONDS_CUTOFF,
  normalizeTimestamp,
  formatTimestamp,
  dayBucket,
  toUnixSeconds,
} from "./time.js";
export {
  loadConfig,
  API_KEY_ENV,
  BASE_URL_ENV,
  DEFAULT_BASE_URL,
} from "./config.js";
export type { CredscopeConfig } from "./config.js";
