import { z } from "zod";

const jsonObject = z.record(z.unknown());

// --- Speech history (/v1/history) ---

export const HistoryItemSchema = z.object({
  history_item_id: z.string().min(1),
  request_id: z.string().nullish(),
  voice_id: z.string().nullish(),
  voice_name: z.string().nullish(),
  voice_category: z.string().nullish(),
  model_id: z.string().nullish(),
  text: z.string().nullish(),
  date_unix: z.number().int(),
  character_count_change_from: z.number().nullish(),
  character_count_change_to: z.number().nullish(),
  content_type: z.string().nullish(),
  source: z.string().nullish(),
  settings: jsonObject.nullish(),
  feedback: jsonObject.nullish(),
});

/** Items stay unparsed here so one bad item does not reject the whole page. */
export const HistoryPageSchema = z.object({
  history: z.array(z.unknown()),
  last_history_item_id: z.string().nullish(),
  has_more: z.boolean(),
});

// --- Conversational AI (/v1/convai/conversations) ---

export const ConversationSummarySchema = z.object({
  conversation_id: z.string().min(1),
  agent_id: z.string().nullish(),
  start_time_unix_secs: z.number().int(),
  call_duration_secs: z.number().nullish(),
  status: z.string().nullish(),
});

export const ConversationPageSchema = z.object({
  conversations: z.array(z.unknown()),
  next_cursor: z.string().nullish(),
  has_more: z.boolean().optional(),
});

const TranscriptItemSchema = z.object({
  role: z.string(),
  llm_usage: z
    .object({ total_tokens: z.number().optional() })
    .passthrough()
    .nullish(),
});

export const ConversationDetailSchema = z.object({
  conversation_id: z.string(),
  metadata: z.object({
    start_time_unix_secs: z.number().int(),
    call_duration_secs: z.number().nullish(),
    cost: z.number().nullish(),
    accepted_time_unix_secs: z.number().nullish(),
    termination_reason: z.string().nullish(),
    main_language: z.string().nullish(),
    charging: jsonObject.nullish(),
    phone_call: jsonObject.nullish(),
    error: jsonObject.nullish(),
  }),
  transcript: z.array(TranscriptItemSchema).default([]),
});

// --- Account (/v1/user) ---

export const SubscriptionSchema = z.object({
  tier: z.string(),
  character_count: z.number(),
  character_limit: z.number(),
  next_character_count_reset_unix: z.number().nullish(),
  voice_slots_used: z.number().nullish(),
  voice_limit: z.number().nullish(),
  professional_voice_slots_used: z.number().nullish(),
  professional_voice_limit: z.number().nullish(),
  status: z.string().nullish(),
  currency: z.string().nullish(),
});

export const CreditUsageSchema = z.object({
  rollover_credits_used: z.number().nullish(),
  rollover_credits_quota: z.number().nullish(),
  subscription_cycle_credits_used: z.number().nullish(),
  subscription_cycle_credits_quota: z.number().nullish(),
  manually_gifted_credits_used: z.number().nullish(),
  manually_gifted_credits_quota: z.number().nullish(),
  paid_usage_based_credits_used: z.number().nullish(),
  actual_reported_credits: z.number().nullish(),
});

export const UserSchema = z.object({
  subscription: SubscriptionSchema,
  subscription_extras: z
    .object({ usage: CreditUsageSchema.nullish() })
    .nullish(),
});

// --- Usage analytics (/v1/usage/character-stats) ---

export const CharacterStatsSchema = z.object({
  time: z.array(z.number()),
  usage: z.record(z.array(z.number())),
});

export type HistoryItem = z.infer<typeof HistoryItemSchema>;
export type HistoryPage = z.infer<typeof HistoryPageSchema>;
export type ConversationSummary = z.infer<typeof ConversationSummarySchema>;
export type ConversationPage = z.infer<typeof ConversationPageSchema>;
export type ConversationDetail = z.infer<typeof ConversationDetailSchema>;
export type UserInfo = z.infer<typeof UserSchema>;
export type CharacterStats = z.infer<typeof CharacterStatsSchema>;
