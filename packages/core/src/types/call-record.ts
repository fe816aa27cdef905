/**
 * Call record types shared by the provider collectors, the aggregator and the report writer.
 */
export type CallType = "speech_generation" | "conversational_ai";

export const CALL_TYPES: readonly CallType[] = [
  "speech_generation",
  "conversational_ai",
] as const;

/** Fields every call record carries, whatever its type. */
interface CallRecordBase {
  id: string;
  /** Seconds since epoch */
  timestamp: number;
  timestampMs: number;
  /** e.g. "2025-01-15 14:30:00 UTC" */
  formattedTime: string;
  creditsUsed: number;
}

export interface SpeechGenerationRecord extends CallRecordBase {
  type: "speech_generation";
  requestId: string | null;
  text: string | null;
  voiceId: string | null;
  voiceName: string | null;
  voiceCategory: string | null;
  modelId: string | null;
  contentType: string | null;
  /** How the call was made, e.g. "TTS", "STS", "Projects" */
  source: string | null;
  characterCountFrom: number | null;
  characterCountTo: number | null;
  settings: Record<string, unknown> | null;
  feedback: Record<string, unknown> | null;
}

export interface TranscriptSummary {
  totalItems: number;
  userMessages: number;
  assistantMessages: number;
}

export interface ConversationalAiRecord extends CallRecordBase {
  type: "conversational_ai";
  agentId: string | null;
  durationSecs: number | null;
  status: string | null;
  totalLlmTokens: number;
  acceptedTime: number | null;
  terminationReason: string | null;
  mainLanguage: string | null;
  chargingInfo: Record<string, unknown> | null;
  phoneCallInfo: Record<string, unknown> | null;
  errorInfo: Record<string, unknown> | null;
  transcriptSummary: TranscriptSummary | null;
  /** Set when the conversation details could not be fetched. */
  error?: string;
}

export type CallRecord = Readonly<SpeechGenerationRecord> | Readonly<ConversationalAiRecord>;

/** A closed [start, end] window in milliseconds since epoch. */
export interface TimeWindow {
  startMs: number;
  endMs: number;
}
