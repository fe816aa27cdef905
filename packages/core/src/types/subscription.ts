export interface DetailedCreditUsage {
  rolloverCreditsUsed: number | null;
  rolloverCreditsQuota: number | null;
  subscriptionCycleCreditsUsed: number | null;
  subscriptionCycleCreditsQuota: number | null;
  manuallyGiftedCreditsUsed: number | null;
  manuallyGiftedCreditsQuota: number | null;
  paidUsageBasedCreditsUsed: number | null;
  actualReportedCredits: number | null;
}

/**
 * Snapshot of the account's plan and quota at the time of the query.
 */
export interface SubscriptionInfo {
  tier: string;
  characterCountUsed: number;
  characterLimit: number;
  nextResetUnix: number | null;
  nextResetFormatted: string | null;
  voiceSlotsUsed: number | null;
  voiceLimit: number | null;
  professionalVoiceSlotsUsed: number | null;
  professionalVoiceLimit: number | null;
  status: string | null;
  currency: string | null;
  detailedUsage?: DetailedCreditUsage;
}
