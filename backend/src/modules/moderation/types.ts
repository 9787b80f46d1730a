export const MODERATION_STATUSES = ["PhoneNumber", "Abusive", "Spam", "Safe"] as const;
export type ModerationStatus = (typeof MODERATION_STATUSES)[number];

export type ModerationResult = {
  status: ModerationStatus;
  reason: string;
};
