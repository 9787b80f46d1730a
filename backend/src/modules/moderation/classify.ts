import type { ModerationConfig } from "../../libs/config.js";
import { ruleAbusive, rulePhoneNumber, ruleSpam } from "./rules.js";
import type { ModerationResult, ModerationStatus } from "./types.js";

type Rule = { status: Exclude<ModerationStatus, "Safe">; check: (message: string, config: ModerationConfig) => string | null };

/** Evaluated in order; the first rule that fires decides the status. */
export const MODERATION_RULES: readonly Rule[] = [
  { status: "PhoneNumber", check: rulePhoneNumber },
  { status: "Abusive", check: ruleAbusive },
  { status: "Spam", check: ruleSpam },
];

export function classifyMessage(message: string, config: ModerationConfig): ModerationResult {
  for (const rule of MODERATION_RULES) {
    const reason = rule.check(message, config);
    if (reason !== null) return { status: rule.status, reason };
  }
  return { status: "Safe", reason: "No moderation rule matched." };
}
