/**
 * Moderation rules. Each returns a reason when it fires, otherwise null.
 * Pure; every pattern is built from ModerationConfig.
 */

import type { ModerationConfig } from "../../libs/config.js";

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Whole-word (or whole-phrase) match, case-insensitive; inner spaces match any whitespace run. */
export function phrasePattern(phrase: string): RegExp {
  const body = phrase.trim().split(/\s+/).map(escapeRegExp).join("\\s+");
  return new RegExp(`(?<![\\w])${body}(?![\\w])`, "i");
}

// Phone-shaped groups only: ten digits, 5-5 mobile, 3-3-4 or (ddd) ddd dddd, optionally after
// a +country code or a trunk 0. Separators are never stripped across unrelated numbers.
const PHONE =
  /(?<![\d+])(?:\+\d{1,3}[\s-]?|0)?(?:\d{10}|[6-9]\d{4}[\s.]\d{5}|\(\d{3}\)\s?\d{3}[\s.-]?\d{4}|\d{3}[\s.-]\d{3}[\s.-]\d{4})(?!\d)/g;
const LINK = /\bhttps?:\/\/\S+|\bwww\.\S+\.\S+/i;

export function rulePhoneNumber(message: string, config: ModerationConfig): string | null {
  for (const match of message.match(PHONE) ?? []) {
    const digits = match.replace(/\D/g, "").length;
    if (digits >= config.phoneMinDigits && digits <= config.phoneMaxDigits) {
      return "Message contains a phone number.";
    }
  }
  return null;
}

export function ruleAbusive(message: string, config: ModerationConfig): string | null {
  const hit = config.abusiveWords.find((w) => phrasePattern(w).test(message));
  return hit === undefined ? null : `Message contains abusive language ("${hit}").`;
}

export function ruleSpam(message: string, config: ModerationConfig): string | null {
  const phrase = config.spamPhrases.find((p) => phrasePattern(p).test(message));
  if (phrase !== undefined) return `Message contains a spam phrase ("${phrase}").`;

  if (LINK.test(message)) return "Message contains a promotional link.";

  const repeatedChar = new RegExp(`([^\\s\\d])\\1{${config.maxRepeatedChars},}`);
  if (repeatedChar.test(message)) return "Message contains excessively repeated characters.";

  const repeatedWord = new RegExp(`\\b(\\w+)\\b(?:\\W+\\1\\b){${config.maxRepeatedWords},}`, "i");
  if (repeatedWord.test(message)) return "Message contains excessively repeated words.";

  const compact = message.replace(/\s+/g, "");
  if (compact.length >= config.minLengthForRatios) {
    const punctuation = (compact.match(/[!?$*#%@]/g) ?? []).length;
    if (punctuation / compact.length > config.punctuationRatio) {
      return "Message has excessive punctuation.";
    }
    const letters = compact.match(/[a-zA-Z]/g) ?? [];
    const upper = letters.filter((c) => c >= "A" && c <= "Z").length;
    if (letters.length >= config.minLengthForRatios && upper / letters.length > config.capsRatio) {
      return "Message is mostly capital letters.";
    }
  }
  return null;
}
