/**
 * Guards on model output. A completion is read as a price band only when it yields two
 * positive ascending bounds; a band far from the rule estimate is rejected.
 *
 * Grammar:
 * 1. Trim, then strip one surrounding markdown code fence (``` or ```json).
 * 2. A JSON object with numeric min_price and max_price (numeric strings allowed) is authoritative.
 * 3. Otherwise the first two standalone numbers are min and max; the whole text is the justification.
 *    Numbers inside the product title ("iPhone 12") or glued to letters ("S21", "40k") are skipped.
 * 4. Valid only when 0 < min <= max.
 */

import { z } from "zod";
import type { ModelBandParse, PriceBand } from "./types.js";

export const MAX_REASON_LENGTH = 300;
const NO_REASON = "No justification provided.";

const NUMERIC_TOKEN = /(?<!\w)\d[\d,]*(?:\.\d+)?(?!\w|\.\d)/g;
const CODE_FENCE = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/;

const numeric = z.preprocess(
  (v) => (typeof v === "string" ? Number(v.replace(/,/g, "").trim()) : v),
  z.number().finite(),
);

const ModelBandJson = z.object({
  min_price: numeric,
  max_price: numeric,
  reason: z.string().optional(),
});

export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const m = CODE_FENCE.exec(trimmed);
  return m ? m[1].trim() : trimmed;
}

function collapse(text: string): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > MAX_REASON_LENGTH ? `${flat.slice(0, MAX_REASON_LENGTH - 3)}...` : flat;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function validate(min: number, max: number, reason: string): ModelBandParse {
  if (!(min > 0) || !(max > 0)) return { ok: false, problem: `non-positive bounds ${min}, ${max}` };
  if (min > max) return { ok: false, problem: `descending bounds ${min} > ${max}` };
  return { ok: true, min_price: min, max_price: max, reason: reason.trim() ? collapse(reason) : NO_REASON };
}

export function parseModelBand(raw: string, context: { title?: string } = {}): ModelBandParse {
  const text = stripCodeFence(raw);
  if (text === "") return { ok: false, problem: "empty completion" };

  const json = ModelBandJson.safeParse(tryJson(text));
  if (json.success) {
    return validate(json.data.min_price, json.data.max_price, json.data.reason ?? "");
  }

  const title = context.title?.trim();
  const searchable = title ? text.replace(new RegExp(escapeRegExp(title), "gi"), " ") : text;
  const tokens = (searchable.match(NUMERIC_TOKEN) ?? []).map((t) => Number(t.replace(/,/g, "")));
  if (tokens.length < 2) return { ok: false, problem: "fewer than two numbers in completion" };
  return validate(tokens[0], tokens[1], text);
}

/**
 * True when each model bound stays within `multiple` times the matching rule bound
 * (min >= rule.min / multiple, max <= rule.max * multiple) and the model midpoint is
 * within `multiple` times the rule midpoint either way.
 */
export function isWithinSanityBounds(
  modelBand: Pick<PriceBand, "min_price" | "max_price">,
  ruleBand: Pick<PriceBand, "min_price" | "max_price">,
  multiple: number,
): boolean {
  if (modelBand.min_price < ruleBand.min_price / multiple) return false;
  if (modelBand.max_price > ruleBand.max_price * multiple) return false;
  const modelMid = (modelBand.min_price + modelBand.max_price) / 2;
  const ruleMid = (ruleBand.min_price + ruleBand.max_price) / 2;
  return modelMid <= ruleMid * multiple && modelMid >= ruleMid / multiple;
}
