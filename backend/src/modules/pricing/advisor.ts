/**
 * Model-backed price band. Never throws: any model failure, unusable output, or
 * implausible band degrades to the rule estimate with the cause noted in `reason`.
 */

import type { PricingConfig } from "../../libs/config.js";
import { ModelCallError, type LanguageModel } from "../../libs/gemini.js";
import type { Log } from "../../libs/log.js";
import { buildPricePrompt } from "./prompt.js";
import { estimateRuleBand } from "./ruleEstimate.js";
import { isWithinSanityBounds, parseModelBand } from "./safeguards.js";
import type { PriceBand, PricedProduct } from "./types.js";

export type PriceAdvisorDeps = {
  model: LanguageModel;
  pricing: PricingConfig;
  timeoutMs: number;
  log: Log;
};

function describeFailure(err: unknown): string {
  if (err instanceof ModelCallError) return `model call failed (${err.kind})`;
  return "model call failed";
}

function fallback(rule: PriceBand, note: string): PriceBand {
  return { ...rule, reason: `${rule.reason} Fallback used: ${note}.` };
}

export async function advisePriceBand(product: PricedProduct, deps: PriceAdvisorDeps): Promise<PriceBand> {
  const { model, pricing, timeoutMs, log } = deps;
  const rule = estimateRuleBand(product, pricing);

  let raw: string;
  try {
    raw = await model.complete(buildPricePrompt(product), timeoutMs);
  } catch (err) {
    log.warn({ err, model: model.modelVersion, title: product.title }, "Price model call failed; using rule estimate");
    return fallback(rule, describeFailure(err));
  }

  const parsed = parseModelBand(raw, { title: product.title });
  if (!parsed.ok) {
    log.warn({ problem: parsed.problem, title: product.title }, "Price model output unusable; using rule estimate");
    return fallback(rule, `model output unusable (${parsed.problem})`);
  }

  if (!isWithinSanityBounds(parsed, rule, pricing.sanityMultiple)) {
    log.warn(
      { model_min: parsed.min_price, model_max: parsed.max_price, rule_min: rule.min_price, rule_max: rule.max_price },
      "Price model band overridden by rule estimate",
    );
    return fallback(
      rule,
      `model band ${parsed.min_price}-${parsed.max_price} overridden, more than ${pricing.sanityMultiple}x outside the rule estimate`,
    );
  }

  return {
    min_price: parsed.min_price,
    max_price: parsed.max_price,
    reason: `LLM estimate: ${parsed.reason}`,
    source: "llm",
  };
}
