/**
 * Deterministic fair-price band from category/brand base prices, condition and age.
 * Pure; used as the fallback for the model and as the reference for its sanity check.
 */

import type { PricingConfig } from "../../libs/config.js";
import type { PriceBand, PricedProduct } from "./types.js";

export type BasePriceSource = "brand" | "category" | "default";

function findKey<T>(table: Record<string, T>, key: string): T | undefined {
  const wanted = key.trim().toLowerCase();
  const match = Object.keys(table).find((k) => k.toLowerCase() === wanted);
  return match === undefined ? undefined : table[match];
}

export function resolveBasePrice(
  category: string,
  brand: string,
  config: PricingConfig,
): { price: number; source: BasePriceSource } {
  const categoryTable = findKey(config.basePrices, category);
  if (!categoryTable) return { price: config.defaultBasePrice, source: "default" };
  const brandPrice = findKey(categoryTable.brands, brand);
  if (brandPrice !== undefined) return { price: brandPrice, source: "brand" };
  return { price: categoryTable.default, source: "category" };
}

export function conditionMultiplier(condition: string, config: PricingConfig): number {
  return config.conditionMultipliers[condition.trim().toLowerCase()] ?? config.defaultConditionMultiplier;
}

/** Straight-line depreciation, never below the configured floor. */
export function depreciationFactor(ageMonths: number, config: PricingConfig): number {
  const age = Number.isFinite(ageMonths) && ageMonths > 0 ? ageMonths : 0;
  return Math.max(1 - age * config.depreciationPerMonth, config.depreciationFloor);
}

export function estimateRuleBand(product: PricedProduct, config: PricingConfig): PriceBand {
  const base = resolveBasePrice(product.category, product.brand, config);
  const condition = conditionMultiplier(product.condition, config);
  const depreciation = depreciationFactor(product.age_months, config);
  const midpoint = base.price * condition * depreciation;

  const min_price = Math.max(1, Math.round(midpoint * (1 - config.bandSpread)));
  const max_price = Math.max(min_price, Math.round(midpoint * (1 + config.bandSpread)));

  const reason =
    `Rule-based estimate: ${product.category} / ${product.brand}, base ${base.price} (${base.source}), ` +
    `condition ${product.condition} x${condition}, age ${product.age_months} months x${depreciation.toFixed(3)}.`;
  return { min_price, max_price, reason, source: "rule-fallback" };
}
