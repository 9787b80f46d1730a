import type { PricedProduct, ProductInput } from "./types.js";

export const PRODUCT_DEFAULTS: PricedProduct = {
  title: "Unknown",
  category: "Unknown",
  brand: "Unknown",
  condition: "Good",
  age_months: 12,
  asking_price: 1000,
  location: "Unknown",
};

function text(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

/** Fills missing or unusable fields with PRODUCT_DEFAULTS instead of failing. */
export function normalizeProduct(input: ProductInput): PricedProduct {
  const age =
    typeof input.age_months === "number" && Number.isFinite(input.age_months) && input.age_months >= 0
      ? Math.floor(input.age_months)
      : PRODUCT_DEFAULTS.age_months;
  const price =
    typeof input.asking_price === "number" && Number.isFinite(input.asking_price) && input.asking_price > 0
      ? input.asking_price
      : PRODUCT_DEFAULTS.asking_price;
  return {
    title: text(input.title, PRODUCT_DEFAULTS.title),
    category: text(input.category, PRODUCT_DEFAULTS.category),
    brand: text(input.brand, PRODUCT_DEFAULTS.brand),
    condition: text(input.condition, PRODUCT_DEFAULTS.condition),
    age_months: age,
    asking_price: price,
    location: text(input.location, PRODUCT_DEFAULTS.location),
  };
}
