import { advisePriceBand, type PriceAdvisorDeps } from "./advisor.js";
import { classifyFraud } from "./fraud.js";
import { normalizeProduct } from "./product.js";
import type { PriceSuggestion, ProductInput } from "./types.js";

export type PriceSuggestionDeps = PriceAdvisorDeps;

/**
 * Band from the advisor (model or rule fallback), then the fraud flag from that final band.
 * Resolves for every input; missing product fields take PRODUCT_DEFAULTS.
 */
export async function suggestPrice(input: ProductInput, deps: PriceSuggestionDeps): Promise<PriceSuggestion> {
  const product = normalizeProduct(input);
  const band = await advisePriceBand(product, deps);
  const fraud_flag = classifyFraud(product.asking_price, band, deps.pricing.fraudTolerance);
  deps.log.info({ source: band.source, fraud_flag, title: product.title }, "Price suggestion computed");
  return { ...band, fraud_flag };
}
