import type { FastifyInstance } from "fastify";
import { registerPricingRoutes, type PricingModuleDeps } from "./routes.js";

export { suggestPrice } from "./suggest.js";
export { advisePriceBand } from "./advisor.js";
export { estimateRuleBand, resolveBasePrice, conditionMultiplier, depreciationFactor } from "./ruleEstimate.js";
export { classifyFraud } from "./fraud.js";
export { parseModelBand, isWithinSanityBounds, stripCodeFence } from "./safeguards.js";
export { normalizeProduct, PRODUCT_DEFAULTS } from "./product.js";
export type { PriceBand, PriceSuggestion, FraudFlag, ProductInput, PricedProduct, ModelBandParse } from "./types.js";
export type { PricingModuleDeps } from "./routes.js";

export async function registerPricingModule(app: FastifyInstance, deps: PricingModuleDeps) {
  await registerPricingRoutes(app, deps);
}
