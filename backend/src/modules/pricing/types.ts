export type PriceSource = "llm" | "rule-fallback";

/** Fair-price band. Invariant: 0 < min_price <= max_price. */
export type PriceBand = {
  min_price: number;
  max_price: number;
  reason: string;
  source: PriceSource;
};

export const FRAUD_FLAGS = ["Normal", "Overpriced", "Underpriced"] as const;
export type FraudFlag = (typeof FRAUD_FLAGS)[number];

export type PriceSuggestion = PriceBand & { fraud_flag: FraudFlag };

/** Product attributes as they arrive from a manual payload or a dataset record; anything may be missing. */
export type ProductInput = {
  title?: string;
  category?: string;
  brand?: string;
  condition?: string;
  age_months?: number;
  asking_price?: number;
  location?: string;
};

/** Product attributes after defaults are applied; what the estimators work on. */
export type PricedProduct = Required<ProductInput>;

/** Outcome of reading a model completion as a price band. */
export type ModelBandParse =
  | { ok: true; min_price: number; max_price: number; reason: string }
  | { ok: false; problem: string };
