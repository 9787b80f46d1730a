import type { FraudFlag, PriceBand } from "./types.js";

/**
 * Asking price against the final band. Boundaries are inclusive of Normal:
 * exactly max * (1 + tolerance) is not Overpriced.
 */
export function classifyFraud(
  askingPrice: number,
  band: Pick<PriceBand, "min_price" | "max_price">,
  tolerance: number,
): FraudFlag {
  if (askingPrice > band.max_price * (1 + tolerance)) return "Overpriced";
  if (askingPrice < band.min_price * (1 - tolerance)) return "Underpriced";
  return "Normal";
}
