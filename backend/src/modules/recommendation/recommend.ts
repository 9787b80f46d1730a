/**
 * Similar-product recommendation by shared attributes.
 * Score is a weighted count of matches; symmetric in its two arguments.
 * Ties keep dataset order (Array.prototype.sort is stable).
 */

import type { RecommendationConfig } from "../../libs/config.js";
import type { Product, ProductDataset } from "../../libs/dataset.js";
import { validationError } from "../../libs/errors.js";
import type { RecommendationEntry, RecommendationResult } from "./types.js";

type Scored = Pick<Product, "category" | "brand" | "condition" | "age_months" | "asking_price">;

function sameText(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export function similarityScore(a: Scored, b: Scored, config: RecommendationConfig): number {
  const { weights } = config;
  let score = 0;
  if (sameText(a.category, b.category)) score += weights.category;
  if (sameText(a.brand, b.brand)) score += weights.brand;
  if (sameText(a.condition, b.condition)) score += weights.condition;
  if (Math.abs(a.age_months - b.age_months) <= config.ageWindowMonths) score += weights.age;
  if (Math.abs(a.asking_price - b.asking_price) <= config.priceWindow) score += weights.price;
  return score;
}

export function recommendSimilar(
  dataset: ProductDataset,
  productId: number,
  topN: number,
  config: RecommendationConfig,
): RecommendationResult {
  if (!Number.isInteger(topN) || topN < 1) {
    throw validationError("top_n must be an integer >= 1", { top_n: topN });
  }
  const target = dataset.getOrThrow(productId);

  const recommendations: RecommendationEntry[] = dataset
    .listAll()
    .filter((p) => p.id !== target.id)
    .map((p) => ({ product_id: p.id, title: p.title, similarity: similarityScore(target, p, config) }))
    .sort((a, b) => b.similarity - a.similarity)
    .slice(0, topN);

  return { product_id: target.id, title: target.title, recommendations };
}
