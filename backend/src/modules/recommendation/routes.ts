import type { FastifyInstance } from "fastify";
import type { RecommendationConfig } from "../../libs/config.js";
import type { ProductDataset } from "../../libs/dataset.js";
import { recommendSimilar } from "./recommend.js";

export type RecommendationModuleDeps = {
  dataset: ProductDataset;
  recommendation: RecommendationConfig;
};

export async function registerRecommendationRoutes(app: FastifyInstance, deps: RecommendationModuleDeps) {
  app.get<{ Params: { productId: number }; Querystring: { top_n?: number } }>(
    "/recommend/:productId",
    {
      schema: {
        params: { type: "object", required: ["productId"], properties: { productId: { type: "integer" } } },
        querystring: { type: "object", properties: { top_n: { type: "integer", minimum: 1 } } },
      },
    },
    async (req) => {
      const topN = req.query.top_n ?? deps.recommendation.defaultTopN;
      return recommendSimilar(deps.dataset, req.params.productId, topN, deps.recommendation);
    },
  );
}
