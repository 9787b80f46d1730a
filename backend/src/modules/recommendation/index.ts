import type { FastifyInstance } from "fastify";
import { registerRecommendationRoutes, type RecommendationModuleDeps } from "./routes.js";

export { recommendSimilar, similarityScore } from "./recommend.js";
export type { RecommendationEntry, RecommendationResult } from "./types.js";
export type { RecommendationModuleDeps } from "./routes.js";

export async function registerRecommendationModule(app: FastifyInstance, deps: RecommendationModuleDeps) {
  await registerRecommendationRoutes(app, deps);
}
