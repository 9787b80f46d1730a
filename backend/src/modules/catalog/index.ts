import type { FastifyInstance } from "fastify";
import type { ProductDataset } from "../../libs/dataset.js";
import { registerCatalogRoutes } from "./routes.js";

export async function registerCatalogModule(app: FastifyInstance, dataset: ProductDataset) {
  await registerCatalogRoutes(app, dataset);
}
