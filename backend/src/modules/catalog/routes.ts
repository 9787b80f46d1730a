import type { FastifyInstance } from "fastify";
import type { ProductDataset } from "../../libs/dataset.js";
import { notFound } from "../../libs/errors.js";

export async function registerCatalogRoutes(app: FastifyInstance, dataset: ProductDataset) {
  app.get("/sample-product", async () => {
    const product = dataset.first();
    if (!product) throw notFound("Dataset is empty.");
    return product;
  });
}
