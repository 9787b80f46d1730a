import type { FastifyInstance } from "fastify";
import type { PricingConfig } from "../../libs/config.js";
import type { ProductDataset } from "../../libs/dataset.js";
import type { DecisionLogger } from "../../libs/decisionLog.js";
import type { LanguageModel } from "../../libs/gemini.js";
import { suggestPrice } from "./suggest.js";

export type PricingModuleDeps = {
  dataset: ProductDataset;
  decisionLog: DecisionLogger;
  model: LanguageModel;
  pricing: PricingConfig;
  llmTimeoutMs: number;
};

type ManualProductBody = {
  title: string;
  category: string;
  brand: string;
  condition: string;
  age_months: number;
  asking_price: number;
  location?: string;
};

const nonEmpty = { type: "string", minLength: 1, pattern: "\\S" } as const;

export async function registerPricingRoutes(app: FastifyInstance, deps: PricingModuleDeps) {
  app.post<{ Body: ManualProductBody }>(
    "/negotiate",
    {
      schema: {
        body: {
          type: "object",
          required: ["title", "category", "brand", "condition", "age_months", "asking_price"],
          properties: {
            title: nonEmpty,
            category: nonEmpty,
            brand: nonEmpty,
            condition: nonEmpty,
            age_months: { type: "integer", minimum: 0 },
            asking_price: { type: "number", exclusiveMinimum: 0 },
            location: { type: "string" },
          },
        },
      },
    },
    async (req) => {
      const product = req.body;
      const suggestion = await suggestPrice(product, {
        model: deps.model,
        pricing: deps.pricing,
        timeoutMs: deps.llmTimeoutMs,
        log: req.log,
      });
      deps.decisionLog.append({ kind: "negotiation", productId: null, input: product, output: suggestion });
      return suggestion;
    },
  );

  app.get<{ Params: { productId: number } }>(
    "/negotiate/:productId",
    {
      schema: {
        params: { type: "object", required: ["productId"], properties: { productId: { type: "integer" } } },
      },
    },
    async (req) => {
      const product = deps.dataset.getOrThrow(req.params.productId);
      const suggestion = await suggestPrice(product, {
        model: deps.model,
        pricing: deps.pricing,
        timeoutMs: deps.llmTimeoutMs,
        log: req.log,
      });
      deps.decisionLog.append({ kind: "negotiation", productId: product.id, input: product, output: suggestion });
      return { product, suggestion };
    },
  );
}
