import Fastify, { type FastifyServerOptions } from "fastify";
import type { AppConfig } from "./libs/config.js";
import type { ProductDataset } from "./libs/dataset.js";
import type { DecisionLogger } from "./libs/decisionLog.js";
import { setErrorHandler } from "./libs/errors.js";
import type { LanguageModel } from "./libs/gemini.js";
import { registerCatalogModule } from "./modules/catalog/index.js";
import { registerModerationModule } from "./modules/moderation/index.js";
import { registerPricingModule } from "./modules/pricing/index.js";
import { registerRecommendationModule } from "./modules/recommendation/index.js";

/** Everything the handlers need, constructed once per process and injected here. */
export type AppDeps = {
  config: Pick<AppConfig, "llm" | "pricing" | "moderation" | "recommendation">;
  dataset: ProductDataset;
  decisionLog: DecisionLogger;
  model: LanguageModel;
};

export async function buildApp(deps: AppDeps, opts: { logger?: FastifyServerOptions["logger"] } = {}) {
  const app = Fastify({
    logger: opts.logger ?? true,
    trustProxy: true,
  });

  setErrorHandler(app);

  // Pending decision records are written before the process exits.
  app.addHook("onClose", async () => {
    await deps.decisionLog.flush();
  });

  app.get("/healthz", async (req) => ({ ok: true, requestId: req.id }));

  await registerPricingModule(app, {
    dataset: deps.dataset,
    decisionLog: deps.decisionLog,
    model: deps.model,
    pricing: deps.config.pricing,
    llmTimeoutMs: deps.config.llm.timeoutMs,
  });
  await registerModerationModule(app, { decisionLog: deps.decisionLog, moderation: deps.config.moderation });
  await registerRecommendationModule(app, { dataset: deps.dataset, recommendation: deps.config.recommendation });
  await registerCatalogModule(app, deps.dataset);

  return app;
}
