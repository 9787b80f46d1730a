import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import pino from "pino";
import { buildApp } from "./app.js";
import { loadConfig } from "./libs/config.js";
import { loadDatasetFromCsv } from "./libs/dataset.js";
import { DecisionLog } from "./libs/decisionLog.js";
import { createLanguageModel } from "./libs/gemini.js";

// Secrets come only from process.env; .env.local / .env are a local-development convenience.
const dotenvCandidates = [
  process.env.DOTENV_CONFIG_PATH,
  path.resolve(process.cwd(), ".env.local"),
  path.resolve(process.cwd(), ".env"),
  path.resolve(process.cwd(), "..", ".env.local"),
  path.resolve(process.cwd(), "..", ".env"),
].filter((p): p is string => Boolean(p));

const dotenvPath = dotenvCandidates.find((p) => fs.existsSync(p));
dotenv.config(dotenvPath ? { path: dotenvPath } : undefined);

async function main() {
  const config = loadConfig();
  const dataset = loadDatasetFromCsv(config.dataPath);
  const model = createLanguageModel(config.llm);

  const logger = pino({ level: process.env.LOG_LEVEL ?? "info" });
  const decisionLog = new DecisionLog(config.logDir, logger);
  const app = await buildApp({ config, dataset, decisionLog, model }, { logger });

  app.log.info(
    { products: dataset.size, llmProvider: config.llm.provider, model: model.modelVersion, logDir: config.logDir },
    "Marketplace agents starting",
  );
  if (config.llm.provider === "none") {
    app.log.warn({}, "No model credentials configured; price suggestions use the rule estimate only");
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "Shutting down");
      app
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          app.log.error({ err }, "Shutdown failed");
          process.exit(1);
        });
    });
  }

  // Container environments need 0.0.0.0 to be reachable from outside.
  await app.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
