import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

/**
 * Typed service configuration. Secrets and paths come from process.env only;
 * decision tables (prices, moderation words, similarity weights) come from JSON files under config/.
 */

const BrandTableSchema = z.object({
  default: z.number().positive(),
  brands: z.record(z.number().positive()).default({}),
});

export const PricingConfigSchema = z
  .object({
    defaultBasePrice: z.number().positive(),
    basePrices: z.record(BrandTableSchema),
    conditionMultipliers: z.record(z.number().positive()),
    defaultConditionMultiplier: z.number().positive(),
    depreciationPerMonth: z.number().min(0).max(1),
    depreciationFloor: z.number().positive().max(1),
    bandSpread: z.number().min(0).lt(1),
    fraudTolerance: z.number().min(0).lt(1),
    sanityMultiple: z.number().gt(1),
  })
  .transform((c) => ({
    ...c,
    // Lookups are case-insensitive on condition.
    conditionMultipliers: Object.fromEntries(
      Object.entries(c.conditionMultipliers).map(([k, v]) => [k.trim().toLowerCase(), v]),
    ),
  }));

export const ModerationConfigSchema = z
  .object({
    phoneMinDigits: z.number().int().min(7),
    phoneMaxDigits: z.number().int(),
    abusiveWords: z.array(z.string().min(1)),
    spamPhrases: z.array(z.string().min(1)),
    maxRepeatedChars: z.number().int().min(1),
    maxRepeatedWords: z.number().int().min(1),
    punctuationRatio: z.number().gt(0).max(1),
    capsRatio: z.number().gt(0).max(1),
    minLengthForRatios: z.number().int().min(1),
  })
  .refine((c) => c.phoneMaxDigits >= c.phoneMinDigits, {
    message: "phoneMaxDigits must be >= phoneMinDigits",
  });

export const RecommendationConfigSchema = z.object({
  weights: z.object({
    category: z.number().int().min(0),
    brand: z.number().int().min(0),
    condition: z.number().int().min(0),
    age: z.number().int().min(0),
    price: z.number().int().min(0),
  }),
  ageWindowMonths: z.number().min(0),
  priceWindow: z.number().min(0),
  defaultTopN: z.number().int().min(1),
});

export type PricingConfig = z.infer<typeof PricingConfigSchema>;
export type ModerationConfig = z.infer<typeof ModerationConfigSchema>;
export type RecommendationConfig = z.infer<typeof RecommendationConfigSchema>;

export type LlmConfig =
  | { provider: "gemini-api"; apiKey: string; model: string; timeoutMs: number }
  | { provider: "vertex"; projectId: string; location: string; model: string; timeoutMs: number }
  | { provider: "none"; model: string; timeoutMs: number };

export type AppConfig = {
  port: number;
  host: string;
  dataPath: string;
  logDir: string;
  llm: LlmConfig;
  pricing: PricingConfig;
  moderation: ModerationConfig;
  recommendation: RecommendationConfig;
};

export const DEFAULT_MODEL = "gemini-2.0-flash";
export const DEFAULT_LOCATION = "us-central1";
const DEFAULT_TIMEOUT_MS = 5000;

type Env = Record<string, string | undefined>;

function envString(env: Env, key: string): string | undefined {
  const v = env[key]?.trim();
  return v ? v : undefined;
}

function envNumber(env: Env, key: string, fallback: number): number;
function envNumber(env: Env, key: string): number | undefined;
function envNumber(env: Env, key: string, fallback?: number): number | undefined {
  const raw = envString(env, key);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new Error(`Invalid numeric value for ${key}: "${raw}"`);
  }
  return n;
}

export function readJsonConfig<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new Error(`Cannot read config ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid config ${filePath}: ${parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}`);
  }
  return parsed.data;
}

function resolveLlm(env: Env): LlmConfig {
  const model = envString(env, "GEMINI_MODEL") ?? DEFAULT_MODEL;
  const timeoutMs = envNumber(env, "LLM_TIMEOUT_MS", DEFAULT_TIMEOUT_MS);
  if (timeoutMs <= 0) throw new Error("LLM_TIMEOUT_MS must be positive");

  const apiKey = envString(env, "GEMINI_API_KEY");
  if (apiKey) return { provider: "gemini-api", apiKey, model, timeoutMs };

  const projectId = envString(env, "GCP_PROJECT") ?? envString(env, "GOOGLE_CLOUD_PROJECT");
  if (projectId) {
    const location = envString(env, "VERTEX_AI_LOCATION") ?? DEFAULT_LOCATION;
    return { provider: "vertex", projectId, location, model, timeoutMs };
  }
  return { provider: "none", model, timeoutMs };
}

/** Paths are resolved against cwd, matching how the server is started from the repo root. */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const configDir = path.resolve(cwd, "backend", "config");
  const pricingPath = path.resolve(cwd, envString(env, "PRICING_CONFIG_PATH") ?? path.join(configDir, "pricing.json"));
  const moderationPath = path.resolve(
    cwd,
    envString(env, "MODERATION_CONFIG_PATH") ?? path.join(configDir, "moderation.json"),
  );
  const recommendationPath = path.resolve(
    cwd,
    envString(env, "RECOMMENDATION_CONFIG_PATH") ?? path.join(configDir, "recommendation.json"),
  );

  const pricing = readJsonConfig(pricingPath, PricingConfigSchema);
  const fraudTolerance = envNumber(env, "FRAUD_TOLERANCE");
  const sanityMultiple = envNumber(env, "LLM_SANITY_MULTIPLE");
  const effectivePricing = PricingConfigSchema.parse({
    ...pricing,
    ...(fraudTolerance !== undefined ? { fraudTolerance } : {}),
    ...(sanityMultiple !== undefined ? { sanityMultiple } : {}),
  });

  return {
    port: envNumber(env, "PORT", 8080),
    host: envString(env, "HOST") ?? "0.0.0.0",
    dataPath: path.resolve(cwd, envString(env, "DATA_PATH") ?? path.join("backend", "data", "products.csv")),
    logDir: path.resolve(cwd, envString(env, "LOG_DIR") ?? "logs"),
    llm: resolveLlm(env),
    pricing: effectivePricing,
    moderation: readJsonConfig(moderationPath, ModerationConfigSchema),
    recommendation: readJsonConfig(recommendationPath, RecommendationConfigSchema),
  };
}
