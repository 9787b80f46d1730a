import path from "node:path";
import { REPO_ROOT, testConfig } from "../helpers.js";

describe("loadConfig", () => {
  it("applies defaults and reads the decision tables", () => {
    const config = testConfig();

    expect(config.port).toBe(8080);
    expect(config.host).toBe("0.0.0.0");
    expect(config.dataPath).toBe(path.join(REPO_ROOT, "backend", "data", "products.csv"));
    expect(config.logDir).toBe(path.join(REPO_ROOT, "logs"));
    expect(config.llm).toEqual({ provider: "none", model: "gemini-2.0-flash", timeoutMs: 5000 });
    expect(config.pricing.fraudTolerance).toBe(0.1);
    expect(config.pricing.sanityMultiple).toBe(3);
    expect(config.pricing.conditionMultipliers["like new"]).toBe(0.9);
    expect(config.moderation.abusiveWords).toContain("idiot");
    expect(config.recommendation.weights).toEqual({ category: 1, brand: 1, condition: 1, age: 1, price: 1 });
  });

  it("prefers a Gemini API key over Vertex settings", () => {
    const config = testConfig({ GEMINI_API_KEY: "test-key", GCP_PROJECT: "demo-project", LLM_TIMEOUT_MS: "2500" });
    expect(config.llm).toEqual({ provider: "gemini-api", apiKey: "test-key", model: "gemini-2.0-flash", timeoutMs: 2500 });
  });

  it("uses Vertex AI when only a project is configured", () => {
    const config = testConfig({ GOOGLE_CLOUD_PROJECT: "demo-project", GEMINI_MODEL: "gemini-1.5-flash" });
    expect(config.llm).toEqual({
      provider: "vertex",
      projectId: "demo-project",
      location: "us-central1",
      model: "gemini-1.5-flash",
      timeoutMs: 5000,
    });
  });

  it("lets the environment override fraud tolerance and sanity multiple", () => {
    const config = testConfig({ FRAUD_TOLERANCE: "0.2", LLM_SANITY_MULTIPLE: "5" });
    expect(config.pricing.fraudTolerance).toBe(0.2);
    expect(config.pricing.sanityMultiple).toBe(5);
  });

  it("rejects non-numeric values", () => {
    expect(() => testConfig({ LLM_TIMEOUT_MS: "soon" })).toThrow('Invalid numeric value for LLM_TIMEOUT_MS: "soon"');
  });

  it("rejects out-of-range overrides", () => {
    expect(() => testConfig({ FRAUD_TOLERANCE: "1.5" })).toThrow();
    expect(() => testConfig({ LLM_TIMEOUT_MS: "0" })).toThrow("LLM_TIMEOUT_MS must be positive");
  });

  it("fails when a config file is missing", () => {
    expect(() => testConfig({ PRICING_CONFIG_PATH: "backend/config/missing.json" })).toThrow(/^Cannot read config /);
  });
});
