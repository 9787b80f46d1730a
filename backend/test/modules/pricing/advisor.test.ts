import { advisePriceBand } from "../../../src/modules/pricing/advisor.js";
import { normalizeProduct } from "../../../src/modules/pricing/product.js";
import { ModelCallError, type LanguageModel } from "../../../src/libs/gemini.js";
import { silentLog } from "../../../src/libs/log.js";
import { FakeModel, modelFailing, modelReplying, testConfig } from "../../helpers.js";

const pricing = testConfig().pricing;
const RULE_REASON = "Rule-based estimate: Mobile / Apple, base 70000 (brand), condition Good x0.75, age 24 months x0.880.";

const iphone = normalizeProduct({
  title: "iPhone 12",
  category: "Mobile",
  brand: "Apple",
  condition: "Good",
  age_months: 24,
  asking_price: 35000,
  location: "Mumbai",
});

function deps(model: LanguageModel) {
  return { model, pricing, timeoutMs: 1500, log: silentLog };
}

describe("advisePriceBand", () => {
  it("returns the model band when it is usable and plausible", async () => {
    const model = modelReplying('{"min_price": 40000, "max_price": 45000, "reason": "Comparable listings in Mumbai."}');
    await expect(advisePriceBand(iphone, deps(model))).resolves.toEqual({
      min_price: 40000,
      max_price: 45000,
      reason: "LLM estimate: Comparable listings in Mumbai.",
      source: "llm",
    });
  });

  it("sends every product attribute and the configured timeout", async () => {
    const model = modelReplying('{"min_price": 40000, "max_price": 45000}');
    await advisePriceBand(iphone, deps(model));

    expect(model.calls).toHaveLength(1);
    expect(model.calls[0].timeoutMs).toBe(1500);
    const { prompt } = model.calls[0];
    for (const line of [
      "Title: iPhone 12",
      "Category: Mobile",
      "Brand: Apple",
      "Condition: Good",
      "Age in months: 24",
      "Asking price: 35000",
      "Location: Mumbai",
    ]) {
      expect(prompt).toContain(line);
    }
    expect(prompt).toContain('{"min_price": number, "max_price": number, "reason": "short justification"}');
  });

  it("falls back to the rule band on a timeout", async () => {
    await expect(advisePriceBand(iphone, deps(modelFailing()))).resolves.toEqual({
      min_price: 43890,
      max_price: 48510,
      reason: `${RULE_REASON} Fallback used: model call failed (timeout).`,
      source: "rule-fallback",
    });
  });

  it("falls back on non-2xx responses", async () => {
    const band = await advisePriceBand(iphone, deps(modelFailing(new ModelCallError("http", "Gemini error 500", 500))));
    expect(band.source).toBe("rule-fallback");
    expect(band.reason).toBe(`${RULE_REASON} Fallback used: model call failed (http).`);
  });

  it("falls back on unexpected exceptions from the client", async () => {
    const band = await advisePriceBand(iphone, deps(modelFailing(new Error("boom"))));
    expect(band.reason).toBe(`${RULE_REASON} Fallback used: model call failed.`);
  });

  it("falls back when the completion cannot be parsed", async () => {
    const band = await advisePriceBand(iphone, deps(modelReplying("I am not sure about this one.")));
    expect(band).toEqual({
      min_price: 43890,
      max_price: 48510,
      reason: `${RULE_REASON} Fallback used: model output unusable (fewer than two numbers in completion).`,
      source: "rule-fallback",
    });
  });

  it("overrides a band far from the rule estimate", async () => {
    const band = await advisePriceBand(iphone, deps(modelReplying('{"min_price": 400000, "max_price": 500000}')));
    expect(band).toEqual({
      min_price: 43890,
      max_price: 48510,
      reason: `${RULE_REASON} Fallback used: model band 400000-500000 overridden, more than 3x outside the rule estimate.`,
      source: "rule-fallback",
    });
  });

  it("overrides a band too wide to bound the listing, even with a plausible midpoint", async () => {
    const band = await advisePriceBand(iphone, deps(modelReplying('{"min_price": 1, "max_price": 90000}')));
    expect(band).toEqual({
      min_price: 43890,
      max_price: 48510,
      reason: `${RULE_REASON} Fallback used: model band 1-90000 overridden, more than 3x outside the rule estimate.`,
      source: "rule-fallback",
    });
  });

  it("does not read numbers from the product title as prices", async () => {
    const band = await advisePriceBand(iphone, deps(modelReplying("For the iPhone 12 a fair range is 40000 to 45000")));
    expect(band).toEqual({
      min_price: 40000,
      max_price: 45000,
      reason: "LLM estimate: For the iPhone 12 a fair range is 40000 to 45000",
      source: "llm",
    });
  });

  it("never rejects when the client rejects with a non-Error value", async () => {
    const model = new FakeModel(() => Promise.reject("not an error object"));
    await expect(advisePriceBand(iphone, deps(model))).resolves.toMatchObject({ source: "rule-fallback" });
  });
});
