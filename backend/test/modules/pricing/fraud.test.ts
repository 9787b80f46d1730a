import { classifyFraud } from "../../../src/modules/pricing/fraud.js";
import { FRAUD_FLAGS } from "../../../src/modules/pricing/types.js";

const band = { min_price: 100, max_price: 200 };

describe("classifyFraud", () => {
  it("treats the exact tolerance boundary as Normal", () => {
    expect(classifyFraud(250, band, 0.25)).toBe("Normal");
    expect(classifyFraud(75, band, 0.25)).toBe("Normal");
  });

  it("flags just beyond the boundary", () => {
    expect(classifyFraud(250.01, band, 0.25)).toBe("Overpriced");
    expect(classifyFraud(74.99, band, 0.25)).toBe("Underpriced");
  });

  it("uses the band edges directly with zero tolerance", () => {
    expect(classifyFraud(200, band, 0)).toBe("Normal");
    expect(classifyFraud(201, band, 0)).toBe("Overpriced");
    expect(classifyFraud(99, band, 0)).toBe("Underpriced");
  });

  it("follows the configured tolerance threshold", () => {
    const upper = band.max_price * (1 + 0.1);
    const lower = band.min_price * (1 - 0.1);
    expect(classifyFraud(upper, band, 0.1)).toBe("Normal");
    expect(classifyFraud(upper + 0.01, band, 0.1)).toBe("Overpriced");
    expect(classifyFraud(lower, band, 0.1)).toBe("Normal");
    expect(classifyFraud(lower - 0.01, band, 0.1)).toBe("Underpriced");
  });

  it("always returns exactly one known flag", () => {
    for (const price of [0.01, 50, 90, 100, 150, 200, 220, 221, 10_000]) {
      expect(FRAUD_FLAGS).toContain(classifyFraud(price, band, 0.1));
    }
  });
});
