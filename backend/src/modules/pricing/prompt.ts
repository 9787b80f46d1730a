import type { PricedProduct } from "./types.js";

export function buildPricePrompt(product: PricedProduct): string {
  return (
    "You are a second-hand marketplace pricing expert.\n" +
    "Suggest a fair resale price range (min_price, max_price) for the following product.\n\n" +
    "Product details:\n" +
    `Title: ${product.title}\n` +
    `Category: ${product.category}\n` +
    `Brand: ${product.brand}\n` +
    `Condition: ${product.condition}\n` +
    `Age in months: ${product.age_months}\n` +
    `Asking price: ${product.asking_price}\n` +
    `Location: ${product.location}\n\n` +
    "Respond ONLY with JSON in this exact format, numbers without currency symbols:\n" +
    '{"min_price": number, "max_price": number, "reason": "short justification"}'
  );
}
