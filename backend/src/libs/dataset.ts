import fs from "node:fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { notFound } from "./errors.js";

/** Listing record as loaded from the catalogue. Read-only after load. */
export type Product = {
  readonly id: number;
  readonly title: string;
  readonly category: string;
  readonly brand: string;
  readonly condition: string;
  readonly age_months: number;
  readonly asking_price: number;
  readonly location: string;
};

export const ProductRowSchema = z.object({
  id: z.coerce.number().int().positive(),
  title: z.string().trim().min(1),
  category: z.string().trim().min(1),
  brand: z.string().trim().min(1),
  condition: z.string().trim().min(1),
  age_months: z.coerce.number().int().min(0),
  asking_price: z.coerce.number().positive(),
  location: z.string().trim().default("Unknown"),
});

export class ProductDataset {
  private readonly products: readonly Product[];
  private readonly byId: ReadonlyMap<number, Product>;

  constructor(products: Product[]) {
    const frozen = products.map((p) => Object.freeze({ ...p }));
    const byId = new Map<number, Product>();
    for (const p of frozen) {
      if (byId.has(p.id)) throw new Error(`Duplicate product id ${p.id}`);
      byId.set(p.id, p);
    }
    this.products = Object.freeze(frozen);
    this.byId = byId;
  }

  get(id: number): Product | null {
    return this.byId.get(id) ?? null;
  }

  getOrThrow(id: number): Product {
    const product = this.get(id);
    if (!product) throw notFound(`Product with id ${id} not found.`);
    return product;
  }

  /** Dataset order; recommendation tie-breaks depend on it. */
  listAll(): readonly Product[] {
    return this.products;
  }

  first(): Product | null {
    return this.products[0] ?? null;
  }

  get size(): number {
    return this.products.length;
  }
}

export function parseProductsCsv(csv: string): Product[] {
  const rows: unknown[] = parse(csv, { columns: true, skip_empty_lines: true, trim: true });
  return rows.map((row, i) => {
    const parsed = ProductRowSchema.safeParse(row);
    if (!parsed.success) {
      // +2: header line and 1-based numbering
      const issues = parsed.error.issues.map((iss) => `${iss.path.join(".")}: ${iss.message}`).join("; ");
      throw new Error(`Invalid product row at line ${i + 2}: ${issues}`);
    }
    return parsed.data;
  });
}

export function loadDatasetFromCsv(filePath: string): ProductDataset {
  const csv = fs.readFileSync(filePath, "utf8");
  return new ProductDataset(parseProductsCsv(csv));
}
