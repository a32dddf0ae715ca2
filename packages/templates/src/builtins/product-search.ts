/**
 * Template: product_search
 *
 * Finds products matching a type, a location and a price range.
 */
import { z } from "zod";
import { defineTemplate } from "../template.js";

export const ProductSearchInput = z.object({
  product_type: z.string().min(1),
  location: z.string().min(1),
  price_range: z.string().min(1),
});

export const ProductSearchOutput = z.object({
  products: z.array(
    z.object({
      name: z.string(),
      price: z.string().optional(),
      vendor: z.string().optional(),
      url: z.string().optional(),
    }).passthrough()
  ),
  total_found: z.number().int().nonnegative(),
});

export type ProductSearchInput = z.infer<typeof ProductSearchInput>;
export type ProductSearchOutput = z.infer<typeof ProductSearchOutput>;

export const productSearch = defineTemplate({
  name: "product_search",
  version: "1.0.0",
  description: "Template for searching products with specific criteria",
  tags: ["search", "commerce"],
  input: ProductSearchInput,
  output: ProductSearchOutput,
  system: "You are a shopping assistant that reports products available in a given market.",
  prompt: (data) => `
Find products matching these criteria:
- Type: ${data.product_type}
- Location: ${data.location}
- Price Range: ${data.price_range}

Return results in JSON format: {"products": [{"name": "...", "price": "...", "vendor": "..."}], "total_found": <integer>}`,
  params: { temperature: 0.2 },
  ttlSeconds: 3600,
  estimatedCost: 0.01,
});
