import { Hono } from "hono";
import * as v from "valibot";

import type { PushPriceOracle } from "@/adapters";
import type { PriceReading } from "@/adapters/types";
import { decimalStringSchema, formatDecimal } from "@/lib/decimal";

type PriceFeed = Pick<PushPriceOracle, "currentPrice" | "setPrice">;

const PriceUpdateSchema = v.object({
  price: decimalStringSchema,
  invalid: v.optional(v.boolean(), false),
});

const renderReading = (asset: string, reading: PriceReading) => ({
  asset,
  price: formatDecimal(reading.price),
  invalid: reading.invalid,
  roundId: reading.roundId,
});

export const createPricesRoute = (oracle: PriceFeed): Hono => {
  const prices = new Hono();

  prices.get("/:asset", (c) => {
    const asset = c.req.param("asset");
    return c.json(renderReading(asset, oracle.currentPrice(asset)));
  });

  prices.post("/:asset", async (c) => {
    const body: unknown = await c.req.json().catch(() => undefined);
    const parsed = v.safeParse(PriceUpdateSchema, body);
    if (!parsed.success) {
      return c.json({ error: "INVALID_REQUEST", message: v.summarize(parsed.issues) }, 400);
    }
    const asset = c.req.param("asset");
    return c.json(renderReading(asset, oracle.setPrice(asset, parsed.output)));
  });

  return prices;
};
