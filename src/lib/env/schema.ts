import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

const positiveIntegerString = (fallback: string) =>
  v.pipe(
    v.optional(v.string(), fallback),
    v.transform(Number),
    v.number(),
    v.integer(),
    v.minValue(1),
  );

export const envSchema = v.object({
  // Database
  DATABASE_URL: v.pipe(v.string(), v.minLength(1)),

  // Server
  PORT: v.pipe(v.string(), v.transform(Number), v.number(), v.minValue(1), v.maxValue(65535)),
  NODE_ENV: v.picklist(["development", "production", "test"]),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),

  // Engine
  PRICE_STALE_AFTER_SECONDS: positiveIntegerString("90000"),
  PRICE_DEVIATION_FACTOR: v.optional(
    v.pipe(v.string(), v.regex(/^\d+(\.\d+)?$/, "Expected a positive decimal")),
    "3",
  ),
  MARKETS_CONFIG_PATH: v.optional(v.pipe(v.string(), v.minLength(1)), "config/markets.json"),
  FEE_POOL_ACCOUNT: v.optional(v.pipe(v.string(), v.minLength(1)), "fee-pool"),
});

export type Env = v.InferOutput<typeof envSchema>;
