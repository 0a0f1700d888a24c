import { parseDecimal } from "./decimal";
import { getEnv } from "./env";
import type { LogFormat, LogLevel } from "./logger";

const env = getEnv();

const logLevel: LogLevel = env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug");
const logFormat: LogFormat = env.NODE_ENV === "development" ? "pretty" : "json";

export const config = {
  database: {
    url: env.DATABASE_URL,
  },
  server: {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
  },
  logging: {
    level: logLevel,
    format: logFormat,
  },
  engine: {
    marketsConfigPath: env.MARKETS_CONFIG_PATH,
    priceStaleAfterSeconds: env.PRICE_STALE_AFTER_SECONDS,
    priceDeviationFactor: parseDecimal(env.PRICE_DEVIATION_FACTOR),
    feePoolAccount: env.FEE_POOL_ACCOUNT,
  },
} as const;
