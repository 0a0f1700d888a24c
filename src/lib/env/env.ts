import * as v from "valibot";

import { type Env, envSchema } from "./schema";

export const parseEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  try {
    return v.parse(envSchema, source);
  } catch (error) {
    if (v.isValiError(error)) {
      console.error("Environment variable validation failed:");
      for (const issue of error.issues) {
        console.error(`  - ${issue.path?.map((item) => String(item.key)).join(".")}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw error;
  }
};

// Parsed on first access so tests can prepare process.env first
let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
};

export type { Env } from "./schema";
