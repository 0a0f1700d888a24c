import { sql } from "drizzle-orm";
import { Hono } from "hono";

import type { PerpsEngine } from "@/engine/types";
import type { Database } from "@/lib/db/client";

type CheckStatus = "healthy" | "unhealthy";

const checkDatabase = async (db: Database): Promise<{ status: CheckStatus; error?: string }> => {
  try {
    await db.execute(sql`SELECT 1`);
    return { status: "healthy" };
  } catch (error) {
    return {
      status: "unhealthy",
      error: error instanceof Error ? error.message : String(error),
    };
  }
};

const checkPrices = (
  engine: Pick<PerpsEngine, "listMarkets" | "assetPrice">,
): { status: CheckStatus; invalidMarkets: string[] } => {
  const invalidMarkets = engine
    .listMarkets()
    .filter((marketKey) => engine.assetPrice(marketKey).invalid);
  return { status: invalidMarkets.length === 0 ? "healthy" : "unhealthy", invalidMarkets };
};

export const createHealthRoute = (
  db: Database,
  engine: Pick<PerpsEngine, "listMarkets" | "assetPrice">,
): Hono => {
  const health = new Hono();

  health.get("/", async (c) => {
    const checks = {
      database: await checkDatabase(db),
      prices: checkPrices(engine),
    };
    const allHealthy = Object.values(checks).every((check) => check.status === "healthy");

    return c.json(
      {
        status: allHealthy ? ("healthy" as const) : ("unhealthy" as const),
        timestamp: new Date().toISOString(),
        checks,
      },
      allHealthy ? 200 : 503,
    );
  });

  return health;
};
