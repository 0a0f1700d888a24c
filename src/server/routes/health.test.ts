import { describe, expect, it, vi } from "vitest";

import type { Database } from "@/lib/db/client";
import { MARKET, createEngineHarness } from "@/testing/engine-harness";

import { createHealthRoute } from "./health";

interface HealthBody {
  status: string;
  timestamp: string;
  checks: {
    database: { status: string; error?: string };
    prices: { status: string; invalidMarkets: string[] };
  };
}

describe("health route", () => {
  it("should return healthy status when database and prices are fine", async () => {
    const mockDb: Database = {
      execute: vi.fn().mockResolvedValue(undefined),
    } as unknown as Database;
    const { engine } = createEngineHarness();

    const app = createHealthRoute(mockDb, engine);

    const res = await app.fetch(new Request("http://localhost/"));
    const body = (await res.json()) as HealthBody;

    expect(res.status).toBe(200);
    expect(body.status).toBe("healthy");
    expect(body.checks.database.status).toBe("healthy");
    expect(body.checks.prices).toEqual({ status: "healthy", invalidMarkets: [] });
    expect(body.timestamp).toBeDefined();
  });

  it("should return unhealthy status when database check fails", async () => {
    const mockDb: Database = {
      execute: vi.fn().mockRejectedValue(new Error("Connection failed")),
    } as unknown as Database;
    const { engine } = createEngineHarness();

    const app = createHealthRoute(mockDb, engine);

    const res = await app.fetch(new Request("http://localhost/"));
    const body = (await res.json()) as HealthBody;

    expect(res.status).toBe(503);
    expect(body.status).toBe("unhealthy");
    expect(body.checks.database).toEqual({ status: "unhealthy", error: "Connection failed" });
  });

  it("should report markets without a valid price", async () => {
    const mockDb: Database = {
      execute: vi.fn().mockResolvedValue(undefined),
    } as unknown as Database;
    const { engine, setPrice } = createEngineHarness();
    setPrice(0);

    const app = createHealthRoute(mockDb, engine);

    const res = await app.fetch(new Request("http://localhost/"));
    const body = (await res.json()) as HealthBody;

    expect(res.status).toBe(503);
    expect(body.checks.prices).toEqual({ status: "unhealthy", invalidMarkets: [MARKET] });
  });
});
