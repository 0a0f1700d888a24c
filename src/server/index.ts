import { serve } from "@hono/node-server";
import { Hono } from "hono";

import type { InMemoryTreasury, PushPriceOracle } from "../adapters";
import type { MarketDispatcher } from "../engine/dispatcher";
import type { LedgerJournal } from "../engine/journal";
import type { PerpsEngine } from "../engine/types";
import type { Database } from "../lib/db/client";
import type { Logger } from "../lib/logger/logger";
import { createCommandsRoute } from "./routes/commands";
import { createHealthRoute } from "./routes/health";
import { createMarketsRoute } from "./routes/markets";
import { type MetricsSources, createMetricsRoute, createMetricsStore } from "./routes/metrics";
import { createPricesRoute } from "./routes/prices";
import { createTreasuryRoute } from "./routes/treasury";

export interface AppDeps extends MetricsSources {
  logger: Logger;
  db: Database;
  engine: PerpsEngine;
  dispatcher: Pick<MarketDispatcher, "dispatch" | "getMetrics">;
  journal: Pick<LedgerJournal, "persistBalances" | "getMetrics">;
  oracle: Pick<PushPriceOracle, "currentPrice" | "setPrice">;
  treasury: Pick<InMemoryTreasury, "balanceOf" | "deposit">;
}

export interface ServerDeps extends AppDeps {
  port: number;
}

export interface HttpServer {
  port: number;
  close: () => Promise<void>;
}

export const createApp = (deps: AppDeps): Hono => {
  const app = new Hono();
  const metricsStore = createMetricsStore();

  // Request logging middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    deps.logger.info("HTTP request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: duration,
    });
    metricsStore.incrementHttpRequests();
    metricsStore.recordDuration(duration);
  });

  // Routes
  app.get("/", (c) => c.json({ message: "Perps margin engine API" }));
  app.route("/health", createHealthRoute(deps.db, deps.engine));
  app.route("/metrics", createMetricsRoute(metricsStore, deps));
  app.route("/markets", createMarketsRoute(deps.engine));
  app.route("/markets", createCommandsRoute(deps.dispatcher));
  app.route("/prices", createPricesRoute(deps.oracle));
  app.route("/treasury", createTreasuryRoute(deps.treasury, deps.journal));

  return app;
};

export const startHttpServer = async (deps: ServerDeps): Promise<HttpServer> => {
  const app = createApp(deps);

  const server = serve(
    {
      fetch: app.fetch,
      port: deps.port,
    },
    (info) => {
      deps.logger.info(`HTTP server listening on port ${info.port}`);
    },
  );

  return {
    port: deps.port,
    close: async (): Promise<void> => {
      return new Promise<void>((resolve) => {
        server.close(() => {
          deps.logger.info("HTTP server closed");
          resolve();
        });
      });
    },
  };
};
