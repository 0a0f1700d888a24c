/**
 * Perps margin engine service
 *
 * Restores the ledger and settlement balances from postgres, registers the
 * configured markets and serves the HTTP API (price pushes, engine commands,
 * deposits and reads) while the journal persists every committed batch.
 *
 * @see {@link ../adrs/0001-engine-architecture.md ADR-0001: Engine Architecture}
 */

import { readFile } from "node:fs/promises";

import { systemClock } from "./adapters/clock";
import { createPushPriceOracle } from "./adapters/oracle/push-oracle";
import { createSuspensionRegistry } from "./adapters/suspension/suspension-registry";
import { createInMemoryTreasury } from "./adapters/treasury/in-memory-treasury";
import { createPositionLedger } from "./domains/ledger";
import { type MarketsConfig, createParameterStore, parseMarketsConfig } from "./domains/parameters";
import { createMarketDispatcher } from "./engine/dispatcher";
import { createPerpsEngine } from "./engine/engine";
import { createLedgerJournal, restoreLedger } from "./engine/journal";
import { createMarketSettings } from "./engine/settings";
import { config } from "./lib/config";
import { createDatabase, createPostgresLedgerRepository } from "./lib/db";
import { createLogger } from "./lib/logger";
import { startHttpServer } from "./server";

const loadMarketsConfig = async (path: string): Promise<MarketsConfig> => {
  const raw: unknown = JSON.parse(await readFile(path, "utf8"));
  return parseMarketsConfig(raw);
};

const main = async (): Promise<void> => {
  const logger = createLogger({ level: config.logging.level, format: config.logging.format });

  logger.info("Perps margin engine starting...");

  try {
    // 1. Load market definitions
    const marketsConfig = await loadMarketsConfig(config.engine.marketsConfigPath);
    logger.info("Market definitions loaded", {
      path: config.engine.marketsConfigPath,
      markets: marketsConfig.markets.length,
    });

    // 2. Initialize database connection
    logger.info("Initializing database connection...");
    const db = await createDatabase(config.database.url);
    const repository = createPostgresLedgerRepository(db.db);
    logger.info("Database connection established");

    // 3. Restore the ledger and settlement balances
    const ledger = createPositionLedger();
    const restored = await restoreLedger(repository, ledger);
    const balances = await repository.loadBalances();
    const treasury = createInMemoryTreasury({
      initialBalances: Object.fromEntries(balances.map(({ account, balance }) => [account, balance])),
    });
    logger.info("Ledger restored", { markets: restored, accounts: balances.length });

    const parameters = createParameterStore(marketsConfig.globals);
    const definitions = new Map(marketsConfig.markets.map((market) => [market.marketKey, market]));
    for (const marketKey of restored) {
      const definition = definitions.get(marketKey);
      if (!definition) {
        throw new Error(`Market ${marketKey} restored from the database has no definition`);
      }
      parameters.defineMarket(marketKey, definition.parameters);
    }

    // 4. Wire the engine
    const clock = systemClock;
    const oracle = createPushPriceOracle({
      clock,
      staleAfterSeconds: config.engine.priceStaleAfterSeconds,
      deviationFactor: config.engine.priceDeviationFactor,
    });
    const engine = createPerpsEngine({
      ledger,
      parameters,
      oracle,
      treasury,
      suspension: createSuspensionRegistry(),
      clock,
      logger,
      feePoolAccount: config.engine.feePoolAccount,
    });
    const journal = createLedgerJournal({ engine, ledger, repository, treasury, logger });
    const dispatcher = createMarketDispatcher({ engine, logger });
    const settings = createMarketSettings({ ledger, parameters, engine, clock, logger });

    // 5. Register markets added to the definition file since the last run
    for (const definition of marketsConfig.markets) {
      if (ledger.hasMarket(definition.marketKey)) {
        continue;
      }
      settings.addMarket(definition.marketKey, definition.baseAsset, definition.parameters);
      await journal.persistMarket(definition.marketKey);
    }

    // 6. Start HTTP server (health checks, metrics, reads and writes)
    logger.info("Starting HTTP server...");
    const httpServer = await startHttpServer({
      port: config.server.port,
      logger,
      db: db.db,
      engine,
      dispatcher,
      journal,
      oracle,
      treasury,
    });

    // 7. Setup graceful shutdown
    const shutdown = async (signal: string): Promise<void> => {
      logger.info(`Received ${signal}, shutting down`);

      await httpServer.close();

      // Let queued commands commit and their batches reach the database
      await dispatcher.drain();
      await journal.flush();
      journal.stop();

      await db.close();

      logger.info("Graceful shutdown complete");
      process.exit(0);
    };

    const onSignal = (signal: string) => (): void => {
      shutdown(signal).catch((error: unknown) => {
        logger.error(
          "Shutdown failed",
          error instanceof Error ? error : new Error(String(error)),
        );
        process.exit(1);
      });
    };
    process.on("SIGTERM", onSignal("SIGTERM"));
    process.on("SIGINT", onSignal("SIGINT"));

    logger.info("Engine initialized successfully", { markets: engine.listMarkets() });
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error("Fatal error during startup", err);
    process.exit(1);
  }
};

main().catch((error) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
