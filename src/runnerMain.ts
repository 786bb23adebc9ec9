/**
 * Runner entrypoint: crawl every due owner, once or on a timer
 *
 * Usage:
 *   npm start                    # RUN_MODE=once (default): one cycle, then exit
 *   RUN_MODE=forever npm start   # cycle, wait CYCLE_INTERVAL_MS, repeat
 *
 * Environment (all optional, see .env.example):
 *   RUN_MODE, LOG_LEVEL, DB_PATH, OWNERS_FILE, CRAWL_CONCURRENCY,
 *   OWNER_TIMEOUT_MS, CYCLE_INTERVAL_MS
 *
 * Exit code 1 when the configuration is invalid, start-up fails, or (in
 * once mode) any owner crawl failed.
 */

import "dotenv/config";
import { loadRunnerConfig } from "./config";
import { closeDb, openDb, runMigrations } from "./db";
import { createJobClassifier } from "./classification";
import { RequirementsExtractor } from "./requirements";
import { PostingEnricher } from "./ingestion";
import { createDefaultSourceRegistry } from "./sources";
import { createLoggingNotifier } from "./notifications";
import {
  CrawlTimer,
  runCrawlCycle,
  syncOwnersFromFile,
  type CrawlCycleDeps,
} from "./orchestration";
import * as logger from "./logger";

async function main(): Promise<number> {
  const config = loadRunnerConfig();
  logger.setLogLevel(config.logLevel);

  openDb(config.dbPath);
  runMigrations();
  syncOwnersFromFile(config.ownersFile);

  const classifier = createJobClassifier();
  const deps: CrawlCycleDeps = {
    registry: createDefaultSourceRegistry(),
    enricher: new PostingEnricher({
      classifier,
      summarizer: new RequirementsExtractor(),
    }),
    notifier: createLoggingNotifier(),
    ownerTimeoutMs: config.ownerTimeoutMs,
    concurrency: config.crawlConcurrency,
  };

  logger.info("Runner configured", {
    runMode: config.runMode,
    dbPath: config.dbPath,
    concurrency: config.crawlConcurrency,
    ownerTimeoutMs: config.ownerTimeoutMs,
    classifierModel: classifier.hasModel,
  });

  if (config.runMode === "once") {
    const result = await runCrawlCycle(deps);
    return result.failed > 0 ? 1 : 0;
  }

  const timer = new CrawlTimer(() => runCrawlCycle(deps), {
    intervalMs: config.cycleIntervalMs,
  });

  await new Promise<void>((resolve) => {
    let stopping = false;
    const handleShutdown = (signal: string): void => {
      if (stopping) {
        logger.warn("Forced shutdown - exiting immediately");
        process.exit(1);
      }
      stopping = true;
      logger.info("Shutdown signal received, stopping after current cycle", {
        signal,
      });
      timer.stop().then(resolve, resolve);
    };

    process.on("SIGINT", () => handleShutdown("SIGINT"));
    process.on("SIGTERM", () => handleShutdown("SIGTERM"));
    timer.start();
  });

  return 0;
}

main()
  .then((exitCode) => {
    closeDb();
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    logger.error("Runner failed with fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    closeDb();
    process.exit(1);
  });
