#!/usr/bin/env node
import { CronExpressionParser } from "cron-parser";
import cron from "node-cron";
import { config, createStorage } from "./config";
import type { Storage } from "./storage/interface";
import { runScrape } from "./run";
import { logger } from "./utils/logger";

let storage: Storage;
let isShuttingDown = false;

function cleanup() {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info("Shutting down gracefully...");
  cron.getTasks().forEach((task) => task.stop());
  process.exit(0);
}

async function main(): Promise<number> {
  if (!storage) {
    try {
      logger.info("Initializing storage...");
      storage = await createStorage();
    } catch (error) {
      logger.error("Failed to initialize storage:", error);
      return 1;
    }
  }

  return runScrape(storage);
}

function logNextRun(schedule: string) {
  try {
    const expr = CronExpressionParser.parse(schedule);
    const nextRun = expr.next().toDate();
    logger.info(`Next scheduled run: ${nextRun.toLocaleString("en-GB")}`);
  } catch (err) {
    logger.error("Failed to calculate next scheduled run time:", err);
  }
}

const runMain = async () => {
  const status = await main();

  if (status !== 0) {
    logger.error("Scrape failed");
    process.exit(status);
  }

  logger.info("Completed successfully");
  if (!config.cronSchedule) {
    process.exit(0);
  }

  const schedule = config.cronSchedule;
  logger.info(`Scheduling regular runs: ${schedule}`);
  cron.schedule(schedule, async () => {
    if ((await main()) === 0) {
      logger.info("Scheduled run completed successfully");
    }
    logNextRun(schedule);
  });
  logNextRun(schedule);
};

runMain().catch((error) => {
  logger.error("Failed to run main process:", error);
  process.exit(1);
});

process.on("SIGINT", cleanup);
process.on("SIGTERM", cleanup);
