import type { Storage } from "./storage/interface";
import { scrapeSchedule } from "./scraper/scraper";
import type { ScrapeOptions } from "./scraper/scraper";
import { logger } from "./utils/logger";

/**
 * Scrapes once and saves the payload. Resolves to the process exit status:
 * 0 on success, 1 when fetching, extraction or saving failed.
 */
export async function runScrape(storage: Storage, options: ScrapeOptions = {}): Promise<number> {
  try {
    // Nothing is saved unless both fetch and extraction succeed
    const payload = await scrapeSchedule(options);
    await storage.saveSchedule(payload);
    return 0;
  } catch (error) {
    logger.error("Failed to scrape schedule:", error);
    return 1;
  }
}
