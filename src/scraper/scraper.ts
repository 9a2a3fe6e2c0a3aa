import type { AxiosInstance } from "axios";
import { config } from "../config";
import type { SchedulePayload } from "../types";
import { buildScheduleUrl } from "../urls";
import { logger } from "../utils/logger";
import { createHttpClient, fetchHtml } from "./fetcher";
import { extractSchedule } from "./schedule";

export interface ScrapeOptions {
  url?: string;
  client?: AxiosInstance;
  now?: () => Date;
}

export async function scrapeSchedule(options: ScrapeOptions = {}): Promise<SchedulePayload> {
  const url = options.url ?? buildScheduleUrl();
  const client = options.client ?? createHttpClient(config.request);
  const now = options.now ?? (() => new Date());

  logger.info(`Fetching schedule from ${url}`);
  const html = await fetchHtml(url, client);

  const games = extractSchedule(html, { baseUrl: url });
  logger.info(`Extracted ${games.length} games`);

  return {
    source_url: url,
    scraped_at: now().toISOString(),
    games,
  };
}
