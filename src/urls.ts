import { z } from "zod";

const UrlConfigSchema = z.object({
  baseUrl: z.string().url(),
  paths: z.object({
    schedule: z.string().startsWith("/"),
  }),
});

const urlConfig = UrlConfigSchema.parse({
  baseUrl: process.env.SOURCE_BASE_URL || "https://huskers.com",
  paths: {
    schedule: process.env.SCHEDULE_PATH || "/sports/football/schedule",
  },
});

export function buildScheduleUrl(): string {
  return new URL(urlConfig.paths.schedule, urlConfig.baseUrl).href;
}

/**
 * Resolves a page-relative or protocol-relative href against the site.
 * Values that are not URLs at all are returned unchanged.
 */
export function resolveUrl(href: string, baseUrl: string = urlConfig.baseUrl): string {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return href;
  }
}
