import "dotenv/config";
import path from "path";
import { z } from "zod";
import { JsonStorage } from "./storage/json";
import { StdoutStorage } from "./storage/stdout";
import type { Storage } from "./storage/interface";

const ConfigSchema = z.object({
  cronSchedule: z
    .string()
    .regex(
      /^(\*|([0-9]|1[0-9]|2[0-9]|3[0-9]|4[0-9]|5[0-9])) (\*|([0-9]|1[0-9]|2[0-9]|3[0-9]|4[0-9]|5[0-9])) (\*|([0-9]|1[0-9]|2[0-3])) (\*|([1-9]|1[0-9]|2[0-9]|3[0-1])) (\*|([1-9]|1[0-2]))$/
    )
    .optional(),
  request: z.object({
    timeoutMs: z.number().int().positive().default(30_000),
    userAgent: z.string().min(1).default("huskers-schedule-scraper/1.0"),
  }),
  storage: z.object({
    type: z.enum(["json", "stdout"]),
    path: z.string(),
  }),
  stadiums: z.object({
    dir: z.string(),
    manifestFile: z.string(),
    markdownFile: z.string(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

const storagePath = process.env.STORAGE_PATH || "data";

export const config = ConfigSchema.parse({
  cronSchedule: process.env.CRON_SCHEDULE || undefined,
  request: {
    timeoutMs: process.env.REQUEST_TIMEOUT_MS
      ? Number(process.env.REQUEST_TIMEOUT_MS)
      : undefined,
    userAgent: process.env.USER_AGENT || undefined,
  },
  storage: {
    type: process.env.STORAGE_TYPE || "json",
    path: storagePath,
  },
  stadiums: {
    dir: process.env.STADIUM_DIR || "stadiums",
    manifestFile: path.join(storagePath, "stadium_manifest.json"),
    markdownFile: "STADIUMS.md",
  },
});

export async function createStorage(): Promise<Storage> {
  switch (config.storage.type) {
    case "json": {
      const storage = new JsonStorage();
      await storage.initialize();
      return storage;
    }
    case "stdout":
      return new StdoutStorage();
  }
}
