import fs from "fs/promises";
import path from "path";
import { config } from "../config";
import { SchedulePayloadSchema } from "../schema";
import type { SchedulePayload } from "../types";
import { logger } from "../utils/logger";
import type { Storage } from "./interface";
import { StorageError } from "./interface";

export const SCHEDULE_FILE_NAME = "huskers_schedule.json";

export class JsonStorage implements Storage {
  readonly scheduleFile: string;

  constructor(scheduleFile = path.join(config.storage.path, SCHEDULE_FILE_NAME)) {
    this.scheduleFile = scheduleFile;
  }

  async initialize(): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.scheduleFile), { recursive: true });
    } catch (error) {
      throw new StorageError(
        `Failed to create directory for ${this.scheduleFile}`,
        error
      );
    }
  }

  async saveSchedule(payload: SchedulePayload): Promise<void> {
    const tmpFile = `${this.scheduleFile}.tmp`;
    try {
      await fs.writeFile(tmpFile, JSON.stringify(payload, null, 2) + "\n", "utf-8");
      await fs.rename(tmpFile, this.scheduleFile);
    } catch (error) {
      throw new StorageError(`Failed to write ${this.scheduleFile}`, error);
    }
    logger.info(`Wrote ${this.scheduleFile} with ${payload.games.length} games`);
  }

  async loadSchedule(): Promise<SchedulePayload> {
    let content: string;
    try {
      content = await fs.readFile(this.scheduleFile, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        throw new StorageError(
          `Missing ${this.scheduleFile}. Run the scraper first.`,
          error
        );
      }
      throw new StorageError(`Failed to read ${this.scheduleFile}`, error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new StorageError(`${this.scheduleFile} is not valid JSON`, error);
    }

    const parsed = SchedulePayloadSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StorageError(
        `${this.scheduleFile} does not match the schedule format`,
        parsed.error
      );
    }
    return parsed.data;
  }
}
