import type { SchedulePayload } from "../types";
import type { Storage } from "./interface";
import { StorageError } from "./interface";

/** Prints the games as a JSON array instead of keeping a file. */
export class StdoutStorage implements Storage {
  constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

  async initialize(): Promise<void> {}

  async saveSchedule(payload: SchedulePayload): Promise<void> {
    const body = JSON.stringify(payload.games, null, 2) + "\n";
    await new Promise<void>((resolve, reject) => {
      this.out.write(body, (error) =>
        error ? reject(new StorageError("Failed to write to stdout", error)) : resolve()
      );
    });
  }
}
