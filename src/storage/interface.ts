import type { SchedulePayload } from '../types';

export interface Storage {
  initialize(): Promise<void>;

  saveSchedule(payload: SchedulePayload): Promise<void>;
}

export class StorageError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'StorageError';
  }
}
