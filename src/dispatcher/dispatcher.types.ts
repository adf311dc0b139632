import type { JobsOptions } from 'bullmq';

/**
 * Options for dispatching a job to a registered queue.
 */
export interface DispatchOptions<T = unknown> {
  /** Registered queue name */
  queue: string;
  /** BullMQ job name */
  jobName: string;
  /** Job payload */
  data: T;
  /** Optional BullMQ job options (deduplication, delay, etc.) */
  jobOptions?: JobsOptions;
}

/**
 * Options for registering a repeating job scheduler on a registered queue.
 */
export interface ScheduleOptions<T = unknown> {
  queue: string;
  /** Scheduler id; upserting the same id replaces the previous cadence */
  schedulerId: string;
  everyMs: number;
  jobName: string;
  data: T;
}
