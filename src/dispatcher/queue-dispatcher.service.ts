import { Injectable } from '@nestjs/common';
import { Queue } from 'bullmq';
import { PinoLogger } from 'nestjs-pino';
import type { DispatchOptions, ScheduleOptions } from './dispatcher.types';

/**
 * Central dispatcher for routing jobs to registered BullMQ queues.
 *
 * Modules register their queues on init via `registerQueue()`. Services then
 * dispatch jobs without needing direct queue references.
 */
@Injectable()
export class QueueDispatcher {
  private readonly queues = new Map<string, Queue>();

  constructor(private readonly logger: PinoLogger) {
    this.logger.setContext(QueueDispatcher.name);
  }

  /**
   * Register a BullMQ queue for dispatching.
   *
   * Idempotent: a second registration under the same name is a no-op.
   */
  registerQueue(name: string, queue: Queue): void {
    if (this.queues.has(name)) {
      this.logger.debug({ queue: name }, 'Queue already registered, skipping');
      return;
    }
    this.queues.set(name, queue);
    this.logger.info({ queue: name }, 'Queue registered');
  }

  /**
   * Enqueue a job and return its ID without waiting for it to run.
   */
  async dispatch<T>(options: DispatchOptions<T>): Promise<string | undefined> {
    const queue = this.getQueue(options.queue);
    const job = await queue.add(
      options.jobName,
      options.data,
      options.jobOptions,
    );
    this.logger.debug(
      { queue: options.queue, jobName: options.jobName, jobId: job.id },
      'Job dispatched',
    );
    return job.id;
  }

  /**
   * Create or update a repeating job scheduler.
   *
   * Schedulers live in Redis, so every process upserting the same id shares
   * one cadence instead of stacking timers.
   */
  async schedule<T>(options: ScheduleOptions<T>): Promise<void> {
    const queue = this.getQueue(options.queue);
    await queue.upsertJobScheduler(
      options.schedulerId,
      { every: options.everyMs },
      { name: options.jobName, data: options.data },
    );
    this.logger.info(
      {
        queue: options.queue,
        schedulerId: options.schedulerId,
        everyMs: options.everyMs,
      },
      'Job scheduler upserted',
    );
  }

  private getQueue(name: string): Queue {
    const queue = this.queues.get(name);
    if (!queue) {
      throw new Error(`Queue "${name}" is not registered`);
    }
    return queue;
  }
}
