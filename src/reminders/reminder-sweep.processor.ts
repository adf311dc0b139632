import { OnWorkerEvent, Processor, WorkerHost } from '@nestjs/bullmq';
import { Job } from 'bullmq';
import { PinoLogger } from 'nestjs-pino';
import type { ReminderSweepSummary } from './reminder.schemas';
import { ReminderService } from './reminder.service';

export const REMINDER_SWEEP_QUEUE = 'reminder-sweeps';

/**
 * Runs one reminder sweep per tick of the `reminder-sweeps` job scheduler.
 */
@Processor(REMINDER_SWEEP_QUEUE)
export class ReminderSweepProcessor extends WorkerHost {
  constructor(
    private readonly logger: PinoLogger,
    private readonly reminderService: ReminderService,
  ) {
    super();
    this.logger.setContext(ReminderSweepProcessor.name);
  }

  async process(job: Job): Promise<ReminderSweepSummary> {
    this.logger.debug({ jobId: job.id }, 'Reminder sweep tick');
    return this.reminderService.sweep();
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job, error: Error) {
    this.logger.error({ err: error, jobId: job.id }, 'Reminder sweep failed');
  }
}
