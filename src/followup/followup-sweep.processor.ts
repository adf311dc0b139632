import { OnWorkerEvent, Processor, WorkerHost } from '@nestjs/bullmq';
import { Job } from 'bullmq';
import { PinoLogger } from 'nestjs-pino';
import {
  FOLLOWUP_SWEEP_QUEUE,
  type FollowupSweepJob,
  type FollowupSweepSummary,
} from './followup.types';
import { FollowupService } from './followup.service';

/**
 * Runs the follow-up sweep for the provider named in each scheduler tick.
 */
@Processor(FOLLOWUP_SWEEP_QUEUE)
export class FollowupSweepProcessor extends WorkerHost {
  constructor(
    private readonly logger: PinoLogger,
    private readonly followupService: FollowupService,
  ) {
    super();
    this.logger.setContext(FollowupSweepProcessor.name);
  }

  async process(job: Job<FollowupSweepJob>): Promise<FollowupSweepSummary> {
    const { provider } = job.data;
    this.logger.debug({ jobId: job.id, provider }, 'Follow-up sweep tick');
    return this.followupService.sweep(provider);
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<FollowupSweepJob>, error: Error) {
    this.logger.error(
      { err: error, jobId: job.id, provider: job.data.provider },
      'Follow-up sweep failed',
    );
  }
}
