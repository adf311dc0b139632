import { BullModule, InjectQueue } from '@nestjs/bullmq';
import { Logger, Module, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Queue } from 'bullmq';
import { AiModule } from '../ai/ai.module';
import { ChannelsModule } from '../channels/channels.module';
import { ConversationsModule } from '../conversations/conversations.module';
import { QueueDispatcher } from '../dispatcher';
import { PauseModule } from '../pause/pause.module';
import { ProviderSchema } from '../tenants/tenant.schemas';
import { TenantsModule } from '../tenants/tenants.module';
import { FollowupSweepProcessor } from './followup-sweep.processor';
import { FollowupService } from './followup.service';
import { FOLLOWUP_SWEEP_QUEUE, type FollowupSweepJob } from './followup.types';

/**
 * Follow-up ladder sweeps.
 *
 * Each process upserts one job scheduler per provider it owns
 * (`followup.providers`); the scheduler id is shared in Redis, so every
 * owner of a provider ticks the same cadence.
 */
@Module({
  imports: [
    BullModule.registerQueue({
      name: FOLLOWUP_SWEEP_QUEUE,
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: true,
        removeOnFail: { count: 100 },
      },
    }),
    AiModule,
    ChannelsModule,
    ConversationsModule,
    PauseModule,
    TenantsModule,
  ],
  providers: [FollowupService, FollowupSweepProcessor],
  exports: [FollowupService],
})
export class FollowupModule implements OnModuleInit {
  private readonly logger = new Logger(FollowupModule.name);

  constructor(
    @InjectQueue(FOLLOWUP_SWEEP_QUEUE)
    private readonly sweepQueue: Queue,
    private readonly dispatcher: QueueDispatcher,
    private readonly configService: ConfigService,
  ) {}

  async onModuleInit(): Promise<void> {
    this.dispatcher.registerQueue(FOLLOWUP_SWEEP_QUEUE, this.sweepQueue);

    const everyMs = this.configService.get<number>(
      'followup.sweepIntervalMs',
      60_000,
    );
    const providers = this.configService.get<string[]>('followup.providers', [
      'uazapi',
    ]);

    for (const provider of providers) {
      if (!ProviderSchema.safeParse(provider).success) {
        this.logger.warn(`Unknown follow-up provider "${provider}", skipping`);
        continue;
      }
      await this.dispatcher.schedule<FollowupSweepJob>({
        queue: FOLLOWUP_SWEEP_QUEUE,
        schedulerId: `followup-sweep:${provider}`,
        everyMs,
        jobName: 'sweep',
        data: { provider },
      });
    }
  }
}
