import { BullModule, InjectQueue } from '@nestjs/bullmq';
import { Module, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Queue } from 'bullmq';
import { AiModule } from '../ai/ai.module';
import { ChannelsModule } from '../channels/channels.module';
import { ConversationsModule } from '../conversations/conversations.module';
import { QueueDispatcher } from '../dispatcher';
import { PauseModule } from '../pause/pause.module';
import { RedisModule } from '../redis/redis.module';
import { TenantsModule } from '../tenants/tenants.module';
import {
  REMINDER_SWEEP_QUEUE,
  ReminderSweepProcessor,
} from './reminder-sweep.processor';
import { ReminderService } from './reminder.service';

/**
 * One-shot reminders.
 *
 * A repeating job scheduler ticks the `reminder-sweeps` queue; each tick
 * claims due reminders and delivers them through the channel gateway.
 */
@Module({
  imports: [
    BullModule.registerQueue({
      name: REMINDER_SWEEP_QUEUE,
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
    RedisModule,
    TenantsModule,
  ],
  providers: [ReminderService, ReminderSweepProcessor],
  exports: [ReminderService],
})
export class RemindersModule implements OnModuleInit {
  constructor(
    @InjectQueue(REMINDER_SWEEP_QUEUE)
    private readonly sweepQueue: Queue,
    private readonly dispatcher: QueueDispatcher,
    private readonly configService: ConfigService,
  ) {}

  async onModuleInit(): Promise<void> {
    this.dispatcher.registerQueue(REMINDER_SWEEP_QUEUE, this.sweepQueue);
    await this.dispatcher.schedule({
      queue: REMINDER_SWEEP_QUEUE,
      schedulerId: 'reminder-sweep',
      everyMs: this.configService.get<number>(
        'reminders.sweepIntervalMs',
        60_000,
      ),
      jobName: 'sweep',
      data: {},
    });
  }
}
