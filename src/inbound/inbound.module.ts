import { BullModule, InjectQueue } from '@nestjs/bullmq';
import { Module, OnModuleInit } from '@nestjs/common';
import { Queue } from 'bullmq';
import { ReplyModule } from '../ai/reply.module';
import { ChannelsModule } from '../channels/channels.module';
import { ConversationsModule } from '../conversations/conversations.module';
import { QueueDispatcher } from '../dispatcher';
import { PauseModule } from '../pause/pause.module';
import { RedisModule } from '../redis/redis.module';
import { TenantsModule } from '../tenants/tenants.module';
import { InboundController } from './inbound.controller';
import { InboundProcessor } from './inbound.processor';
import { InboundService } from './inbound.service';
import { INBOUND_QUEUE } from './inbound.types';
import { MessageBufferService } from './message-buffer.service';

/**
 * Debounced intake and the live reply path.
 *
 * Intake pushes fragments to a per-chat Redis list and replaces the chat's
 * delayed trigger job. When the chat goes quiet, the processor drains the
 * list and replies to the merged message.
 */
@Module({
  imports: [
    BullModule.registerQueue({
      name: INBOUND_QUEUE,
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: true,
        removeOnFail: { count: 100 },
      },
    }),
    ChannelsModule,
    ConversationsModule,
    PauseModule,
    RedisModule,
    ReplyModule,
    TenantsModule,
  ],
  controllers: [InboundController],
  providers: [MessageBufferService, InboundService, InboundProcessor],
  exports: [InboundService],
})
export class InboundModule implements OnModuleInit {
  constructor(
    @InjectQueue(INBOUND_QUEUE)
    private readonly inboundQueue: Queue,
    private readonly dispatcher: QueueDispatcher,
  ) {}

  onModuleInit(): void {
    this.dispatcher.registerQueue(INBOUND_QUEUE, this.inboundQueue);
  }
}
