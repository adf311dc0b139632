import { Module } from '@nestjs/common';
import { PauseModule } from '../pause/pause.module';
import { RemindersModule } from '../reminders/reminders.module';
import { TenantsModule } from '../tenants/tenants.module';
import { AiModule } from './ai.module';
import { REPLY_GENERATOR } from './ai.types';
import { LlmReplyGenerator } from './llm-reply.generator';

/**
 * The default reply generator. Kept apart from AiModule because its tools
 * schedule reminders, and reminders consult the judge AiModule provides.
 */
@Module({
  imports: [AiModule, PauseModule, RemindersModule, TenantsModule],
  providers: [
    LlmReplyGenerator,
    { provide: REPLY_GENERATOR, useExisting: LlmReplyGenerator },
  ],
  exports: [REPLY_GENERATOR],
})
export class ReplyModule {}
