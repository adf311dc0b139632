import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CONVERSATION_JUDGE } from './ai.types';
import { LlmService } from './llm.service';
import { LlmConversationJudge } from './llm-conversation.judge';

/**
 * Model access and the default conversation judge.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    LlmService,
    LlmConversationJudge,
    { provide: CONVERSATION_JUDGE, useExisting: LlmConversationJudge },
  ],
  exports: [LlmService, CONVERSATION_JUDGE],
})
export class AiModule {}
