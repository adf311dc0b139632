import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { PauseService } from '../pause/pause.service';
import { ReminderService } from '../reminders/reminder.service';
import { TenantSettingsService } from '../tenants/tenant-settings.service';
import type { ReplyGenerator, ReplyRequest } from './ai.types';
import { LlmService } from './llm.service';
import { REPLY_SYSTEM_PROMPT } from './prompts/reply';
import { createConversationTools } from './tools/conversation.tools';

const DEFAULT_HANDOFF_MINUTES = 60;

/**
 * Anthropic-backed reply generator for the live reply path.
 */
@Injectable()
export class LlmReplyGenerator implements ReplyGenerator {
  constructor(
    private readonly logger: PinoLogger,
    private readonly llmService: LlmService,
    private readonly pauseService: PauseService,
    private readonly reminderService: ReminderService,
    private readonly tenantSettings: TenantSettingsService,
  ) {
    this.logger.setContext(LlmReplyGenerator.name);
  }

  async generateReply(request: ReplyRequest): Promise<string> {
    const { tenantId, chatId, mergedText, context } = request;
    const settings = await this.tenantSettings.get(tenantId);

    const tools = createConversationTools(
      {
        pauseService: this.pauseService,
        reminderService: this.reminderService,
      },
      {
        tenantId,
        chatId,
        handoffMinutes:
          settings?.humanTakeoverMinutes ?? DEFAULT_HANDOFF_MINUTES,
      },
    );

    const system = context
      ? `${REPLY_SYSTEM_PROMPT}\n\n## Histórico recente\n${context}`
      : REPLY_SYSTEM_PROMPT;

    const response = await this.llmService.generate({
      system,
      messages: [{ role: 'user', content: mergedText }],
      tools,
    });

    const text = response.text.trim();
    if (!text) {
      throw new Error('Model returned an empty reply');
    }

    if (response.toolNames.length > 0) {
      this.logger.info(
        { tenantId, chatId, toolNames: response.toolNames },
        'Reply used tools',
      );
    }
    return text;
  }
}
