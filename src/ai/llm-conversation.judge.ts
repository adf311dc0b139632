import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import type { ConversationJudge, JudgeRequest, Judgment } from './ai.types';
import { LlmService } from './llm.service';
import {
  FINISHED_MARKER,
  FOLLOWUP_JUDGE_PROMPT,
} from './prompts/followup-judge';

/** A finished verdict is the marker alone, maybe with punctuation or quotes */
const MAX_FINISHED_LENGTH = 15;

/**
 * Parse the model's answer into a judgment.
 */
export function parseJudgment(answer: string): Judgment {
  const text = answer.trim();
  if (text.length === 0) {
    return { verdict: 'suppress', reason: 'empty answer' };
  }
  if (
    text.toUpperCase().includes(FINISHED_MARKER) &&
    text.length < MAX_FINISHED_LENGTH
  ) {
    return { verdict: 'suppress', reason: 'conversation finished' };
  }
  return { verdict: 'send', text };
}

/**
 * Anthropic-backed judge for follow-ups and reminders.
 */
@Injectable()
export class LlmConversationJudge implements ConversationJudge {
  constructor(
    private readonly logger: PinoLogger,
    private readonly llmService: LlmService,
  ) {
    this.logger.setContext(LlmConversationJudge.name);
  }

  async judge(request: JudgeRequest): Promise<Judgment> {
    const response = await this.llmService.generate({
      system: FOLLOWUP_JUDGE_PROMPT,
      messages: [
        {
          role: 'user',
          content: `Histórico recente (pode estar truncado):\n${request.recentContext || '(vazio)'}\n\nInstrução de retomada: ${request.instruction}`,
        },
      ],
      maxSteps: 1,
      maxTokens: 300,
    });

    const judgment = parseJudgment(response.text);
    this.logger.debug(
      {
        tenantId: request.tenantId,
        chatId: request.chatId,
        verdict: judgment.verdict,
      },
      'Conversation judged',
    );
    return judgment;
  }
}
