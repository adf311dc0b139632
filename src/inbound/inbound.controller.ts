import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { InboundMessageSchema, type IntakeOutcome } from './inbound.types';
import { InboundService } from './inbound.service';

/**
 * Intake endpoint for provider webhooks, after their payloads have been
 * normalized to `{ tenantId, chatId, text, fromOperator? }`.
 */
@Controller('inbound')
export class InboundController {
  constructor(
    private readonly logger: PinoLogger,
    private readonly inboundService: InboundService,
  ) {
    this.logger.setContext(InboundController.name);
  }

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  async receive(@Body() body: unknown): Promise<{ outcome: IntakeOutcome }> {
    const parsed = InboundMessageSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, 'Rejected inbound body');
      throw new BadRequestException(parsed.error.flatten());
    }

    const { tenantId, chatId, text, messageId, fromOperator } = parsed.data;
    const outcome = fromOperator
      ? await this.inboundService.onOperatorMessage(tenantId, chatId, text)
      : await this.inboundService.onInboundFragment(
          tenantId,
          chatId,
          text,
          messageId,
        );
    return { outcome };
  }
}
