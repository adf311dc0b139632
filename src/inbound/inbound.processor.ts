import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Inject } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Job } from 'bullmq';
import { PinoLogger } from 'nestjs-pino';
import { REPLY_GENERATOR, type ReplyGenerator } from '../ai/ai.types';
import { ChannelGateway } from '../channels/channel.gateway';
import { AppClsService } from '../common/cls.service';
import { Events, type MessageBroadcastEvent } from '../common/events';
import { attempt } from '../common/result';
import { ConversationService } from '../conversations/conversation.service';
import { PauseService } from '../pause/pause.service';
import type { TenantSettings } from '../tenants/tenant.schemas';
import { TenantSettingsService } from '../tenants/tenant-settings.service';
import {
  type FlushOutcome,
  type FlushTriggerJob,
  INBOUND_QUEUE,
} from './inbound.types';
import { joinFragments, MessageBufferService } from './message-buffer.service';

export const APOLOGY_MESSAGE =
  'Desculpe, tive um problema para processar sua mensagem. Pode tentar novamente em instantes?';

/**
 * Flushes a chat's buffer once its quiet period ends.
 *
 * On each job:
 * 1. Atomically drains the buffer; an empty buffer means another flush
 *    already took the burst
 * 2. Records the merged text as the user's turn, paused or not
 * 3. Stops when the chat is paused or the tenant's automation is off
 * 4. Generates a reply from the merged text and recent context
 * 5. Sends it and records the assistant's turn
 *
 * The buffer is gone once drained, so a failed flush is never retried; a
 * failed reply is answered with an apology unless the tenant opts for silence.
 */
@Processor(INBOUND_QUEUE)
export class InboundProcessor extends WorkerHost {
  constructor(
    private readonly logger: PinoLogger,
    private readonly buffer: MessageBufferService,
    private readonly conversations: ConversationService,
    private readonly pauseService: PauseService,
    private readonly tenantSettings: TenantSettingsService,
    private readonly gateway: ChannelGateway,
    private readonly clsService: AppClsService,
    private readonly eventEmitter: EventEmitter2,
    @Inject(REPLY_GENERATOR) private readonly replyGenerator: ReplyGenerator,
  ) {
    super();
    this.logger.setContext(InboundProcessor.name);
  }

  async process(job: Job<FlushTriggerJob>): Promise<FlushOutcome> {
    const { tenantId, chatId } = job.data;
    return this.clsService.runWithContext<FlushOutcome>(
      { tenantId, chatId },
      () => this.flush(tenantId, chatId),
    );
  }

  async flush(tenantId: string, chatId: string): Promise<FlushOutcome> {
    const fragments = await this.buffer.drain(tenantId, chatId);
    const mergedText = joinFragments(fragments);
    if (!mergedText) {
      this.logger.debug({ tenantId, chatId }, 'Buffer already drained');
      return 'empty';
    }

    this.logger.info(
      { tenantId, chatId, fragmentCount: fragments.length },
      'Flushing buffered fragments',
    );
    await this.conversations.recordUserTurn(tenantId, chatId, mergedText);

    if (await this.pauseService.isPaused(chatId)) {
      this.logger.info({ tenantId, chatId }, 'Chat paused, not replying');
      return 'paused';
    }

    const lookup = await this.tenantSettings.lookup(tenantId);
    if (lookup.status !== 'found') {
      this.logger.warn(
        { tenantId, chatId, lookup: lookup.status },
        'No usable tenant settings, not replying',
      );
      return 'skipped';
    }
    const { settings } = lookup;
    if (!settings.automationEnabled) {
      this.logger.debug({ tenantId, chatId }, 'Automation disabled');
      return 'disabled';
    }

    const context = await this.conversations.getContext(tenantId, chatId);
    const reply = await attempt(() =>
      this.replyGenerator.generateReply({
        tenantId,
        chatId,
        mergedText,
        context,
      }),
    );
    if (!reply.ok) {
      this.logger.error(
        { err: reply.error, tenantId, chatId },
        'Reply generation failed',
      );
      this.apologize(tenantId, chatId, settings);
      return 'failed';
    }

    const sent = await this.gateway.sendText(tenantId, chatId, reply.value);
    if (!sent.ok) {
      this.logger.error(
        { err: sent.error, tenantId, chatId },
        'Reply could not be delivered',
      );
      return 'failed';
    }

    await this.conversations.recordAssistantTurn(tenantId, chatId, reply.value);
    return 'replied';
  }

  private apologize(
    tenantId: string,
    chatId: string,
    settings: TenantSettings,
  ): void {
    if (settings.replyFailure === 'silent') return;

    const event: MessageBroadcastEvent = {
      tenantId,
      chatId,
      content: APOLOGY_MESSAGE,
    };
    this.eventEmitter.emit(Events.MESSAGE_BROADCAST, event);
  }
}
