import { Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { PinoLogger } from 'nestjs-pino';
import {
  Events,
  type MessageBroadcastEvent,
  MessageBroadcastEventSchema,
} from '../common/events';
import { ChannelGateway } from './channel.gateway';

/**
 * Listens for MESSAGE_BROADCAST events and sends them through the gateway.
 *
 * Lets modules notify end users, such as the reply-failure apology, without
 * depending on the send path's result.
 */
@Injectable()
export class OutboundHandler {
  constructor(
    private readonly logger: PinoLogger,
    private readonly gateway: ChannelGateway,
  ) {
    this.logger.setContext(OutboundHandler.name);
  }

  @OnEvent(Events.MESSAGE_BROADCAST)
  async handleBroadcast(event: MessageBroadcastEvent): Promise<void> {
    const parsed = MessageBroadcastEventSchema.safeParse(event);
    if (!parsed.success) {
      this.logger.warn(
        { error: parsed.error.message },
        'Ignoring malformed broadcast event',
      );
      return;
    }

    const { tenantId, chatId, content } = parsed.data;
    this.logger.debug({ tenantId, chatId }, 'Broadcasting message');

    const result = await this.gateway.sendText(tenantId, chatId, content);
    if (!result.ok) {
      this.logger.error(
        { err: result.error, tenantId, chatId },
        'Failed to broadcast message',
      );
    }
  }
}
