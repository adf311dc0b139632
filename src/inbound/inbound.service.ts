import { Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { PinoLogger } from 'nestjs-pino';
import { Events, type MessageBroadcastEvent } from '../common/events';
import { ConversationService } from '../conversations/conversation.service';
import { PauseService } from '../pause/pause.service';
import { isOptOut } from '../tenants/opt-out';
import { TenantSettingsService } from '../tenants/tenant-settings.service';
import type { IntakeOutcome } from './inbound.types';
import { MessageBufferService } from './message-buffer.service';

const MINUTE_MS = 60_000;
/** Used when the tenant has no readable settings */
const DEFAULT_MANUAL_PAUSE_MINUTES = 1440;

export const OPT_OUT_CONFIRMATION =
  '✅ Entendido! A IA foi desativada para você. Um atendente humano assumirá a partir de agora.';

type Command = 'reset' | 'activate' | 'pause';

const COMMANDS = new Map<string, Command>([
  ['#reset', 'reset'],
  ['#ativar', 'activate'],
  ['#stop', 'pause'],
  ['#pausa', 'pause'],
]);

/**
 * Entry point for normalized messages from every channel provider.
 *
 * End-user text is buffered for the debounce window, except for the `#`
 * commands and opt-out triggers, which act immediately and never reach the
 * reply path. Messages a human operator sends from the business side pause
 * automation instead.
 */
@Injectable()
export class InboundService {
  constructor(
    private readonly logger: PinoLogger,
    private readonly buffer: MessageBufferService,
    private readonly pauseService: PauseService,
    private readonly conversations: ConversationService,
    private readonly tenantSettings: TenantSettingsService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.logger.setContext(InboundService.name);
  }

  async onInboundFragment(
    tenantId: string,
    chatId: string,
    text: string,
    messageId?: string,
  ): Promise<IntakeOutcome> {
    const trimmed = text.trim();
    if (!trimmed) {
      this.logger.debug({ tenantId, chatId }, 'Ignoring empty fragment');
      return 'ignored';
    }

    const command = COMMANDS.get(trimmed.toLowerCase());
    switch (command) {
      case 'reset':
        await this.conversations.clearContext(tenantId, chatId);
        return 'reset';
      case 'activate':
        await this.pauseService.clear(chatId);
        return 'reactivated';
      case 'pause': {
        const settings = await this.tenantSettings.get(tenantId);
        const minutes =
          settings?.manualPauseMinutes ?? DEFAULT_MANUAL_PAUSE_MINUTES;
        await this.pauseService.setPaused(chatId, minutes * MINUTE_MS);
        return 'paused';
      }
      default:
        break;
    }

    const settings = await this.tenantSettings.get(tenantId);
    if (settings && isOptOut(settings.optOut, trimmed)) {
      return this.optOut(tenantId, chatId);
    }

    await this.buffer.enqueue(tenantId, chatId, text, messageId);
    return 'buffered';
  }

  /**
   * The end user asked to stop talking to the bot: pause for good and
   * confirm, without consulting the model.
   */
  private async optOut(
    tenantId: string,
    chatId: string,
  ): Promise<IntakeOutcome> {
    await this.pauseService.setPausedPermanent(chatId);
    this.logger.info({ tenantId, chatId }, 'End user opted out');

    const event: MessageBroadcastEvent = {
      tenantId,
      chatId,
      content: OPT_OUT_CONFIRMATION,
    };
    this.eventEmitter.emit(Events.MESSAGE_BROADCAST, event);
    return 'optedOut';
  }

  /**
   * A human operator answered from the business side: stop automation for
   * the takeover window, or for good when the text carries an opt-out trigger.
   */
  async onOperatorMessage(
    tenantId: string,
    chatId: string,
    text: string,
  ): Promise<IntakeOutcome> {
    const pause = await this.pauseService.handleOperatorMessage(
      tenantId,
      chatId,
      text,
    );
    this.logger.info(
      { tenantId, chatId, pause: pause.kind },
      'Operator message detected',
    );
    return 'operator';
  }
}
