import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import type { ChannelSender, Provider } from './channel.types';

/**
 * Maps each channel provider to the sender that delivers through it.
 */
@Injectable()
export class ChannelSenderRegistry {
  private readonly senders = new Map<Provider, ChannelSender>();

  constructor(private readonly logger: PinoLogger) {
    this.logger.setContext(ChannelSenderRegistry.name);
  }

  /**
   * Register the sender for a provider, replacing any earlier one.
   */
  register(provider: Provider, sender: ChannelSender): void {
    this.senders.set(provider, sender);
    this.logger.debug({ provider }, 'Registered channel sender');
  }

  /**
   * @throws Error if no sender is registered for the provider
   */
  get(provider: Provider): ChannelSender {
    const sender = this.senders.get(provider);
    if (!sender) {
      throw new Error(
        `No sender for provider "${provider}". Available: ${this.listProviders().join(', ')}`,
      );
    }
    return sender;
  }

  has(provider: Provider): boolean {
    return this.senders.has(provider);
  }

  listProviders(): Provider[] {
    return Array.from(this.senders.keys());
  }
}
