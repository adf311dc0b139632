import { HttpModule } from '@nestjs/axios';
import { Module, OnModuleInit } from '@nestjs/common';
import { ProviderSchema } from '../tenants/tenant.schemas';
import { TenantsModule } from '../tenants/tenants.module';
import { ChannelGateway } from './channel.gateway';
import { ChannelSenderRegistry } from './channel-sender.registry';
import { OutboundHandler } from './outbound.handler';
import { HttpChannelSender } from './senders/http.sender';

/**
 * Outbound side of every conversation.
 *
 * Exports:
 * - ChannelGateway: send text to a tenant's chat, returning a Result
 * - ChannelSenderRegistry: swap the sender for a provider
 *
 * Every provider starts out on the HTTP sender.
 */
@Module({
  imports: [HttpModule, TenantsModule],
  providers: [
    ChannelSenderRegistry,
    ChannelGateway,
    HttpChannelSender,
    OutboundHandler,
  ],
  exports: [ChannelGateway, ChannelSenderRegistry],
})
export class ChannelsModule implements OnModuleInit {
  constructor(
    private readonly registry: ChannelSenderRegistry,
    private readonly httpSender: HttpChannelSender,
  ) {}

  onModuleInit(): void {
    for (const provider of ProviderSchema.options) {
      if (!this.registry.has(provider)) {
        this.registry.register(provider, this.httpSender);
      }
    }
  }
}
